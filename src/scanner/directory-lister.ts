import fs from "node:fs/promises";
import type { Dir, Stats } from "node:fs";
import path from "node:path";
import { ScanError } from "../core/errors.js";
import type { CandidatePath, ListOptions } from "../core/types.js";

const HIDDEN_PREFIX = ".";

function describeFsError(err: unknown): string {
  const code = err instanceof Error && "code" in err ? err.code : undefined;
  switch (code) {
    case "ENOENT":
      return "does not exist";
    case "EACCES":
    case "EPERM":
      return "permission denied";
    case "ENOTDIR":
      return "not a directory";
    default:
      return err instanceof Error ? err.message : String(err);
  }
}

async function assertDirectory(root: string): Promise<void> {
  let stat: Stats;
  try {
    stat = await fs.stat(root);
  } catch (err) {
    throw new ScanError(`Cannot scan ${root}: ${describeFsError(err)}`, root);
  }
  if (!stat.isDirectory()) {
    throw new ScanError(`Not a directory: ${root}`, root);
  }
}

/**
 * Yields the names of `root`'s immediate child directories in the order the
 * filesystem enumerates them. Symlinks are not followed.
 */
export async function* readSubdirectories(root: string): AsyncGenerator<string> {
  let dir: Dir;
  try {
    dir = await fs.opendir(root);
  } catch (err) {
    throw new ScanError(`Cannot scan ${root}: ${describeFsError(err)}`, root);
  }
  // for-await closes the handle on exit, including early return.
  for await (const entry of dir) {
    if (entry.isDirectory()) {
      yield entry.name;
    }
  }
}

export function isHidden(name: string): boolean {
  return name.startsWith(HIDDEN_PREFIX);
}

function compareNames(a: string, b: string): number {
  const la = a.toLowerCase();
  const lb = b.toLowerCase();
  if (la !== lb) return la < lb ? -1 : 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Captures the candidate list for all roots once. Names are sorted
 * case-insensitively per root and indexed across roots, so the order stays
 * fixed for the rest of the run. Fails with {@link ScanError} on the first
 * unusable root, before anything is inspected.
 */
export async function listCandidates(
  roots: string[],
  options: ListOptions,
): Promise<CandidatePath[]> {
  const ignored = new Set(options.ignore);
  const qualify = roots.length > 1;
  const candidates: CandidatePath[] = [];

  for (const root of roots) {
    await assertDirectory(root);

    const names: string[] = [];
    for await (const name of readSubdirectories(root)) {
      if (!options.includeHidden && isHidden(name)) continue;
      if (ignored.has(name)) continue;
      names.push(name);
    }
    names.sort(compareNames);

    for (const name of names) {
      candidates.push({
        index: candidates.length,
        name,
        displayName: qualify ? `${path.basename(root)}/${name}` : name,
        path: path.join(root, name),
        root,
      });
    }
  }

  return candidates;
}
