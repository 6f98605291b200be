import path from "node:path";
import os from "node:os";
import fs from "node:fs/promises";

export function expandHome(input: string): string {
  if (input === "~") return os.homedir();
  if (input.startsWith("~/") || input.startsWith(`~${path.sep}`)) {
    return path.join(os.homedir(), input.slice(2));
  }
  return input;
}

/**
 * Resolves scan roots against `base`, expanding `~` and dropping repeats.
 * The first occurrence of a root keeps its position.
 */
export function normalizeRoots(
  inputs: string[],
  base: string = process.cwd(),
): string[] {
  const seen = new Set<string>();
  const roots: string[] = [];
  for (const input of inputs) {
    const resolved = path.resolve(base, expandHome(input));
    if (seen.has(resolved)) continue;
    seen.add(resolved);
    roots.push(resolved);
  }
  return roots;
}

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}
