import type { HeadState } from "../core/types.js";

export interface ParsedStatus {
  branch: string;
  head: HeadState;
  dirty: boolean;
}

const SHORT_OID_LENGTH = 7;

// Entry prefixes in `git status --porcelain=v2`: ordinary, renamed/copied,
// unmerged, untracked. Ignored entries ("!") never count.
const CHANGE_PREFIXES = ["1 ", "2 ", "u ", "? "];

/**
 * Parses `git status --porcelain=v2 --branch` output into the branch name,
 * head state and whether any change entry is present.
 */
export function parseStatus(stdout: string): ParsedStatus {
  let oid: string | undefined;
  let headName: string | undefined;
  let dirty = false;

  for (const line of stdout.split("\n")) {
    if (line.startsWith("# branch.oid ")) {
      oid = line.slice("# branch.oid ".length).trim();
    } else if (line.startsWith("# branch.head ")) {
      headName = line.slice("# branch.head ".length).trim();
    } else if (CHANGE_PREFIXES.some((prefix) => line.startsWith(prefix))) {
      dirty = true;
    }
  }

  if (oid === "(initial)") {
    return { branch: headName ?? "HEAD", head: "unborn", dirty };
  }

  if (headName === undefined || headName === "(detached)") {
    const branch = oid ? oid.slice(0, SHORT_OID_LENGTH) : "HEAD";
    return { branch, head: "detached", dirty };
  }

  return { branch: headName, head: "branch", dirty };
}

export function isNotARepoMessage(stderr: string): boolean {
  return /not a git repository/i.test(stderr);
}

export function firstLine(text: string): string {
  const line = text
    .split("\n")
    .map((l) => l.trim())
    .find((l) => l.length > 0);
  return line ?? "";
}
