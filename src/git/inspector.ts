import { spawnWithTimeout } from "../utils/process.js";
import { InspectionError, errorMessage } from "../core/errors.js";
import { parseStatus, isNotARepoMessage, firstLine } from "./parse-status.js";
import type {
  CandidatePath,
  InspectionOutcome,
  InspectOptions,
} from "../core/types.js";

export const GIT_EXECUTABLE = "git";

export function buildStatusArgs(dir: string, includeUntracked: boolean): string[] {
  return [
    "-C",
    dir,
    "status",
    "--porcelain=v2",
    "--branch",
    includeUntracked ? "--untracked-files=normal" : "--untracked-files=no",
  ];
}

function gitEnv(): NodeJS.ProcessEnv {
  return {
    ...process.env,
    // English messages so "not a git repository" can be recognised.
    LC_ALL: "C",
    // Read-only status; never take the index lock.
    GIT_OPTIONAL_LOCKS: "0",
    GIT_TERMINAL_PROMPT: "0",
  };
}

/**
 * Runs one `git status` for a candidate directory and classifies it. Never
 * rejects: every failure of the external call ends up as a `failed` outcome.
 */
export async function inspectRepo(
  candidate: CandidatePath,
  options: InspectOptions,
): Promise<InspectionOutcome> {
  try {
    return await runStatus(candidate.path, options);
  } catch (err) {
    return { kind: "failed", reason: describeFailure(err) };
  }
}

async function runStatus(
  dir: string,
  options: InspectOptions,
): Promise<InspectionOutcome> {
  const { result } = spawnWithTimeout(
    GIT_EXECUTABLE,
    buildStatusArgs(dir, options.includeUntracked),
    { timeoutMs: options.timeoutMs, env: gitEnv(), signal: options.signal },
  );

  const res = await result;

  if (res.aborted) return { kind: "failed", reason: "cancelled" };
  if (res.timedOut) return { kind: "failed", reason: "timeout" };

  if (res.exitCode === 0) {
    const parsed = parseStatus(res.stdout);
    return { kind: "repo", ...parsed };
  }

  if (isNotARepoMessage(res.stderr)) {
    return { kind: "not-a-repo" };
  }

  const detail =
    firstLine(res.stderr) ||
    (res.signal ? `killed by ${res.signal}` : `exit code ${res.exitCode}`);
  throw new InspectionError(detail.replace(/^fatal:\s*/, ""));
}

function describeFailure(err: unknown): string {
  if (err instanceof Error && "code" in err) {
    if (err.code === "ENOENT") return `${GIT_EXECUTABLE} executable not found`;
    if (err.code === "EACCES") return "permission denied";
  }
  return errorMessage(err);
}
