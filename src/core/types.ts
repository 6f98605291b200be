export interface CandidatePath {
  readonly index: number;
  readonly name: string;
  readonly displayName: string;
  readonly path: string;
  readonly root: string;
}

export type HeadState = "branch" | "detached" | "unborn";

export interface RepoOutcome {
  readonly kind: "repo";
  readonly branch: string;
  readonly head: HeadState;
  readonly dirty: boolean;
}

export interface NotARepoOutcome {
  readonly kind: "not-a-repo";
}

export interface FailedOutcome {
  readonly kind: "failed";
  readonly reason: string;
}

export type InspectionOutcome = RepoOutcome | NotARepoOutcome | FailedOutcome;

export interface ResultRecord {
  readonly candidate: CandidatePath;
  readonly outcome: InspectionOutcome;
}

export type TaskState = "queued" | "running" | "succeeded" | "failed";

export interface InspectOptions {
  timeoutMs: number;
  includeUntracked: boolean;
  signal?: AbortSignal;
}

export type Inspect = (
  candidate: CandidatePath,
  options: InspectOptions,
) => Promise<InspectionOutcome>;

export interface ScanRun {
  /** Records in candidate order; `undefined` marks a slot with no outcome yet. */
  slots: (ResultRecord | undefined)[];
  /** Every record in candidate order; set only when the run completed. */
  records?: ResultRecord[];
  complete: boolean;
  durationMs: number;
}

export interface ListOptions {
  includeHidden: boolean;
  ignore: string[];
}

export interface ScanConfig {
  roots: string[];
  includeHidden: boolean;
  ignore: string[];
  color: boolean;
  live: boolean;
  maxWorkers: number;
  timeoutMs: number;
  includeUntracked: boolean;
  verbose: boolean;
  logFile?: string;
}
