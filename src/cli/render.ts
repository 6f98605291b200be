import { Chalk, type ChalkInstance } from "chalk";
import type { InspectionOutcome, ResultRecord, CandidatePath } from "../core/types.js";

export const LABEL_CLEAN = "clean";
export const LABEL_DIRTY = "dirty";
export const LABEL_NOT_A_REPO = "not a git repo";
export const LABEL_DETACHED = "detached";
export const LABEL_NO_COMMITS = "no commits";
export const LABEL_PENDING = "pending";

const COLUMN_GAP = "  ";

export interface RenderOptions {
  color: boolean;
}

export type Slot = ResultRecord | undefined;

export function createPalette(color: boolean): ChalkInstance {
  return new Chalk({ level: color ? 1 : 0 });
}

export function failureLabel(reason: string): string {
  return `error: ${reason}`;
}

/** Label columns for one outcome, already colored by `c`. */
export function outcomeColumns(outcome: InspectionOutcome, c: ChalkInstance): string[] {
  switch (outcome.kind) {
    case "repo": {
      let branch: string;
      if (outcome.head === "detached") {
        branch = outcome.branch === "HEAD" ? LABEL_DETACHED : `${LABEL_DETACHED}@${outcome.branch}`;
      } else if (outcome.head === "unborn") {
        branch = LABEL_NO_COMMITS;
      } else {
        branch = outcome.branch;
      }
      const state = outcome.dirty ? c.red(LABEL_DIRTY) : c.green(LABEL_CLEAN);
      return [c.blue(branch), state];
    }
    case "not-a-repo":
      return [c.yellow(LABEL_NOT_A_REPO)];
    case "failed":
      return [c.magenta(failureLabel(outcome.reason))];
  }
}

/**
 * One line per slot, in slot order. `candidates` supplies names for slots
 * that have no outcome yet.
 */
export function renderLines(
  candidates: readonly CandidatePath[],
  slots: readonly Slot[],
  options: RenderOptions,
): string[] {
  const c = createPalette(options.color);
  const width = Math.max(0, ...candidates.map((cand) => cand.displayName.length));

  return candidates.map((candidate) => {
    const record = slots[candidate.index];
    const columns = record ? outcomeColumns(record.outcome, c) : [c.dim(LABEL_PENDING)];
    return [candidate.displayName.padEnd(width), ...columns].join(COLUMN_GAP);
  });
}

export function renderResults(
  records: readonly ResultRecord[],
  options: RenderOptions,
): string[] {
  return renderLines(
    records.map((r) => r.candidate),
    records,
    options,
  );
}
