import type {
  CandidatePath,
  InspectionOutcome,
  ResultRecord,
} from "../core/types.js";

/**
 * Write-once, index-keyed store for inspection outcomes. Each candidate owns
 * one slot; the completion counter is the only state shared across writes.
 */
export class ResultAggregator {
  private readonly candidates: readonly CandidatePath[];
  private readonly slots: (ResultRecord | undefined)[];
  private completed = 0;
  private sealed = false;
  private readonly gate: Promise<void>;
  private readonly openGate: () => void;

  constructor(candidates: readonly CandidatePath[]) {
    candidates.forEach((candidate, i) => {
      if (candidate.index !== i) {
        throw new Error(
          `Candidate ${candidate.path} has index ${candidate.index}, expected ${i}`,
        );
      }
    });
    this.candidates = candidates;
    this.slots = new Array<ResultRecord | undefined>(candidates.length).fill(undefined);
    let open: () => void = () => {};
    this.gate = new Promise<void>((resolve) => {
      open = resolve;
    });
    this.openGate = open;
    if (candidates.length === 0) this.openGate();
  }

  get expectedCount(): number {
    return this.candidates.length;
  }

  get completedCount(): number {
    return this.completed;
  }

  get isComplete(): boolean {
    return this.completed === this.candidates.length;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  /**
   * Stores the outcome for `index`. Returns false once sealed; throws on an
   * unknown index or a second write to the same slot.
   */
  record(index: number, outcome: InspectionOutcome): boolean {
    if (this.sealed) return false;

    const candidate = this.candidates[index];
    if (!Number.isInteger(index) || candidate === undefined) {
      throw new RangeError(`No candidate at index ${index}`);
    }
    if (this.slots[index] !== undefined) {
      throw new Error(`Outcome for ${candidate.path} already recorded`);
    }

    this.slots[index] = Object.freeze({ candidate, outcome: Object.freeze(outcome) });
    this.completed++;
    if (this.isComplete) this.openGate();
    return true;
  }

  get(index: number): ResultRecord | undefined {
    return this.slots[index];
  }

  /** Resolves once every candidate has an outcome. */
  whenComplete(): Promise<void> {
    return this.gate;
  }

  /** Stops accepting writes; used when a run is cancelled. */
  seal(): void {
    this.sealed = true;
  }

  results(): ResultRecord[] {
    const records: ResultRecord[] = [];
    for (const slot of this.slots) {
      if (slot === undefined) {
        throw new Error(
          `Results incomplete: ${this.completed} of ${this.candidates.length} recorded`,
        );
      }
      records.push(slot);
    }
    return records;
  }

  snapshot(): (ResultRecord | undefined)[] {
    return [...this.slots];
  }
}
