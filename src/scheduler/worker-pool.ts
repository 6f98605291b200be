import { setMaxListeners } from "node:events";
import { ResultAggregator } from "./result-aggregator.js";
import { errorMessage } from "../core/errors.js";
import type {
  CandidatePath,
  Inspect,
  InspectOptions,
  InspectionOutcome,
  ResultRecord,
  ScanRun,
  TaskState,
} from "../core/types.js";
import type { Logger } from "../core/logger.js";

export type ResultListener = (
  record: ResultRecord,
  aggregator: ResultAggregator,
) => void;

export interface WorkerPoolOptions {
  maxWorkers: number;
  inspect: Inspect;
  inspectOptions: Omit<InspectOptions, "signal">;
  logger: Logger;
  onResult?: ResultListener;
}

interface RunningTask {
  candidate: CandidatePath;
  startedAt: number;
  promise: Promise<void>;
}

/**
 * Runs one inspection per candidate with at most `maxWorkers` in flight.
 * Candidates are dispatched in index order from a FIFO queue; outcomes land
 * in a {@link ResultAggregator} by index, whatever order they finish in.
 *
 * A pool is good for a single run.
 */
export class WorkerPool {
  private readonly maxWorkers: number;
  private readonly inspect: Inspect;
  private readonly inspectOptions: Omit<InspectOptions, "signal">;
  private readonly logger: Logger;
  private readonly onResult?: ResultListener;
  private readonly running: Map<number, RunningTask> = new Map();
  private readonly queue: CandidatePath[] = [];
  private states: TaskState[] = [];
  private aggregator: ResultAggregator | null = null;
  private signal?: AbortSignal;
  private started = false;

  constructor(options: WorkerPoolOptions) {
    if (!Number.isInteger(options.maxWorkers) || options.maxWorkers < 1) {
      throw new RangeError(
        `maxWorkers must be a positive integer, got ${options.maxWorkers}`,
      );
    }
    this.maxWorkers = options.maxWorkers;
    this.inspect = options.inspect;
    this.inspectOptions = options.inspectOptions;
    this.logger = options.logger;
    this.onResult = options.onResult;
  }

  get activeCount(): number {
    return this.running.size;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  get availableSlots(): number {
    return this.maxWorkers - this.running.size;
  }

  canAccept(): boolean {
    return this.running.size < this.maxWorkers;
  }

  taskState(index: number): TaskState | undefined {
    return this.states[index];
  }

  async run(
    candidates: readonly CandidatePath[],
    options: { signal?: AbortSignal } = {},
  ): Promise<ScanRun> {
    if (this.started) {
      throw new Error("WorkerPool.run() may only be called once per pool");
    }
    this.started = true;

    const startedAt = Date.now();
    const aggregator = new ResultAggregator(candidates);
    this.aggregator = aggregator;
    this.signal = options.signal;
    this.states = candidates.map((): TaskState => "queued");
    this.queue.push(...candidates);

    this.logger.debug("Scan started", {
      candidates: candidates.length,
      maxWorkers: this.maxWorkers,
    });

    const signal = options.signal;
    if (signal) {
      // One abort listener per in-flight inspection, plus the pool's own.
      setMaxListeners(this.maxWorkers + 1, signal);
    }
    let resolveCancelled: () => void = () => {};
    const cancelled = new Promise<void>((resolve) => {
      resolveCancelled = resolve;
    });
    // Seal before anything else settles so late results are dropped.
    const onAbort = (): void => {
      aggregator.seal();
      resolveCancelled();
    };
    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener("abort", onAbort, { once: true });
    }

    this.fill();

    try {
      await Promise.race([aggregator.whenComplete(), cancelled]);
    } finally {
      signal?.removeEventListener("abort", onAbort);
    }

    if (!aggregator.isComplete) {
      const skipped = this.queue.length;
      this.queue.length = 0;
      this.logger.warn("Scan cancelled", {
        recorded: aggregator.completedCount,
        inFlight: this.running.size,
        skipped,
      });
    }

    const durationMs = Date.now() - startedAt;
    this.logger.debug("Scan finished", {
      recorded: aggregator.completedCount,
      expected: aggregator.expectedCount,
      complete: aggregator.isComplete,
      durationMs,
    });

    return {
      slots: aggregator.snapshot(),
      records: aggregator.isComplete ? aggregator.results() : undefined,
      complete: aggregator.isComplete,
      durationMs,
    };
  }

  /** Waits for every in-flight inspection to settle. */
  async drain(): Promise<void> {
    const promises = Array.from(this.running.values()).map((r) => r.promise);
    await Promise.allSettled(promises);
  }

  private fill(): void {
    while (this.canAccept() && !this.signal?.aborted) {
      const next = this.queue.shift();
      if (!next) break;
      this.dispatch(next);
    }
  }

  private dispatch(candidate: CandidatePath): void {
    const startedAt = Date.now();
    this.states[candidate.index] = "running";

    const promise = this.execute(candidate)
      .then((outcome) => this.complete(candidate, outcome, startedAt))
      .catch((err: unknown) => {
        this.logger.error(`Recording outcome for ${candidate.path} failed`, {
          error: errorMessage(err),
        });
      });

    this.running.set(candidate.index, { candidate, startedAt, promise });
    this.logger.debug(`Dispatched ${candidate.displayName}`, {
      index: candidate.index,
      activeCount: this.activeCount,
    });
  }

  private async execute(candidate: CandidatePath): Promise<InspectionOutcome> {
    try {
      return await this.inspect(candidate, {
        ...this.inspectOptions,
        signal: this.signal,
      });
    } catch (err) {
      return { kind: "failed", reason: errorMessage(err) };
    }
  }

  private complete(
    candidate: CandidatePath,
    outcome: InspectionOutcome,
    startedAt: number,
  ): void {
    this.running.delete(candidate.index);
    this.states[candidate.index] = outcome.kind === "failed" ? "failed" : "succeeded";

    const aggregator = this.aggregator;
    if (aggregator?.record(candidate.index, outcome)) {
      const durationMs = Date.now() - startedAt;
      if (outcome.kind === "failed") {
        this.logger.warn(`Inspection failed for ${candidate.displayName}`, {
          path: candidate.path,
          reason: outcome.reason,
          durationMs,
        });
      } else {
        this.logger.debug(`Inspected ${candidate.displayName}`, {
          outcome: outcome.kind,
          durationMs,
        });
      }
      this.notify(candidate.index, aggregator);
    }

    this.fill();
  }

  private notify(index: number, aggregator: ResultAggregator): void {
    const record = aggregator.get(index);
    if (!this.onResult || !record) return;
    try {
      this.onResult(record, aggregator);
    } catch (err) {
      this.logger.warn("Result listener threw", { error: errorMessage(err) });
    }
  }
}
