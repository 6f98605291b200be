import { listCandidates } from "./directory-lister.js";
import { WorkerPool } from "../scheduler/worker-pool.js";
import { inspectRepo } from "../git/inspector.js";
import { renderLines, renderResults } from "../cli/render.js";
import { LiveRenderer, type TextSink } from "../cli/live-render.js";
import { Logger } from "../core/logger.js";
import type { CandidatePath, Inspect, ScanConfig, ScanRun } from "../core/types.js";

export const NO_SUBFOLDERS_MESSAGE = "No subfolders found.";

export interface ScanDependencies {
  inspect?: Inspect;
  out?: TextSink;
  logger?: Logger;
  signal?: AbortSignal;
}

export interface ScanReport {
  candidates: CandidatePath[];
  run: ScanRun;
}

/**
 * One full run: capture candidates, inspect them on a fresh pool, print the
 * results in candidate order. A {@link ScanError} from the lister propagates
 * before anything is printed.
 */
export async function runScan(
  config: ScanConfig,
  deps: ScanDependencies = {},
): Promise<ScanReport> {
  const out = deps.out ?? process.stdout;
  const logger = deps.logger ?? Logger.silent();

  const candidates = await listCandidates(config.roots, {
    includeHidden: config.includeHidden,
    ignore: config.ignore,
  });

  logger.debug("Candidates captured", {
    roots: config.roots,
    count: candidates.length,
  });

  if (candidates.length === 0) {
    out.write(`${NO_SUBFOLDERS_MESSAGE}\n`);
    return { candidates, run: { slots: [], records: [], complete: true, durationMs: 0 } };
  }

  const renderOptions = { color: config.color };
  const live = config.live ? new LiveRenderer(out, candidates, renderOptions) : null;

  const pool = new WorkerPool({
    maxWorkers: config.maxWorkers,
    inspect: deps.inspect ?? inspectRepo,
    inspectOptions: {
      timeoutMs: config.timeoutMs,
      includeUntracked: config.includeUntracked,
    },
    logger,
    onResult: live ? (_record, aggregator) => live.draw(aggregator.snapshot()) : undefined,
  });

  live?.draw([]);

  try {
    const run = await pool.run(candidates, { signal: deps.signal });

    if (live) {
      live.draw(run.slots);
    } else {
      const lines = run.records
        ? renderResults(run.records, renderOptions)
        : renderLines(candidates, run.slots, renderOptions);
      out.write(lines.map((line) => `${line}\n`).join(""));
    }

    return { candidates, run };
  } finally {
    await pool.drain();
  }
}
