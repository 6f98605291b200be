import { resolveConfig, type RawScanOptions, type ResolveContext } from "../../core/config.js";
import { Logger } from "../../core/logger.js";
import { errorMessage } from "../../core/errors.js";
import { runScan, type ScanDependencies } from "../../scanner/orchestrator.js";
import { error, warn, dim, formatDuration } from "../formatters.js";
import type { ScanConfig } from "../../core/types.js";

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_INTERRUPTED = 130;

export interface ScanCommandDependencies extends Omit<ScanDependencies, "signal" | "logger"> {
  context?: ResolveContext;
  /** Stream for diagnostics; defaults to stderr. */
  err?: { write(chunk: string): unknown };
  createLogger?: (config: ScanConfig) => Logger;
}

/**
 * Resolves options, runs the scan and maps the outcome to an exit code.
 * SIGINT during the run cancels it; the partial block is still printed.
 */
export async function executeScan(
  options: RawScanOptions,
  deps: ScanCommandDependencies = {},
): Promise<number> {
  const err = deps.err ?? process.stderr;
  const printError = (message: string): void => {
    err.write(`${error(message)}\n`);
  };

  let config: ScanConfig;
  try {
    config = resolveConfig(options, deps.context);
  } catch (e) {
    printError(errorMessage(e));
    return EXIT_FATAL;
  }

  const logger = deps.createLogger
    ? deps.createLogger(config)
    : Logger.createCliLogger(config.verbose, config.logFile);

  const controller = new AbortController();
  const onSigint = (): void => {
    logger.debug("SIGINT received, cancelling scan");
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  try {
    const report = await runScan(config, {
      inspect: deps.inspect,
      out: deps.out,
      logger,
      signal: controller.signal,
    });

    if (config.verbose) {
      err.write(
        `${dim(`Scanned ${report.candidates.length} folders in ${formatDuration(report.run.durationMs)}`)}\n`,
      );
    }

    if (!report.run.complete) {
      err.write(`${warn("Interrupted.")}\n`);
      return EXIT_INTERRUPTED;
    }
    return EXIT_OK;
  } catch (e) {
    logger.error("Scan aborted", { error: errorMessage(e) });
    printError(errorMessage(e));
    return EXIT_FATAL;
  } finally {
    process.removeListener("SIGINT", onSigint);
    await logger.flush();
  }
}
