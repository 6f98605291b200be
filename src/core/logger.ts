import fs from "node:fs/promises";
import path from "node:path";
import { ensureDir } from "./paths.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  private logFile: string | null = null;
  private minLevel: LogLevel;
  private stderr: boolean;
  private pending: Promise<void> = Promise.resolve();
  private dirReady = false;

  constructor(options?: {
    logFile?: string;
    minLevel?: LogLevel;
    stderr?: boolean;
  }) {
    this.logFile = options?.logFile ?? null;
    this.minLevel = options?.minLevel ?? "info";
    this.stderr = options?.stderr ?? false;
  }

  /**
   * Diagnostics go to stderr so they never interleave with the status
   * lines on stdout.
   */
  static createCliLogger(verbose: boolean = false, logFile?: string): Logger {
    return new Logger({
      minLevel: verbose ? "debug" : "warn",
      stderr: true,
      logFile: logFile ? path.resolve(logFile) : undefined,
    });
  }

  static silent(): Logger {
    return new Logger({ minLevel: "error", stderr: false });
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.minLevel];
  }

  private formatEntry(entry: LogEntry): string {
    return JSON.stringify(entry);
  }

  private write(entry: LogEntry): void {
    if (!this.shouldLog(entry.level)) return;

    const line = this.formatEntry(entry);

    if (this.stderr) {
      console.error(line);
    }

    const logFile = this.logFile;
    if (logFile) {
      this.pending = this.pending
        .then(async () => {
          if (!this.dirReady) {
            await ensureDir(path.dirname(logFile));
            this.dirReady = true;
          }
          await fs.appendFile(logFile, line + "\n");
        })
        .catch((err: unknown) => {
          // First failed append disables the file sink.
          this.logFile = null;
          console.error(
            `Log file disabled: ${err instanceof Error ? err.message : String(err)}`,
          );
        });
    }
  }

  /** Resolves once every queued file write has landed. */
  flush(): Promise<void> {
    return this.pending;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write({
      timestamp: new Date().toISOString(),
      level: "debug",
      message,
      data,
    });
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write({
      timestamp: new Date().toISOString(),
      level: "info",
      message,
      data,
    });
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write({
      timestamp: new Date().toISOString(),
      level: "warn",
      message,
      data,
    });
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.write({
      timestamp: new Date().toISOString(),
      level: "error",
      message,
      data,
    });
  }
}
