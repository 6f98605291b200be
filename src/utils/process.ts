import { spawn, type ChildProcess } from "node:child_process";

export interface SpawnResult {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  aborted: boolean;
}

const FORCE_KILL_AFTER_MS = 5000;

export function parseTimeout(timeout: string): number {
  const match = timeout.match(/^(\d+)(ms|s|m|h)$/);
  if (!match) {
    throw new Error(`Invalid timeout format: ${timeout}. Use e.g. "10s", "1m", "500ms"`);
  }
  const value = parseInt(match[1], 10);
  const unit = match[2];
  switch (unit) {
    case "ms":
      return value;
    case "s":
      return value * 1000;
    case "m":
      return value * 60 * 1000;
    case "h":
      return value * 60 * 60 * 1000;
    default:
      throw new Error(`Unknown timeout unit: ${unit}`);
  }
}

/**
 * Spawns `command` without a shell and collects its output.
 *
 * On timeout or abort the result settles right away with `timedOut` or
 * `aborted` set; the child gets SIGTERM, then SIGKILL if it lingers.
 * Spawn failures (e.g. ENOENT) reject.
 */
export function spawnWithTimeout(
  command: string,
  args: string[],
  options: {
    timeoutMs?: number;
    cwd?: string;
    env?: NodeJS.ProcessEnv;
    signal?: AbortSignal;
  } = {},
): { process: ChildProcess; result: Promise<SpawnResult> } {
  const child = spawn(command, args, {
    cwd: options.cwd,
    env: options.env ?? process.env,
    stdio: ["ignore", "pipe", "pipe"],
  });

  let timer: ReturnType<typeof setTimeout> | undefined;
  let settled = false;

  const result = new Promise<SpawnResult>((resolve, reject) => {
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];

    child.stdout?.on("data", (chunk: Buffer) => stdoutChunks.push(chunk));
    child.stderr?.on("data", (chunk: Buffer) => stderrChunks.push(chunk));

    const collect = (): { stdout: string; stderr: string } => ({
      stdout: Buffer.concat(stdoutChunks).toString("utf-8"),
      stderr: Buffer.concat(stderrChunks).toString("utf-8"),
    });

    const terminate = (): void => {
      child.kill("SIGTERM");
      const forceKill = setTimeout(() => {
        if (child.exitCode === null && child.signalCode === null) {
          child.kill("SIGKILL");
        }
      }, FORCE_KILL_AFTER_MS);
      forceKill.unref();
    };

    const finish = (outcome: SpawnResult): void => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      options.signal?.removeEventListener("abort", onAbort);
      resolve(outcome);
    };

    const onAbort = (): void => {
      terminate();
      finish({ ...collect(), exitCode: null, signal: null, timedOut: false, aborted: true });
    };

    if (options.signal?.aborted) {
      onAbort();
      return;
    }
    options.signal?.addEventListener("abort", onAbort, { once: true });

    if (options.timeoutMs) {
      timer = setTimeout(() => {
        terminate();
        finish({ ...collect(), exitCode: null, signal: null, timedOut: true, aborted: false });
      }, options.timeoutMs);
    }

    child.on("close", (exitCode, signal) => {
      finish({ ...collect(), exitCode, signal, timedOut: false, aborted: false });
    });

    child.on("error", (err) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      options.signal?.removeEventListener("abort", onAbort);
      reject(err);
    });
  });

  return { process: child, result };
}
