import os from "node:os";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { normalizeRoots } from "./paths.js";
import { parseTimeout } from "../utils/process.js";
import type { ScanConfig } from "./types.js";

export const DEFAULT_TIMEOUT = "10s";

/** Largest delay `setTimeout` accepts; longer ones fire after 1ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/** Options as commander hands them over, before validation. */
export interface RawScanOptions {
  path?: string[];
  includeHidden?: boolean;
  ignore?: string[];
  color?: boolean;
  maxWorkers?: string;
  timeout?: string;
  ignoreUntracked?: boolean;
  verbose?: boolean;
  logFile?: string;
}

export interface ResolveContext {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  isTTY?: boolean;
}

const TimeoutSchema = z
  .string()
  .trim()
  .regex(/^\d+(ms|s|m|h)$/, 'must be a duration such as "500ms", "10s" or "1m"')
  .transform((value) => parseTimeout(value))
  .pipe(
    z
      .number()
      .positive("must be greater than zero")
      .max(MAX_TIMEOUT_MS, "must be at most 596h"),
  );

const ScanOptionsSchema = z.object({
  path: z.array(z.string().min(1, "must not be empty")).default([]),
  include_hidden: z.boolean().default(false),
  ignore: z.array(z.string().min(1)).default([]),
  color: z.boolean().default(true),
  max_workers: z.coerce
    .number({ invalid_type_error: "must be a number" })
    .int("must be an integer")
    .positive("must be at least 1")
    .optional(),
  timeout: TimeoutSchema.default(DEFAULT_TIMEOUT),
  ignore_untracked: z.boolean().default(false),
  verbose: z.boolean().default(false),
  log_file: z.string().min(1).optional(),
});

type ParsedScanOptions = z.infer<typeof ScanOptionsSchema>;

export function defaultMaxWorkers(): number {
  return Math.max(1, os.availableParallelism());
}

function envValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value.trim() === "" ? undefined : value;
}

function mapConfig(
  raw: ParsedScanOptions,
  context: Required<ResolveContext>,
): ScanConfig {
  const noColorEnv = envValue(context.env, "NO_COLOR") !== undefined;
  const color = raw.color && !noColorEnv && context.isTTY;
  const roots = normalizeRoots(
    raw.path.length > 0 ? raw.path : [context.cwd],
    context.cwd,
  );

  return {
    roots,
    includeHidden: raw.include_hidden,
    ignore: raw.ignore,
    color,
    live: color,
    maxWorkers: raw.max_workers ?? defaultMaxWorkers(),
    timeoutMs: raw.timeout,
    includeUntracked: !raw.ignore_untracked,
    verbose: raw.verbose,
    logFile: raw.log_file,
  };
}

/**
 * Validates CLI options into a {@link ScanConfig}. Flags win over
 * `REPO_CHECK_MAX_WORKERS` and `REPO_CHECK_TIMEOUT`; `NO_COLOR` turns color off.
 */
export function resolveConfig(
  options: RawScanOptions,
  context: ResolveContext = {},
): ScanConfig {
  const env = context.env ?? process.env;
  const resolved: Required<ResolveContext> = {
    env,
    cwd: context.cwd ?? process.cwd(),
    isTTY: context.isTTY ?? process.stdout.isTTY === true,
  };

  const candidate = {
    path: options.path,
    include_hidden: options.includeHidden,
    ignore: options.ignore,
    color: options.color,
    max_workers: options.maxWorkers ?? envValue(env, "REPO_CHECK_MAX_WORKERS"),
    timeout: options.timeout ?? envValue(env, "REPO_CHECK_TIMEOUT"),
    ignore_untracked: options.ignoreUntracked,
    verbose: options.verbose,
    log_file: options.logFile,
  };

  const result = ScanOptionsSchema.safeParse(candidate);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new ConfigError(`Invalid options:\n${issues}`);
  }

  return mapConfig(result.data, resolved);
}
