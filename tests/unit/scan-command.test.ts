import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import {
  executeScan,
  EXIT_OK,
  EXIT_FATAL,
  type ScanCommandDependencies,
} from "../../src/cli/commands/scan.js";
import { Logger } from "../../src/core/logger.js";
import type { Inspect } from "../../src/core/types.js";

function sink() {
  const chunks: string[] = [];
  return { chunks, write: (chunk: string) => chunks.push(chunk), text: () => chunks.join("") };
}

describe("executeScan", () => {
  let tmpDir: string;
  let out: ReturnType<typeof sink>;
  let err: ReturnType<typeof sink>;
  let deps: ScanCommandDependencies;

  const inspect: Inspect = async (candidate) =>
    candidate.name === "app"
      ? { kind: "repo", branch: "main", head: "branch", dirty: false }
      : { kind: "not-a-repo" };

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "repo-check-cmd-"));
    await fs.mkdir(path.join(tmpDir, "app"));
    await fs.mkdir(path.join(tmpDir, "docs"));
    out = sink();
    err = sink();
    deps = {
      inspect,
      out,
      err,
      context: { env: {}, cwd: tmpDir, isTTY: false },
      createLogger: () => Logger.silent(),
    };
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("scans the working directory by default and exits 0", async () => {
    const code = await executeScan({ color: true }, deps);

    expect(code).toBe(EXIT_OK);
    expect(out.text()).toBe("app   main  clean\ndocs  not a git repo\n");
    expect(err.chunks).toEqual([]);
  });

  it("honours --path, --ignore and --max-workers", async () => {
    const code = await executeScan(
      { path: [tmpDir], ignore: ["docs"], maxWorkers: "1", color: false },
      deps,
    );

    expect(code).toBe(EXIT_OK);
    expect(out.text()).toBe("app  main  clean\n");
  });

  it("exits 1 with a single diagnostic for a missing root", async () => {
    const code = await executeScan({ path: ["missing"], color: false }, deps);

    expect(code).toBe(EXIT_FATAL);
    expect(out.chunks).toEqual([]);
    expect(err.chunks).toHaveLength(1);
    expect(err.text()).toContain(`Cannot scan ${path.join(tmpDir, "missing")}: does not exist`);
  });

  it("exits 1 on invalid options", async () => {
    const code = await executeScan({ maxWorkers: "zero", color: false }, deps);

    expect(code).toBe(EXIT_FATAL);
    expect(err.text()).toContain("max_workers: must be a number");
    expect(out.chunks).toEqual([]);
  });

  it("prints a timing line in verbose mode", async () => {
    const code = await executeScan({ verbose: true, color: false }, deps);

    expect(code).toBe(EXIT_OK);
    expect(err.text()).toContain("Scanned 2 folders in ");
  });
});
