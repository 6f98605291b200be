import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { spawnWithTimeout } from "../../src/utils/process.js";

describe("repo-check CLI", () => {
  let tmpDir: string;
  const bin = path.resolve("bin/repo-check.ts");
  const tsx = path.resolve("node_modules/.bin/tsx");

  function run(args: string[]): Promise<{ stdout: string; stderr: string; exitCode: number | null }> {
    const { result } = spawnWithTimeout(tsx, [bin, ...args], {
      timeoutMs: 15000,
      cwd: tmpDir,
    });
    return result;
  }

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "repo-check-cli-"));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("exits non-zero for a missing root without per-folder output", async () => {
    const res = await run(["--path", "does-not-exist", "--no-color"]);

    expect(res.exitCode).toBe(1);
    expect(res.stdout).toBe("");
    expect(res.stderr).toContain("does not exist");
  });

  it("reports an empty directory", async () => {
    const res = await run(["--no-color"]);

    expect(res.exitCode).toBe(0);
    expect(res.stdout).toBe("No subfolders found.\n");
  });

  it("rejects an invalid worker count", async () => {
    const res = await run(["--max-workers", "0", "--no-color"]);

    expect(res.exitCode).toBe(1);
    expect(res.stderr).toContain("max_workers: must be at least 1");
  });

  it("prints usage with --help", async () => {
    const res = await run(["--help"]);

    expect(res.exitCode).toBe(0);
    expect(res.stdout).toContain("Usage: repo-check [options]");
    expect(res.stdout).toContain("--max-workers <n>");
  });
});
