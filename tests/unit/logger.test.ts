import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { Logger } from "../../src/core/logger.js";

describe("Logger", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "repo-check-log-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("writes JSON lines to stderr at or above the minimum level", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = new Logger({ minLevel: "warn", stderr: true });

    logger.debug("hidden");
    logger.info("hidden too");
    logger.warn("shown", { path: "/repos/a" });

    expect(spy).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(String(spy.mock.calls[0][0]));
    expect(entry.level).toBe("warn");
    expect(entry.message).toBe("shown");
    expect(entry.data).toEqual({ path: "/repos/a" });
  });

  it("CLI logger shows debug output only when verbose", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});

    Logger.createCliLogger(false).debug("quiet");
    expect(spy).not.toHaveBeenCalled();

    Logger.createCliLogger(true).debug("loud");
    expect(spy).toHaveBeenCalledTimes(1);
  });

  it("appends to the log file, creating its directory", async () => {
    const logFile = path.join(tmpDir, "nested", "scan.log");
    const logger = new Logger({ logFile, minLevel: "debug" });

    logger.info("first");
    logger.error("second");
    await logger.flush();

    const lines = (await fs.readFile(logFile, "utf-8")).trim().split("\n");
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0]).message).toBe("first");
    expect(JSON.parse(lines[1]).level).toBe("error");
  });

  it("disables the file sink after a failed write", async () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    const blocker = path.join(tmpDir, "file");
    await fs.writeFile(blocker, "");
    const logger = new Logger({ logFile: path.join(blocker, "scan.log") });

    logger.info("lost");
    await logger.flush();
    logger.info("also lost");
    await logger.flush();

    expect(spy).toHaveBeenCalledTimes(1);
    expect(String(spy.mock.calls[0][0])).toContain("Log file disabled");
  });

  it("silent logger writes nothing", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = Logger.silent();
    logger.warn("nope");
    logger.error("still nope");
    expect(spy).not.toHaveBeenCalled();
  });
});
