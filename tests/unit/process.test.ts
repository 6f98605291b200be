import { describe, it, expect } from "vitest";
import { parseTimeout, spawnWithTimeout } from "../../src/utils/process.js";

describe("parseTimeout", () => {
  it("parses milliseconds", () => {
    expect(parseTimeout("500ms")).toBe(500);
  });

  it("parses seconds", () => {
    expect(parseTimeout("10s")).toBe(10000);
  });

  it("parses minutes", () => {
    expect(parseTimeout("2m")).toBe(120000);
  });

  it("parses hours", () => {
    expect(parseTimeout("1h")).toBe(3600000);
  });

  it("throws on invalid format", () => {
    expect(() => parseTimeout("30")).toThrow("Invalid timeout format");
    expect(() => parseTimeout("abc")).toThrow("Invalid timeout format");
    expect(() => parseTimeout("")).toThrow("Invalid timeout format");
  });
});

describe("spawnWithTimeout", () => {
  it("runs a simple command", async () => {
    const { result } = spawnWithTimeout("node", ["-e", "console.log('hello')"]);
    const res = await result;
    expect(res.stdout.trim()).toBe("hello");
    expect(res.exitCode).toBe(0);
    expect(res.timedOut).toBe(false);
    expect(res.aborted).toBe(false);
  });

  it("captures stderr", async () => {
    const { result } = spawnWithTimeout("node", ["-e", "console.error('err')"]);
    const res = await result;
    expect(res.stderr.trim()).toBe("err");
    expect(res.exitCode).toBe(0);
  });

  it("returns non-zero exit code", async () => {
    const { result } = spawnWithTimeout("node", ["-e", "process.exit(42)"]);
    const res = await result;
    expect(res.exitCode).toBe(42);
  });

  it("settles as soon as the timeout fires", async () => {
    const started = Date.now();
    const { result } = spawnWithTimeout(
      "node",
      ["-e", "setTimeout(() => {}, 10000)"],
      { timeoutMs: 200 },
    );
    const res = await result;
    expect(res.timedOut).toBe(true);
    expect(res.exitCode).toBeNull();
    expect(Date.now() - started).toBeLessThan(5000);
  });

  it("settles with aborted=true when the signal fires", async () => {
    const controller = new AbortController();
    const { result } = spawnWithTimeout(
      "node",
      ["-e", "setTimeout(() => {}, 10000)"],
      { signal: controller.signal },
    );
    setTimeout(() => controller.abort(), 100);
    const res = await result;
    expect(res.aborted).toBe(true);
    expect(res.timedOut).toBe(false);
  });

  it("rejects when the executable does not exist", async () => {
    const { result } = spawnWithTimeout("repo-check-no-such-binary", []);
    await expect(result).rejects.toMatchObject({ code: "ENOENT" });
  });
});
