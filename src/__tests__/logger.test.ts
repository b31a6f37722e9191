import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, readFileSync, readdirSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  setLogLevel,
  getLogLevel,
  isLogLevel,
  truncate,
  isValidRunId,
  createRunLog,
  createLogger,
  initFileLogging,
  disableFileLogging,
} from "../logger.js";

describe("setLogLevel / getLogLevel", () => {
  afterEach(() => setLogLevel("warn")); // reset

  it("defaults to warn", () => {
    setLogLevel("warn");
    expect(getLogLevel()).toBe("warn");
  });

  it("can set to debug", () => {
    setLogLevel("debug");
    expect(getLogLevel()).toBe("debug");
  });

  it("can set to error", () => {
    setLogLevel("error");
    expect(getLogLevel()).toBe("error");
  });
});

describe("isLogLevel", () => {
  it("accepts the four levels only", () => {
    expect(["error", "warn", "info", "debug"].every(isLogLevel)).toBe(true);
    expect(isLogLevel("trace")).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});

describe("truncate", () => {
  it("returns short strings unchanged", () => {
    expect(truncate("hello", 500)).toBe("hello");
  });

  it("truncates long strings with char count", () => {
    const long = "a".repeat(600);
    const result = truncate(long, 500);
    expect(result.length).toBeLessThan(600);
    expect(result).toContain("600 chars total");
  });

  it("respects custom maxLen", () => {
    const result = truncate("abcdef", 3);
    expect(result).toBe("abc... (6 chars total)");
  });
});

describe("isValidRunId", () => {
  it("accepts uuids and simple ids", () => {
    expect(isValidRunId("3f0c2a9e-1b2c-4d5e-8f90-0123456789ab")).toBe(true);
    expect(isValidRunId("run_1")).toBe(true);
  });

  it("rejects path separators, empty and overlong ids", () => {
    expect(isValidRunId("../x")).toBe(false);
    expect(isValidRunId("")).toBe(false);
    expect(isValidRunId("a".repeat(129))).toBe(false);
  });
});

describe("file logging", () => {
  let dir: string | null = null;

  afterEach(() => {
    disableFileLogging();
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  it("creates no run log until file logging is initialized", () => {
    expect(createRunLog("run-1")).toBeNull();
  });

  it("writes a per-run log under logs/runs", () => {
    dir = mkdtempSync(join(tmpdir(), "consortium-test-"));
    initFileLogging(dir);

    const runLog = createRunLog("run-1");
    runLog?.write("info", "round 1 complete");

    expect(runLog?.path).toBe(join(dir, "logs", "runs", "run-1.log"));
    expect(readFileSync(join(dir, "logs", "runs", "run-1.log"), "utf-8")).toContain("round 1 complete");
  });

  it("rejects an unsafe run id", () => {
    dir = mkdtempSync(join(tmpdir(), "consortium-test-"));
    initFileLogging(dir);
    expect(createRunLog("../escape")).toBeNull();
  });

  it("appends info and above to info.log", () => {
    dir = mkdtempSync(join(tmpdir(), "consortium-test-"));
    initFileLogging(dir);

    const log = createLogger("test");
    log.info("visible line");
    log.debug("hidden line");

    const content = readFileSync(join(dir, "logs", "info.log"), "utf-8");
    expect(content).toContain("[test] visible line");
    expect(content).not.toContain("hidden line");
  });

  it("purges old run logs beyond maxFiles on init", () => {
    dir = mkdtempSync(join(tmpdir(), "consortium-test-"));
    initFileLogging(dir);
    for (const id of ["a", "b", "c"]) createRunLog(id)?.write("info", id);

    initFileLogging(dir, { runs: { purge: "count", maxFiles: 1 } });

    expect(readdirSync(join(dir, "logs", "runs"))).toHaveLength(1);
  });
});
