/**
 * Minimal logger for the consortium — zero dependencies.
 *
 * Two output channels:
 *  1. stderr (console.error) — controlled by --verbose/--debug/CONSORTIUM_LOG_LEVEL
 *  2. Log files (data/<user>/logs/) — active once initFileLogging() is called
 *     - info.log       : global, info level+, append (one line per event)
 *     - runs/<id>.log  : one per orchestration run, all levels, full prompts/replies
 *
 * Purge strategies (configurable per channel in consortium.config.json):
 *  - info.log : "date" (max days) or "size" (max bytes, truncates oldest lines)
 *  - runs/    : "count" (keep N newest), "date" (max days), or "size" (max total bytes)
 *
 * The MCP server speaks JSON-RPC on stdout, so every log line goes to stderr.
 */

import {
  appendFileSync, readFileSync, writeFileSync,
  mkdirSync, statSync, readdirSync, unlinkSync,
} from "node:fs";
import { join } from "node:path";

export type LogLevel = "error" | "warn" | "info" | "debug";

const LEVELS: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };
const LEVEL_TAGS: Record<LogLevel, string> = { error: "ERR", warn: "WRN", info: "INF", debug: "DBG" };

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(LEVELS, value);
}

// ── stderr level (interactive) ──────────────────────────────────────────

const envLevel = process.env.CONSORTIUM_LOG_LEVEL;
let stderrLevel: number = isLogLevel(envLevel) ? LEVELS[envLevel] : LEVELS.warn;

export function setLogLevel(l: LogLevel): void {
  stderrLevel = LEVELS[l] ?? LEVELS.warn;
}

export function getLogLevel(): LogLevel {
  const levels: LogLevel[] = ["error", "warn", "info", "debug"];
  return levels.find((l) => LEVELS[l] === stderrLevel) ?? "warn";
}

// ── File logging config ─────────────────────────────────────────────────

export interface FileLoggingConfig {
  info?: {
    purge?: "date" | "size";
    maxDays?: number;
    maxBytes?: number;
  };
  runs?: {
    purge?: "count" | "date" | "size";
    maxFiles?: number;
    maxDays?: number;
    maxBytes?: number;
  };
}

interface ResolvedConfig {
  logsDir: string;
  runsDir: string;
  infoLogPath: string;
  info: { purge: "date" | "size"; maxDays: number; maxBytes: number };
  runs: { purge: "count" | "date" | "size"; maxFiles: number; maxDays: number; maxBytes: number };
}

let cfg: ResolvedConfig | null = null;

/**
 * Initialize file logging. Call once at startup.
 * @param userDataDir  Base data directory for the user (e.g. "data/default")
 * @param config       Logging section of consortium.config.json
 */
export function initFileLogging(userDataDir: string, config?: FileLoggingConfig): void {
  const logsDir = join(userDataDir, "logs");
  const runsDir = join(logsDir, "runs");

  cfg = {
    logsDir,
    runsDir,
    infoLogPath: join(logsDir, "info.log"),
    info: {
      purge: config?.info?.purge ?? "date",
      maxDays: config?.info?.maxDays ?? 30,
      maxBytes: config?.info?.maxBytes ?? 50 * 1024 * 1024,
    },
    runs: {
      purge: config?.runs?.purge ?? "count",
      maxFiles: config?.runs?.maxFiles ?? 50,
      maxDays: config?.runs?.maxDays ?? 14,
      maxBytes: config?.runs?.maxBytes ?? 100 * 1024 * 1024,
    },
  };

  mkdirSync(logsDir, { recursive: true });
  mkdirSync(runsDir, { recursive: true });

  purgeInfoLog(cfg);
  purgeRunLogs(cfg);
}

/** Turn file logging off again (tests, or after a temp data dir is removed). */
export function disableFileLogging(): void {
  cfg = null;
}

// ── Formatting ──────────────────────────────────────────────────────────

function ts(): string {
  return new Date().toISOString().slice(11, 23);
}

function fullTs(): string {
  return new Date().toISOString();
}

/** Truncate a string for display. Full content goes to run log files. */
export function truncate(s: string, maxLen = 500): string {
  if (s.length <= maxLen) return s;
  return s.slice(0, maxLen) + `... (${s.length} chars total)`;
}

function formatArgs(args: unknown[]): string {
  return args.map((a) => (typeof a === "string" ? a : JSON.stringify(a))).join(" ");
}

// ── Core log function (stderr + info.log) ───────────────────────────────

const STDERR_MAX_LINE = 800;

function log(level: LogLevel, tag: string, args: unknown[]): void {
  const lvl = LEVELS[level];
  const levelTag = LEVEL_TAGS[level];
  const message = formatArgs(args);

  if (stderrLevel >= lvl) {
    const short = message.length > STDERR_MAX_LINE
      ? message.slice(0, STDERR_MAX_LINE) + `... (${message.length} chars, full in run log)`
      : message;
    console.error(ts(), levelTag, tag, short);
  }

  if (cfg && lvl <= LEVELS.info) {
    const line = `${fullTs()} ${levelTag} ${tag} ${message}\n`;
    try { appendFileSync(cfg.infoLogPath, line); } catch { /* best effort */ }
  }
}

// ── Per-run log ─────────────────────────────────────────────────────────

export interface RunLog {
  /** Write a line to the run log file (with timestamp). */
  write: (level: LogLevel, message: string) => void;
  /** Absolute path to this run's log file. */
  readonly path: string;
}

const SAFE_RUN_ID = /^[a-zA-Z0-9_-]+$/;

/** A run id is used as a file name, so only alphanumerics, hyphens and underscores. */
export function isValidRunId(runId: string): boolean {
  return SAFE_RUN_ID.test(runId) && runId.length <= 128;
}

/**
 * Create a per-run log file: data/<user>/logs/runs/<runId>.log
 * Captures full prompts, agent replies and arbiter output for one orchestration.
 */
export function createRunLog(runId: string): RunLog | null {
  if (!cfg) return null;
  if (!isValidRunId(runId)) {
    log("warn", "[logger]", [`Invalid runId for log file (rejected): ${runId}`]);
    return null;
  }

  const path = join(cfg.runsDir, `${runId}.log`);

  return {
    write(level: LogLevel, message: string): void {
      const line = `${fullTs()} ${LEVEL_TAGS[level]} ${message}\n`;
      try { appendFileSync(path, line); } catch { /* best effort */ }
    },
    path,
  };
}

// ── Purge: info.log ─────────────────────────────────────────────────────

function purgeInfoLog(c: ResolvedConfig): void {
  switch (c.info.purge) {
    case "date": purgeInfoByDate(c.infoLogPath, c.info.maxDays); break;
    case "size": purgeInfoBySize(c.infoLogPath, c.info.maxBytes); break;
  }
}

function purgeInfoByDate(path: string, maxDays: number): void {
  const cutoff = new Date();
  cutoff.setDate(cutoff.getDate() - maxDays);
  const cutoffStr = cutoff.toISOString();

  try {
    const content = readFileSync(path, "utf-8");
    const kept = content.split("\n").filter((line) => {
      const lineTs = line.slice(0, 24);
      return lineTs >= cutoffStr || line.trim() === "";
    });
    writeFileSync(path, kept.join("\n"));
  } catch { /* file doesn't exist yet */ }
}

function purgeInfoBySize(path: string, maxBytes: number): void {
  try {
    const stats = statSync(path);
    if (stats.size <= maxBytes) return;

    const content = readFileSync(path, "utf-8");
    const trimmed = content.slice(content.length - maxBytes);
    const firstNewline = trimmed.indexOf("\n");
    writeFileSync(path, firstNewline >= 0 ? trimmed.slice(firstNewline + 1) : trimmed);
  } catch { /* file doesn't exist yet */ }
}

// ── Purge: run logs ─────────────────────────────────────────────────────

interface RunFileInfo {
  path: string;
  size: number;
  mtimeMs: number;
}

function listRunFiles(runsDir: string): RunFileInfo[] {
  try {
    return readdirSync(runsDir)
      .filter((f) => f.endsWith(".log"))
      .map((name) => {
        const path = join(runsDir, name);
        const stats = statSync(path);
        return { path, size: stats.size, mtimeMs: stats.mtimeMs };
      })
      .sort((a, b) => b.mtimeMs - a.mtimeMs); // newest first
  } catch {
    return [];
  }
}

function purgeRunLogs(c: ResolvedConfig): void {
  const files = listRunFiles(c.runsDir);
  switch (c.runs.purge) {
    case "count":
      for (const file of files.slice(c.runs.maxFiles)) removeQuietly(file.path);
      break;
    case "date": {
      const cutoff = Date.now() - c.runs.maxDays * 24 * 60 * 60 * 1000;
      for (const file of files) {
        if (file.mtimeMs < cutoff) removeQuietly(file.path);
      }
      break;
    }
    case "size": {
      let totalSize = 0;
      for (const file of files) {
        totalSize += file.size;
        if (totalSize > c.runs.maxBytes) removeQuietly(file.path);
      }
      break;
    }
  }
}

function removeQuietly(path: string): void {
  try { unlinkSync(path); } catch { /* best effort */ }
}

// ── Logger factory ──────────────────────────────────────────────────────

export type Logger = ReturnType<typeof createLogger>;

export function createLogger(namespace: string) {
  const tag = `[${namespace}]`;
  return {
    error: (...args: unknown[]) => log("error", tag, args),
    warn:  (...args: unknown[]) => log("warn", tag, args),
    info:  (...args: unknown[]) => log("info", tag, args),
    debug: (...args: unknown[]) => log("debug", tag, args),
  };
}
