/**
 * SQLite store implementation using better-sqlite3.
 *
 * Holds the interaction log (runs → iterations → agent_responses) and the
 * named consortiums. JSON columns are validated with zod on the way out;
 * a row that fails validation is skipped and logged, never returned.
 */

import Database from "better-sqlite3";
import { z } from "zod";
import type { IStore } from "./interfaces.js";
import {
  ConsortiumPresetSchema,
  isValidConsortiumName,
  type ConsortiumPreset,
  type RunDetail,
  type RunFinish,
  type RunStart,
  type RunSummary,
  type SavedConsortium,
} from "./types.js";
import type { AgentResponse, IterationRecord, OrchestrationConfig } from "../consortium/types.js";
import { OrchestrationConfigSchema } from "../consortium/config.js";
import { ConfigurationError } from "../errors.js";
import { createLogger } from "../logger.js";

const log = createLogger("store");

function now(): string {
  return new Date().toISOString();
}

// --- Row schemas ---

const RunStatusSchema = z.enum(["running", "completed", "failed", "cancelled"]);

const RunRowSchema = z.object({
  id: z.string(),
  query: z.string(),
  config: z.string(),
  status: RunStatusSchema,
  final_round: z.number().nullable(),
  confidence: z.number().nullable(),
  synthesis: z.string().nullable(),
  error_kind: z.string().nullable(),
  error: z.string().nullable(),
  started_at: z.string(),
  finished_at: z.string().nullable(),
  rounds: z.number(),
});

const IterationRowSchema = z.object({
  round: z.number(),
  prompt: z.string(),
  synthesis: z.string(),
});

const ResponseRowSchema = z.object({
  round: z.number(),
  agent: z.string(),
  instance: z.number(),
  reasoning: z.string().nullable(),
  answer: z.string(),
  confidence: z.number().nullable(),
  raw: z.string(),
  duration_ms: z.number(),
  error: z.string().nullable(),
});

const ConsortiumRowSchema = z.object({
  name: z.string(),
  preset: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
});

const TokenUsageSchema = z.object({
  inputTokens: z.number(),
  outputTokens: z.number(),
  costUsd: z.number().optional(),
});

const TaskFailureSchema = z.object({
  agent: z.string(),
  instance: z.number(),
  kind: z.enum(["timeout", "transport", "provider", "cancelled"]),
  message: z.string(),
});

const ResponseExtraSchema = z.object({
  tokens: TokenUsageSchema.optional(),
  failure: TaskFailureSchema.optional(),
});

const SynthesisSchema = z.object({
  synthesis: z.string(),
  confidence: z.number(),
  analysis: z.string(),
  needsIteration: z.boolean(),
  refinementAreas: z.array(z.string()),
  dissent: z.string(),
  raw: z.string(),
  chosenResponseId: z.number().optional(),
  ranking: z.array(z.number()).optional(),
});

/** Parse a JSON column; undefined on malformed JSON or a schema mismatch. */
function parseJson<T extends z.ZodTypeAny>(schema: T, text: string): z.output<T> | undefined {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return undefined;
  }
  const parsed = schema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

function storedConfig(text: string): OrchestrationConfig | undefined {
  const config = parseJson(OrchestrationConfigSchema, text);
  if (!config) return undefined;
  const { systemPrompt, agentTimeoutMs, ...rest } = config;
  return {
    ...rest,
    ...(systemPrompt !== undefined ? { systemPrompt } : {}),
    ...(agentTimeoutMs !== undefined ? { agentTimeoutMs } : {}),
  };
}

function toSummary(row: z.infer<typeof RunRowSchema>): RunSummary {
  return {
    id: row.id,
    query: row.query,
    status: row.status,
    rounds: row.rounds,
    confidence: row.confidence,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
  };
}

function toResponse(row: z.infer<typeof ResponseRowSchema>, extra: z.infer<typeof ResponseExtraSchema>): AgentResponse {
  return {
    agent: row.agent,
    instance: row.instance,
    ...(row.reasoning !== null ? { reasoning: row.reasoning } : {}),
    answer: row.answer,
    ...(row.confidence !== null ? { confidence: row.confidence } : {}),
    raw: row.raw,
    durationMs: row.duration_ms,
    ...(extra.tokens ? { tokens: extra.tokens } : {}),
    ...(extra.failure ? { error: extra.failure } : {}),
  };
}

const RUN_COLUMNS = `
  r.id, r.query, r.config, r.status, r.final_round, r.confidence, r.synthesis,
  r.error_kind, r.error, r.started_at, r.finished_at,
  (SELECT COUNT(*) FROM iterations i WHERE i.run_id = r.id) AS rounds`;

export class SqliteStore implements IStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
  }

  async initialize(): Promise<void> {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        id TEXT PRIMARY KEY,
        query TEXT NOT NULL,
        config TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'running',
        final_round INTEGER,
        confidence REAL,
        synthesis TEXT,
        error_kind TEXT,
        error TEXT,
        tokens TEXT,
        started_at TEXT NOT NULL,
        finished_at TEXT
      );
      CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at);

      CREATE TABLE IF NOT EXISTS iterations (
        run_id TEXT NOT NULL,
        round INTEGER NOT NULL,
        prompt TEXT NOT NULL,
        synthesis TEXT NOT NULL,
        confidence REAL NOT NULL,
        created_at TEXT NOT NULL,
        PRIMARY KEY (run_id, round),
        FOREIGN KEY (run_id) REFERENCES runs(id) ON DELETE CASCADE
      );

      CREATE TABLE IF NOT EXISTS agent_responses (
        run_id TEXT NOT NULL,
        round INTEGER NOT NULL,
        agent TEXT NOT NULL,
        instance INTEGER NOT NULL,
        reasoning TEXT,
        answer TEXT NOT NULL,
        confidence REAL,
        raw TEXT NOT NULL,
        duration_ms INTEGER NOT NULL,
        error TEXT,
        extra TEXT NOT NULL DEFAULT '{}',
        PRIMARY KEY (run_id, round, agent, instance),
        FOREIGN KEY (run_id, round) REFERENCES iterations(run_id, round) ON DELETE CASCADE
      );

      CREATE TABLE IF NOT EXISTS consortiums (
        name TEXT PRIMARY KEY,
        preset TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
    `);
  }

  async close(): Promise<void> {
    this.db.close();
  }

  // --- Interaction log ---

  async beginRun(run: RunStart): Promise<void> {
    this.db.prepare(
      "INSERT INTO runs (id, query, config, status, started_at) VALUES (?, ?, ?, 'running', ?)"
    ).run(run.id, run.query, JSON.stringify(run.config), run.startedAt);
  }

  async append(runId: string, record: IterationRecord): Promise<void> {
    const insertIteration = this.db.prepare(
      "INSERT INTO iterations (run_id, round, prompt, synthesis, confidence, created_at) VALUES (?, ?, ?, ?, ?, ?)"
    );
    const insertResponse = this.db.prepare(`
      INSERT INTO agent_responses
        (run_id, round, agent, instance, reasoning, answer, confidence, raw, duration_ms, error, extra)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const tx = this.db.transaction(() => {
      insertIteration.run(
        runId, record.round, record.prompt,
        JSON.stringify(record.synthesis), record.synthesis.confidence, now()
      );
      for (const r of record.responses) {
        insertResponse.run(
          runId, record.round, r.agent, r.instance,
          r.reasoning ?? null, r.answer, r.confidence ?? null, r.raw, r.durationMs,
          r.error ? `${r.error.kind}: ${r.error.message}` : null,
          JSON.stringify({ tokens: r.tokens, failure: r.error })
        );
      }
    });
    tx();
  }

  async finishRun(runId: string, outcome: RunFinish): Promise<void> {
    const result = this.db.prepare(`
      UPDATE runs
      SET status = ?, final_round = ?, confidence = ?, synthesis = ?,
          error_kind = ?, error = ?, tokens = ?, finished_at = ?
      WHERE id = ?
    `).run(
      outcome.status,
      outcome.finalRound ?? null,
      outcome.confidence ?? null,
      outcome.synthesis ?? null,
      outcome.errorKind ?? null,
      outcome.error ?? null,
      outcome.tokens ? JSON.stringify(outcome.tokens) : null,
      outcome.finishedAt,
      runId
    );
    if (result.changes === 0) {
      throw new Error(`finishRun: unknown run "${runId}"`);
    }
  }

  // --- Run reader ---

  async listRuns(limit = 20): Promise<RunSummary[]> {
    const rows = this.db.prepare(
      `SELECT ${RUN_COLUMNS} FROM runs r ORDER BY r.started_at DESC, r.rowid DESC LIMIT ?`
    ).all(limit);

    const runs: RunSummary[] = [];
    for (const row of rows) {
      const parsed = RunRowSchema.safeParse(row);
      if (!parsed.success) {
        log.error("skipping malformed run row:", parsed.error.issues[0]?.message ?? "invalid");
        continue;
      }
      runs.push(toSummary(parsed.data));
    }
    return runs;
  }

  async getRun(id: string): Promise<RunDetail | null> {
    const parsed = RunRowSchema.safeParse(
      this.db.prepare(`SELECT ${RUN_COLUMNS} FROM runs r WHERE r.id = ?`).get(id)
    );
    if (!parsed.success) return null;
    const row = parsed.data;

    const config = storedConfig(row.config);
    if (!config) {
      log.error(`run ${id}: stored config is invalid, skipping`);
      return null;
    }

    const responsesByRound = new Map<number, AgentResponse[]>();
    const responseRows = this.db.prepare(
      "SELECT round, agent, instance, reasoning, answer, confidence, raw, duration_ms, error, extra FROM agent_responses WHERE run_id = ? ORDER BY round, rowid"
    ).all(id);
    for (const raw of responseRows) {
      const r = ResponseRowSchema.extend({ extra: z.string() }).safeParse(raw);
      if (!r.success) {
        log.error(`run ${id}: skipping malformed response row`);
        continue;
      }
      const extra = parseJson(ResponseExtraSchema, r.data.extra) ?? {};
      const list = responsesByRound.get(r.data.round) ?? [];
      list.push(toResponse(r.data, extra));
      responsesByRound.set(r.data.round, list);
    }

    const iterations: IterationRecord[] = [];
    const iterationRows = this.db.prepare(
      "SELECT round, prompt, synthesis FROM iterations WHERE run_id = ? ORDER BY round"
    ).all(id);
    for (const raw of iterationRows) {
      const it = IterationRowSchema.safeParse(raw);
      const synthesis = it.success ? parseJson(SynthesisSchema, it.data.synthesis) : undefined;
      if (!it.success || !synthesis) {
        log.error(`run ${id}: skipping malformed iteration row`);
        continue;
      }
      iterations.push({
        round: it.data.round,
        prompt: it.data.prompt,
        responses: responsesByRound.get(it.data.round) ?? [],
        synthesis,
      });
    }

    return {
      ...toSummary(row),
      config,
      synthesis: row.synthesis,
      finalRound: row.final_round,
      errorKind: row.error_kind,
      error: row.error,
      iterations,
    };
  }

  // --- Named consortiums ---

  async saveConsortium(name: string, preset: ConsortiumPreset): Promise<SavedConsortium> {
    if (!isValidConsortiumName(name)) {
      throw new ConfigurationError(`Invalid consortium name: "${name}". Use letters, digits, ".", "_" or "-" (max 64 chars).`);
    }
    const checked = ConsortiumPresetSchema.safeParse(preset);
    if (!checked.success) {
      throw new ConfigurationError(checked.error.issues.map((i) => `${i.path.join(".") || "preset"}: ${i.message}`));
    }

    const ts = now();
    this.db.prepare(`
      INSERT INTO consortiums (name, preset, created_at, updated_at) VALUES (?, ?, ?, ?)
      ON CONFLICT(name) DO UPDATE SET preset = excluded.preset, updated_at = excluded.updated_at
    `).run(name, JSON.stringify(checked.data), ts, ts);

    const saved = await this.getConsortium(name);
    if (!saved) throw new Error(`saveConsortium: "${name}" not readable after write`);
    return saved;
  }

  private toSaved(raw: unknown): SavedConsortium | null {
    const row = ConsortiumRowSchema.safeParse(raw);
    if (!row.success) {
      log.error("skipping malformed consortium row");
      return null;
    }
    const preset = parseJson(ConsortiumPresetSchema, row.data.preset);
    if (!preset) {
      log.error(`consortium "${row.data.name}": stored preset is invalid, skipping`);
      return null;
    }
    return { name: row.data.name, preset, createdAt: row.data.created_at, updatedAt: row.data.updated_at };
  }

  async getConsortium(name: string): Promise<SavedConsortium | null> {
    const row = this.db.prepare("SELECT name, preset, created_at, updated_at FROM consortiums WHERE name = ?").get(name);
    return row === undefined ? null : this.toSaved(row);
  }

  async listConsortiums(): Promise<SavedConsortium[]> {
    const rows = this.db.prepare("SELECT name, preset, created_at, updated_at FROM consortiums ORDER BY name").all();
    return rows.flatMap((row) => {
      const saved = this.toSaved(row);
      return saved ? [saved] : [];
    });
  }

  async removeConsortium(name: string): Promise<boolean> {
    return this.db.prepare("DELETE FROM consortiums WHERE name = ?").run(name).changes > 0;
  }
}
