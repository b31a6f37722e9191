import { z } from "zod";
import { readFileSync, existsSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { homedir } from "node:os";

// --- Schemas ---

export const AgentConfigSchema = z.object({
  /** Identifier used in rosters ("-m name:2") and as the arbiter name. */
  name: z.string().min(1),
  enabled: z.boolean().default(true),
  /** Explicit adapter type. When omitted: `model` → Ollama, `command` → CLI. */
  type: z.enum(["cli", "ollama", "openai-compat"]).optional(),

  // CLI-based agents (claude, etc.)
  command: z.string().optional().describe("CLI command (e.g. 'claude')"),
  args: z.array(z.string()).default([]),

  // HTTP agents (Ollama, OpenAI-compatible)
  model: z.string().optional().describe("Model name (e.g. 'qwen3', 'gpt-4o-mini')"),
  endpoint: z.string().optional().describe("HTTP API endpoint; each adapter has its own default"),
  apiKey: z.string().optional(),
  /** Name of an environment variable holding the API key. */
  apiKeyEnv: z.string().optional(),
});

export const JudgingMethodSchema = z.enum(["default", "pick-one", "rank"]);
export const RetentionPolicySchema = z.enum(["last", "best"]);

export const ConfigSchema = z.object({
  /** User identifier. Determines the data directory: data/<user>/. */
  user: z.string().default("default"),

  agents: z.array(AgentConfigSchema).default([
    {
      name: "claude",
      type: "cli",
      command: "claude",
      args: ["-p", "--output-format", "json"],
      enabled: true,
    },
    {
      name: "qwen",
      type: "ollama",
      model: "qwen3",
      endpoint: "http://localhost:11434",
      enabled: false,
    },
  ]),

  /** Defaults for `consortium run` when flags are omitted. */
  consortium: z
    .object({
      /** Roster entries, "name" or "name:count". Empty = every enabled agent once. */
      models: z.array(z.string()).default([]),
      arbiter: z.string().default("claude"),
      confidenceThreshold: z.number().min(0).max(1).default(0.8),
      minIterations: z.number().int().min(1).default(1),
      maxIterations: z.number().int().min(1).default(3),
      judgingMethod: JudgingMethodSchema.default("default"),
      retention: RetentionPolicySchema.default("last"),
      /** Per-invocation timeout. Omitted = adapter estimate from prompt size. */
      agentTimeoutMs: z.number().int().positive().optional(),
    })
    .default({}),

  /** Retry policy for retryable provider errors (rate limits). Applied by the agent registry. */
  retry: z
    .object({
      maxAttempts: z.number().int().min(1).default(3),
      baseMs: z.number().int().min(0).default(1000),
      maxMs: z.number().int().min(0).default(30_000),
    })
    .default({}),

  database: z
    .object({
      path: z.string().default("./data/consortium.db"),
    })
    .default({}),

  logging: z
    .object({
      /** info.log purge config (global event log) */
      info: z.object({
        purge: z.enum(["date", "size"]).default("date"),
        maxDays: z.number().int().min(1).default(30),
        maxBytes: z.number().int().min(0).default(50 * 1024 * 1024),
      }).default({}),
      /** Per-run debug log purge config (data/logs/runs/) */
      runs: z.object({
        purge: z.enum(["count", "date", "size"]).default("count"),
        maxFiles: z.number().int().min(1).default(50),
        maxDays: z.number().int().min(1).default(14),
        maxBytes: z.number().int().min(0).default(100 * 1024 * 1024),
      }).default({}),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type JudgingMethod = z.infer<typeof JudgingMethodSchema>;
export type RetentionPolicy = z.infer<typeof RetentionPolicySchema>;

/** Directory where the loaded config file was found (null if defaults used). */
let loadedConfigDir: string | null = null;

/** Reset loadedConfigDir to null. Exported for testing only. */
export function resetLoadedConfigDir(): void {
  loadedConfigDir = null;
}

/**
 * Base data directory for a user.
 * - If a config file was loaded: resolves relative to its directory → <configDir>/data/<user>/
 * - Otherwise: uses XDG_DATA_HOME/consortium/<user> (fallback ~/.local/share/consortium/<user>)
 */
export function getUserDataDir(config: Config): string {
  if (loadedConfigDir) {
    return resolve(loadedConfigDir, "data", config.user);
  }
  const xdg = process.env.XDG_DATA_HOME || resolve(homedir(), ".local", "share");
  return resolve(xdg, "consortium", config.user);
}

/**
 * Database path, resolved against the config file's directory when one was loaded.
 */
export function getDatabasePath(config: Config): string {
  if (loadedConfigDir) return resolve(loadedConfigDir, config.database.path);
  return resolve(getUserDataDir(config), "consortium.db");
}

/** API key for an HTTP agent: inline value first, then the named environment variable. */
export function resolveApiKey(agent: AgentConfig): string | undefined {
  if (agent.apiKey) return agent.apiKey;
  if (agent.apiKeyEnv) return process.env[agent.apiKeyEnv] || undefined;
  return undefined;
}

// --- Loader ---

export const CONFIG_FILENAMES = ["consortium.config.json", ".consortiumrc.json"];

function parseConfigFile(path: string): Config {
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  return ConfigSchema.parse(raw);
}

export function loadConfig(explicitPath?: string): Config {
  if (explicitPath) {
    loadedConfigDir = dirname(resolve(explicitPath));
    return parseConfigFile(explicitPath);
  }

  for (const filename of CONFIG_FILENAMES) {
    const fullPath = resolve(process.cwd(), filename);
    if (existsSync(fullPath)) {
      loadedConfigDir = dirname(fullPath);
      return parseConfigFile(fullPath);
    }
  }

  // No config file found — use defaults (XDG path via getUserDataDir)
  loadedConfigDir = null;
  return ConfigSchema.parse({});
}
