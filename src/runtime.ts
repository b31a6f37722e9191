/**
 * Wiring shared by the CLI and the MCP server: config → registry, presets
 * → orchestration configs, and the SQLite store.
 */

import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { Config } from "./config.js";
import { getDatabasePath } from "./config.js";
import { AgentRegistry, createAdapter } from "./adapters/index.js";
import type { OrchestrationConfigInput } from "./consortium/config.js";
import { parseRoster } from "./consortium/roster.js";
import { SqliteStore } from "./store/sqlite.js";
import type { ConsortiumPreset } from "./store/types.js";
import { ConfigurationError } from "./errors.js";

/** Every configured agent, enabled or not: a roster may name any of them. */
export function buildRegistry(config: Config): AgentRegistry {
  return new AgentRegistry(config.agents.map(createAdapter), config.retry);
}

/** Roster used when none is given: `consortium.models`, else every enabled agent once. */
export function defaultModels(config: Config): string[] {
  if (config.consortium.models.length > 0) return config.consortium.models;
  return config.agents.filter((a) => a.enabled).map((a) => a.name);
}

/**
 * Preset built from config defaults, then each layer in turn (e.g. a saved
 * consortium, then flags). Undefined fields in a layer are skipped.
 */
export function resolvePreset(config: Config, ...layers: Partial<ConsortiumPreset>[]): ConsortiumPreset {
  const c = config.consortium;
  const merged: ConsortiumPreset = {
    models: defaultModels(config),
    arbiter: c.arbiter,
    confidenceThreshold: c.confidenceThreshold,
    minIterations: c.minIterations,
    maxIterations: c.maxIterations,
    judgingMethod: c.judgingMethod,
    retention: c.retention,
    ...(c.agentTimeoutMs !== undefined ? { agentTimeoutMs: c.agentTimeoutMs } : {}),
  };
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) Object.assign(merged, { [key]: value });
    }
  }
  return merged;
}

export function presetToConfig(preset: ConsortiumPreset, defaultCount = 1): OrchestrationConfigInput {
  return {
    roster: parseRoster(preset.models, defaultCount),
    arbiter: preset.arbiter,
    confidenceThreshold: preset.confidenceThreshold,
    minIterations: preset.minIterations,
    maxIterations: preset.maxIterations,
    judgingMethod: preset.judgingMethod,
    retention: preset.retention,
    ...(preset.systemPrompt !== undefined ? { systemPrompt: preset.systemPrompt } : {}),
    ...(preset.agentTimeoutMs !== undefined ? { agentTimeoutMs: preset.agentTimeoutMs } : {}),
  };
}

/** Throw a ConfigurationError for every roster or arbiter name the registry doesn't know. */
export function assertAgentsKnown(registry: AgentRegistry, config: OrchestrationConfigInput): void {
  if (config.roster.length === 0) {
    throw new ConfigurationError("Roster is empty: at least one agent is required");
  }
  registry.assertKnown([...config.roster.map((s) => s.identifier), config.arbiter]);
}

export async function openStore(config: Config): Promise<SqliteStore> {
  const dbPath = getDatabasePath(config);
  mkdirSync(dirname(dbPath), { recursive: true });
  const store = new SqliteStore(dbPath);
  await store.initialize();
  return store;
}
