/**
 * Consortium MCP Server — stdio transport.
 *
 * Exposes 3 tools: consortium_run, consortium_list, list_agents.
 * Started by `consortium start`.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig, getUserDataDir, type Config } from "./config.js";
import type { AgentRegistry } from "./adapters/index.js";
import { ConsortiumOrchestrator } from "./orchestrator.js";
import type { ConsortiumResult } from "./consortium/types.js";
import type { IConsortiumStore, IInteractionLog } from "./store/interfaces.js";
import type { ConsortiumPreset } from "./store/types.js";
import { ConsortiumError } from "./errors.js";
import { buildRegistry, resolvePreset, presetToConfig, assertAgentsKnown, openStore } from "./runtime.js";
import { createLogger, initFileLogging, truncate } from "./logger.js";
import {
  ConsortiumRunInputSchema,
  ConsortiumListInputSchema,
  ListAgentsInputSchema,
  type ConsortiumRunInput,
} from "./tools.js";

const log = createLogger("server");

const VERSION = "0.4.0";

export interface ServerContext {
  config: Config;
  registry: AgentRegistry;
  store?: IInteractionLog & IConsortiumStore;
}

interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

function text(value: string, isError = false): ToolResult {
  return { content: [{ type: "text" as const, text: value }], ...(isError ? { isError } : {}) };
}

export function formatRunResult(result: ConsortiumResult, includeHistory: boolean): string {
  const totalTokens = result.tokens.total.inputTokens + result.tokens.total.outputTokens;
  const lines = [
    `**Synthesis** (confidence: ${result.confidence.toFixed(2)}, round ${result.finalRound} of ${result.iterations.length})`,
    "",
    result.synthesis,
  ];
  if (result.analysis) lines.push("", "**Analysis:**", result.analysis);
  if (result.dissent) lines.push("", "**Dissent:**", result.dissent);
  if (includeHistory) {
    for (const it of result.iterations) {
      lines.push("", `--- Round ${it.round} (confidence ${it.synthesis.confidence.toFixed(2)}) ---`);
      for (const r of it.responses) {
        lines.push(r.error
          ? `[${r.agent}#${r.instance}] failed (${r.error.kind}): ${r.error.message}`
          : `[${r.agent}#${r.instance}] (confidence: ${r.confidence?.toFixed(2) ?? "n/a"})\n${r.answer}`);
      }
    }
  }
  lines.push("", `---\nRun ${result.runId} | ${result.iterations.length} rounds | ${(result.durationMs / 1000).toFixed(1)}s | Tokens: ${totalTokens}`);
  return lines.join("\n");
}

/** `signal` is the MCP request's own; a client cancel aborts the run. */
export async function handleConsortiumRun(args: ConsortiumRunInput, ctx: ServerContext, signal?: AbortSignal): Promise<ToolResult> {
  log.debug("consortium_run invoked:", truncate(JSON.stringify(args), 300));
  try {
    let base: Partial<ConsortiumPreset> = {};
    if (args.consortium) {
      const saved = await ctx.store?.getConsortium(args.consortium);
      if (!saved) return text(`Unknown consortium: "${args.consortium}"`, true);
      base = saved.preset;
    }

    const preset = resolvePreset(ctx.config, base, {
      models: args.models,
      arbiter: args.arbiter,
      confidenceThreshold: args.confidence_threshold,
      minIterations: args.min_iterations,
      maxIterations: args.max_iterations,
      systemPrompt: args.system_prompt,
      judgingMethod: args.judging_method,
      retention: args.retention,
    });
    const input = presetToConfig(preset);
    assertAgentsKnown(ctx.registry, input);

    const orchestrator = new ConsortiumOrchestrator(input, {
      invoker: ctx.registry,
      interactionLog: ctx.store,
    });
    const result = await orchestrator.orchestrate(args.prompt, { signal });
    log.info("consortium_run done:", result.runId, `confidence=${result.confidence.toFixed(2)}`);
    return text(formatRunResult(result, args.include_history));
  } catch (err) {
    if (err instanceof ConsortiumError) {
      log.warn("consortium_run failed:", err.kind, err.message);
      return text(`Error (${err.kind}): ${err.message}`, true);
    }
    throw err;
  }
}

export async function handleConsortiumList(ctx: ServerContext): Promise<ToolResult> {
  const saved = (await ctx.store?.listConsortiums()) ?? [];
  return text(JSON.stringify(saved.map((s) => ({ name: s.name, ...s.preset, updatedAt: s.updatedAt })), null, 2));
}

export async function handleListAgents(ctx: ServerContext): Promise<ToolResult> {
  const agents = await Promise.all(ctx.config.agents.map(async (a) => ({
    name: a.name,
    type: a.type ?? (a.model ? "ollama" : "cli"),
    model: a.model,
    command: a.command,
    enabled: a.enabled,
    available: (await ctx.registry.get(a.name)?.isAvailable()) ?? false,
  })));
  return text(JSON.stringify(agents, null, 2));
}

export function createServer(ctx: ServerContext): McpServer {
  const server = new McpServer({
    name: "consortium",
    version: VERSION,
  });

  server.tool(
    "consortium_run",
    "Run a prompt through a consortium of agents until the arbiter's confidence converges",
    ConsortiumRunInputSchema.shape,
    async (args, extra) => handleConsortiumRun(args, ctx, extra.signal)
  );

  server.tool(
    "consortium_list",
    "List saved consortiums",
    ConsortiumListInputSchema.shape,
    async () => handleConsortiumList(ctx)
  );

  server.tool(
    "list_agents",
    "List configured agents and their availability",
    ListAgentsInputSchema.shape,
    async () => handleListAgents(ctx)
  );

  return server;
}

// --- Start ---

export async function startServer(configPath?: string): Promise<void> {
  const config = loadConfig(configPath);
  initFileLogging(getUserDataDir(config), config.logging);
  const store = await openStore(config);
  const server = createServer({ config, registry: buildRegistry(config), store });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info("MCP server started (stdio)");

  const shutdown = () => {
    server.close()
      .then(() => store.close())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error("shutdown failed:", err instanceof Error ? err.message : String(err));
        process.exit(1);
      });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}
