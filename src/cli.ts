#!/usr/bin/env node

/**
 * Consortium CLI — command-line interface for multi-agent consensus runs.
 *
 * Commands:
 *   consortium [run] "prompt" [-m a:2 -m b] [--arbiter z] [--confidence-threshold 0.8] ...
 *   consortium save <name> [run options]
 *   consortium list
 *   consortium remove <name>
 *   consortium agents
 *   consortium logs [runId]
 *   consortium init
 *   consortium start
 */

import { parseArgs } from "node:util";
import type { z } from "zod";
import { existsSync, readFileSync, statSync, writeFileSync } from "node:fs";
import { text as readStream } from "node:stream/consumers";
import { loadConfig, getUserDataDir, type Config, type JudgingMethod, type RetentionPolicy } from "./config.js";
import { JudgingMethodSchema, RetentionPolicySchema } from "./config.js";
import { createAdapter } from "./adapters/index.js";
import { ConsortiumOrchestrator } from "./orchestrator.js";
import { normalizeConfidenceThreshold } from "./consortium/config.js";
import type { ConsortiumResult } from "./consortium/types.js";
import type { ConsortiumPreset } from "./store/types.js";
import { AllAgentsFailedError, ConfigurationError, ConsortiumError } from "./errors.js";
import { buildRegistry, resolvePreset, presetToConfig, assertAgentsKnown, openStore } from "./runtime.js";
import { setLogLevel, initFileLogging } from "./logger.js";

const VERSION = "0.4.0";

const USAGE = `Usage: consortium <command> [options]

Commands:
  run <prompt>             Run a prompt through the consortium (default command)
  save <name> [options]    Save the run options below as a named consortium
  list                     List saved consortiums
  remove <name>            Delete a saved consortium
  agents                   List configured agents and check availability
  logs [runId]             List recent runs, or show one run round by round
  init                     Create consortium.config.json
  start                    Start MCP server (stdio)

Run options:
  -m, --model <id[:n]>     Roster entry; repeatable or comma-separated (e.g. -m claude:2 -m qwen)
  -n, --count <n>          Instances for entries without an explicit count (default: 1)
  --arbiter <id>           Agent that synthesizes each round
  --confidence-threshold <x>  Stop once confidence reaches x (0-1, or a percentage)
  --min-iterations <n>     Rounds before confidence is checked
  --max-iterations <n>     Hard ceiling on rounds
  --system <text|file>     Extra instructions for every agent and the arbiter
  --judging-method <m>     default | pick-one | rank
  --retention <r>          last | best (which round's answer is reported)
  --timeout <ms>           Per-invocation timeout
  --consortium <name>      Start from a saved consortium
  --output <file.json>     Also write the full result as JSON
  --raw                    Print only the synthesis
  --json                   Print the full result as JSON
  --no-stdin               Never read the prompt from stdin

Global options:
  --verbose                Show info-level logs on stderr
  --debug                  Show all logs (debug level) on stderr
  --help                   Show this help
  --version                Show version

Environment:
  CONSORTIUM_LOG_LEVEL     Set log level: error, warn (default), info, debug

Examples:
  consortium "Redis vs Memcached for sessions?" -m claude:2 -m qwen --arbiter claude
  consortium run "Design a rate limiter" --min-iterations 2 --max-iterations 4 --retention best
  echo "Explain CRDTs" | consortium --consortium reviewers --raw
`;

const COMMANDS = new Set(["run", "save", "list", "remove", "agents", "logs", "init", "start"]);

const RUN_OPTIONS = {
  model: { type: "string", short: "m", multiple: true },
  count: { type: "string", short: "n" },
  arbiter: { type: "string" },
  "confidence-threshold": { type: "string" },
  "min-iterations": { type: "string" },
  "max-iterations": { type: "string" },
  system: { type: "string" },
  "judging-method": { type: "string" },
  retention: { type: "string" },
  timeout: { type: "string" },
  consortium: { type: "string" },
  output: { type: "string" },
  raw: { type: "boolean", default: false },
  json: { type: "boolean", default: false },
  "no-stdin": { type: "boolean", default: false },
} as const;

async function main() {
  const rawArgs = process.argv.slice(2);

  // Process global flags before anything else
  if (rawArgs.includes("--debug")) {
    setLogLevel("debug");
  } else if (rawArgs.includes("--verbose")) {
    setLogLevel("info");
  }
  const args = rawArgs.filter((a) => a !== "--verbose" && a !== "--debug");

  if (args[0] === "--help" || args[0] === "-h") {
    console.log(USAGE);
    process.exit(0);
  }

  if (args[0] === "--version" || args[0] === "-v") {
    console.log(`consortium v${VERSION}`);
    process.exit(0);
  }

  const explicit = args.length > 0 && COMMANDS.has(args[0]);
  const command = explicit ? args[0] : "run";
  const rest = explicit ? args.slice(1) : args;

  // "init" runs before a config exists; "start" sets up its own logging
  if (command === "init") {
    cmdInit();
    return;
  }
  if (command === "start") {
    const { startServer } = await import("./server.js");
    console.error("Starting consortium MCP server (stdio)...");
    await startServer();
    return;
  }

  const config = loadConfig();
  initFileLogging(getUserDataDir(config), config.logging);

  switch (command) {
    case "run":
      await cmdRun(rest, config);
      break;
    case "save":
      await cmdSave(rest, config);
      break;
    case "list":
      await cmdList(config);
      break;
    case "remove":
      await cmdRemove(rest, config);
      break;
    case "agents":
      await cmdAgents(config);
      break;
    case "logs":
      await cmdLogs(rest, config);
      break;
  }
}

// --- Option parsing ---

type RunValues = ReturnType<typeof parseRunArgs>["values"];

function parseRunArgs(args: string[]) {
  return parseArgs({ args, options: RUN_OPTIONS, allowPositionals: true });
}

function parsePositiveInt(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isInteger(n) || n < 1) {
    throw new ConfigurationError(`--${flag} must be a positive integer (got "${value}")`);
  }
  return n;
}

function parseEnum<T extends [string, ...string[]]>(flag: string, value: string | undefined, schema: z.ZodEnum<T>): T[number] | undefined {
  if (value === undefined) return undefined;
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigurationError(`--${flag} must be one of ${schema.options.join(", ")} (got "${value}")`);
  }
  return parsed.data;
}

/** `--system` takes literal text, or the path of a file holding it. */
function readSystemPrompt(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  if (existsSync(value) && statSync(value).isFile()) {
    return readFileSync(value, "utf-8");
  }
  return value;
}

/** Preset fields set by flags; unset flags stay undefined. */
function presetOverrides(values: RunValues): Partial<ConsortiumPreset> {
  const threshold = values["confidence-threshold"];
  let confidenceThreshold: number | undefined;
  if (threshold !== undefined) {
    confidenceThreshold = normalizeConfidenceThreshold(threshold.trim() === "" ? NaN : Number(threshold));
  }
  const judgingMethod: JudgingMethod | undefined =
    parseEnum("judging-method", values["judging-method"], JudgingMethodSchema);
  const retention: RetentionPolicy | undefined =
    parseEnum("retention", values.retention, RetentionPolicySchema);

  return {
    models: values.model && values.model.length > 0 ? values.model : undefined,
    arbiter: values.arbiter,
    confidenceThreshold,
    minIterations: parsePositiveInt("min-iterations", values["min-iterations"]),
    maxIterations: parsePositiveInt("max-iterations", values["max-iterations"]),
    systemPrompt: readSystemPrompt(values.system),
    judgingMethod,
    retention,
    agentTimeoutMs: parsePositiveInt("timeout", values.timeout),
  };
}

async function loadBasePreset(values: RunValues, config: Config): Promise<Partial<ConsortiumPreset>> {
  if (!values.consortium) return {};
  const store = await openStore(config);
  try {
    const saved = await store.getConsortium(values.consortium);
    if (!saved) throw new ConfigurationError(`Unknown consortium: "${values.consortium}". See "consortium list".`);
    return saved.preset;
  } finally {
    await store.close();
  }
}

// --- Commands ---

async function cmdRun(args: string[], config: Config) {
  const { values, positionals } = parseRunArgs(args);

  let prompt = positionals.join(" ").trim();
  if (!prompt && !values["no-stdin"] && !process.stdin.isTTY) {
    prompt = (await readStream(process.stdin)).trim();
  }
  if (!prompt) {
    console.error("Error: run requires a prompt (argument or stdin)\n");
    console.log('Usage: consortium run "your question" [-m agent[:n]] [--arbiter agent]');
    process.exit(1);
  }

  const base = await loadBasePreset(values, config);
  const overrides = presetOverrides(values);
  const preset = resolvePreset(config, base, overrides);
  const input = presetToConfig(preset, parsePositiveInt("count", values.count) ?? 1);

  const registry = buildRegistry(config);
  assertAgentsKnown(registry, input);

  const store = await openStore(config);
  const orchestrator = new ConsortiumOrchestrator(input, { invoker: registry, interactionLog: store });

  const { config: oc } = orchestrator;
  if (!values.raw && !values.json) {
    console.error(`Consortium: ${oc.roster.map((s) => `${s.identifier}×${s.instanceCount}`).join(", ")} | arbiter: ${oc.arbiter}`);
    console.error(`  Threshold: ${oc.confidenceThreshold} | Iterations: ${oc.minIterations}-${oc.maxIterations} | Judging: ${oc.judgingMethod} | Retention: ${oc.retention}\n`);
    orchestrator.events.onRound(({ record, stop }) => {
      const ok = record.responses.filter((r) => !r.error).length;
      console.error(`  Round ${record.round}: ${ok}/${record.responses.length} agents ok, confidence ${record.synthesis.confidence.toFixed(2)}${stop ? "" : " → iterating"}`);
    });
  }

  const controller = new AbortController();
  const onSigint = () => {
    console.error("\nCancelling...");
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  let result: ConsortiumResult;
  try {
    result = await orchestrator.orchestrate(prompt, { signal: controller.signal });
  } catch (err) {
    if (err instanceof AllAgentsFailedError) {
      console.error(`Error (${err.kind}): round ${err.round}, every agent failed:`);
      for (const f of err.failures) console.error(`  ${f.agent}#${f.instance} (${f.kind}): ${f.message}`);
      process.exitCode = 1;
      return;
    }
    throw err;
  } finally {
    process.off("SIGINT", onSigint);
    await orchestrator.flushLog();
    await store.close();
  }

  if (values.output) {
    writeFileSync(values.output, JSON.stringify(result, null, 2) + "\n");
    console.error(`Result written to ${values.output}`);
  }

  if (values.raw) {
    console.log(result.synthesis);
  } else if (values.json) {
    console.log(JSON.stringify(result, null, 2));
  } else {
    printResult(result);
  }
}

function printResult(result: ConsortiumResult) {
  console.log("=".repeat(60));
  for (const it of result.iterations) {
    console.log(`\n--- Round ${it.round} ---\n`);
    for (const r of it.responses) {
      const label = `${r.agent}#${r.instance}`;
      if (r.error) {
        console.log(`[${label}] FAILED (${r.error.kind}): ${r.error.message}\n`);
        continue;
      }
      const time = (r.durationMs / 1000).toFixed(1);
      console.log(`[${label}] (${time}s, confidence: ${r.confidence?.toFixed(2) ?? "n/a"})`);
      console.log(r.answer);
      console.log("");
    }
    console.log(`Arbiter confidence: ${it.synthesis.confidence.toFixed(2)}`);
  }

  console.log("\n--- Synthesis ---");
  console.log(result.synthesis);
  if (result.analysis) {
    console.log("\n--- Analysis ---");
    console.log(result.analysis);
  }
  if (result.dissent) {
    console.log("\n--- Dissent ---");
    console.log(result.dissent);
  }

  console.log("\n" + "=".repeat(60));
  console.log(`\nRun ${result.runId}`);
  console.log(`Rounds: ${result.iterations.length} | Reported round: ${result.finalRound} | Duration: ${(result.durationMs / 1000).toFixed(1)}s`);
  console.log(`Confidence: ${result.confidence.toFixed(2)}`);

  const { total, perAgent } = result.tokens;
  const totalTok = total.inputTokens + total.outputTokens;
  if (totalTok > 0 || (total.costUsd ?? 0) > 0) {
    console.log(`\nTokens: ${totalTok.toLocaleString()} (${total.inputTokens.toLocaleString()} in / ${total.outputTokens.toLocaleString()} out)`);
    if (total.costUsd) console.log(`Cost: $${total.costUsd.toFixed(4)}`);
    const agents = Object.entries(perAgent);
    if (agents.length > 1) {
      console.log("Per agent:");
      for (const [name, tokens] of agents) {
        const costStr = tokens.costUsd ? ` ($${tokens.costUsd.toFixed(4)})` : "";
        console.log(`  ${name}: ${(tokens.inputTokens + tokens.outputTokens).toLocaleString()} tokens${costStr}`);
      }
    }
  }
}

async function cmdSave(args: string[], config: Config) {
  const { values, positionals } = parseRunArgs(args);
  const name = positionals[0];
  if (!name) {
    console.error("Usage: consortium save <name> [-m agent[:n]] [--arbiter agent] [...]");
    process.exit(1);
  }

  const base = await loadBasePreset(values, config);
  const preset = resolvePreset(config, base, presetOverrides(values));
  // Validate now so a broken preset is never stored
  const input = presetToConfig(preset, parsePositiveInt("count", values.count) ?? 1);
  assertAgentsKnown(buildRegistry(config), input);
  const models = input.roster.map((s) => `${s.identifier}:${s.instanceCount ?? 1}`);

  const store = await openStore(config);
  try {
    const saved = await store.saveConsortium(name, { ...preset, models });
    console.log(`Saved consortium "${saved.name}": ${saved.preset.models.join(", ")} | arbiter: ${saved.preset.arbiter}`);
  } finally {
    await store.close();
  }
}

async function cmdList(config: Config) {
  const store = await openStore(config);
  try {
    const saved = await store.listConsortiums();
    if (saved.length === 0) {
      console.log('No saved consortiums. Create one with "consortium save <name> -m ...".');
      return;
    }
    for (const s of saved) {
      const p = s.preset;
      console.log(`  ${s.name} — ${p.models.join(", ")} | arbiter: ${p.arbiter} | threshold: ${p.confidenceThreshold} | iterations: ${p.minIterations}-${p.maxIterations} | ${p.judgingMethod}/${p.retention}`);
    }
  } finally {
    await store.close();
  }
}

async function cmdRemove(args: string[], config: Config) {
  const name = args[0];
  if (!name) {
    console.error("Usage: consortium remove <name>");
    process.exit(1);
  }
  const store = await openStore(config);
  try {
    if (await store.removeConsortium(name)) {
      console.log(`Removed consortium "${name}"`);
    } else {
      console.error(`No consortium named "${name}"`);
      process.exitCode = 1;
    }
  } finally {
    await store.close();
  }
}

async function cmdAgents(config: Config) {
  console.log("Configured agents:\n");

  for (const agentConfig of config.agents) {
    const adapter = createAdapter(agentConfig);
    const available = await adapter.isAvailable();
    const status = agentConfig.enabled
      ? available
        ? "enabled, available"
        : "enabled, NOT AVAILABLE"
      : "disabled";
    const type = agentConfig.model
      ? `${agentConfig.type ?? "ollama"}/${agentConfig.model}`
      : agentConfig.command ?? "?";
    console.log(`  ${agentConfig.name} (${type}) — ${status}`);
  }
}

async function cmdLogs(args: string[], config: Config) {
  const { values, positionals } = parseArgs({
    args,
    options: {
      limit: { type: "string" },
    },
    allowPositionals: true,
  });

  const store = await openStore(config);
  try {
    const runId = positionals[0];
    if (!runId) {
      const runs = await store.listRuns(parsePositiveInt("limit", values.limit) ?? 20);
      if (runs.length === 0) {
        console.log("No runs recorded yet.");
        return;
      }
      for (const r of runs) {
        const conf = r.confidence !== null ? r.confidence.toFixed(2) : "-";
        const query = r.query.length > 60 ? r.query.slice(0, 60) + "..." : r.query;
        console.log(`  ${r.id}  ${r.startedAt}  ${r.status.padEnd(9)}  rounds: ${r.rounds}  confidence: ${conf}  ${query}`);
      }
      return;
    }

    const run = await store.getRun(runId);
    if (!run) {
      console.error(`No run with ID "${runId}"`);
      process.exitCode = 1;
      return;
    }
    console.log(`Run ${run.id} (${run.status})`);
    console.log(`Query: ${run.query}`);
    console.log(`Started: ${run.startedAt}${run.finishedAt ? ` | Finished: ${run.finishedAt}` : ""}`);
    for (const it of run.iterations) {
      console.log(`\n--- Round ${it.round} (confidence ${it.synthesis.confidence.toFixed(2)}) ---`);
      for (const r of it.responses) {
        console.log(r.error
          ? `  ${r.agent}#${r.instance}: FAILED (${r.error.kind}) ${r.error.message}`
          : `  ${r.agent}#${r.instance}: confidence ${r.confidence?.toFixed(2) ?? "n/a"}, ${r.answer.length} chars`);
      }
      console.log(`\n${it.synthesis.synthesis}`);
    }
    if (run.error) console.log(`\nFailed (${run.errorKind ?? "unknown"}): ${run.error}`);
  } finally {
    await store.close();
  }
}

function cmdInit() {
  const filename = "consortium.config.json";
  if (existsSync(filename)) {
    console.log(`${filename} already exists. Skipping.`);
    return;
  }

  const defaultConfig = {
    user: "default",
    agents: [
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
    ],
    consortium: {
      models: ["claude:2"],
      arbiter: "claude",
      confidenceThreshold: 0.8,
      minIterations: 1,
      maxIterations: 3,
      judgingMethod: "default",
      retention: "last",
    },
    database: { path: "./data/consortium.db" },
  };

  writeFileSync(filename, JSON.stringify(defaultConfig, null, 2) + "\n");
  console.log(`Created ${filename}`);
  console.log("Edit it to enable agents and set the default roster.");
}

main().catch((err: unknown) => {
  if (err instanceof ConsortiumError) {
    console.error(`Error (${err.kind}): ${err.message}`);
  } else {
    console.error("Error:", err instanceof Error ? err.message : err);
  }
  process.exit(1);
});
