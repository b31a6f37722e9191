import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { handleConsortiumRun, handleConsortiumList, handleListAgents, createServer, type ServerContext } from "../server.js";
import { ConsortiumRunInputSchema } from "../tools.js";
import { AgentRegistry } from "../adapters/index.js";
import { ConfigSchema, loadConfig, resetLoadedConfigDir } from "../config.js";
import { SqliteStore } from "../store/sqlite.js";
import {
  buildRegistry,
  defaultModels,
  resolvePreset,
  presetToConfig,
  assertAgentsKnown,
  openStore,
} from "../runtime.js";
import { AgentInvocationError, ConfigurationError } from "../errors.js";
import { FakeAdapter, agentReply, arbiterReply } from "./fakes.js";

const config = ConfigSchema.parse({
  agents: [
    { name: "x", command: "x-cli" },
    { name: "y", type: "ollama", model: "qwen3", enabled: false },
    { name: "judge", command: "judge-cli", enabled: false },
  ],
  consortium: { arbiter: "judge", confidenceThreshold: 0.8, maxIterations: 2 },
});

function context(judgeConfidence = 0.9, store?: SqliteStore): { ctx: ServerContext; x: FakeAdapter; judge: FakeAdapter } {
  const x = new FakeAdapter("x", agentReply("Redis", 0.9));
  const y = new FakeAdapter("y", () => {
    throw new AgentInvocationError("y", "transport", "connection refused");
  }, false);
  const judge = new FakeAdapter("judge", arbiterReply({ synthesis: "Use Redis.", confidence: judgeConfidence, analysis: "All agree." }));
  return { ctx: { config, registry: new AgentRegistry([x, y, judge]), store }, x, judge };
}

describe("consortium_run input schema", () => {
  it("defaults include_history to false", () => {
    expect(ConsortiumRunInputSchema.parse({ prompt: "q" })).toEqual({ prompt: "q", include_history: false });
  });

  it("rejects an empty prompt and more than 10 iterations", () => {
    expect(() => ConsortiumRunInputSchema.parse({ prompt: "" })).toThrow();
    expect(() => ConsortiumRunInputSchema.parse({ prompt: "q", max_iterations: 11 })).toThrow();
  });
});

describe("handleConsortiumRun", () => {
  it("runs the default roster and formats the result", async () => {
    const { ctx, x, judge } = context();

    const result = await handleConsortiumRun(ConsortiumRunInputSchema.parse({ prompt: "Which cache?" }), ctx);

    expect(result.isError).toBeUndefined();
    const lines = result.content[0].text.split("\n");
    expect(lines.slice(0, 6)).toEqual([
      "**Synthesis** (confidence: 0.90, round 1 of 1)",
      "",
      "Use Redis.",
      "",
      "**Analysis:**",
      "All agree.",
    ]);
    expect(lines[lines.length - 1]).toMatch(/^Run [0-9a-f-]{36} \| 1 rounds \| \d+\.\ds \| Tokens: 0$/);
    expect(x.calls).toBe(1);
    expect(judge.calls).toBe(1);
  });

  it("applies per-call overrides", async () => {
    const { ctx, x, judge } = context(0.5);

    await handleConsortiumRun(
      ConsortiumRunInputSchema.parse({ prompt: "q", models: ["x:3"], max_iterations: 1 }),
      ctx
    );

    expect(x.calls).toBe(3);
    expect(judge.calls).toBe(1);
  });

  it("includes every round's responses on request", async () => {
    const { ctx } = context();
    const result = await handleConsortiumRun(ConsortiumRunInputSchema.parse({ prompt: "q", include_history: true }), ctx);

    expect(result.content[0].text).toContain("--- Round 1 (confidence 0.90) ---\n[x#1] (confidence: 0.90)\nRedis");
  });

  it("reports an unknown agent as a configuration error", async () => {
    const { ctx } = context();
    const result = await handleConsortiumRun(ConsortiumRunInputSchema.parse({ prompt: "q", models: ["ghost"] }), ctx);

    expect(result.isError).toBe(true);
    expect(result.content[0].text).toBe(
      'Error (configuration): Invalid configuration: Unknown agent: "ghost". Available: x, y, judge'
    );
  });

  it("stops the run when the client cancels the request", async () => {
    const { ctx, x } = context();
    const controller = new AbortController();
    controller.abort();

    const result = await handleConsortiumRun(ConsortiumRunInputSchema.parse({ prompt: "q" }), ctx, controller.signal);

    expect(result.isError).toBe(true);
    expect(result.content[0].text).toBe("Error (cancelled): Orchestration cancelled during round 1");
    expect(x.calls).toBe(0);
  });

  it("reports a run failure by kind", async () => {
    const { ctx } = context();
    const result = await handleConsortiumRun(ConsortiumRunInputSchema.parse({ prompt: "q", models: ["y"] }), ctx);

    expect(result.isError).toBe(true);
    expect(result.content[0].text).toBe(
      "Error (all-agents-failed): Round 1: all 1 agent tasks failed — y#1 (transport): connection refused"
    );
  });

  it("rejects an unknown saved consortium", async () => {
    const { ctx } = context();
    const result = await handleConsortiumRun(ConsortiumRunInputSchema.parse({ prompt: "q", consortium: "team" }), ctx);

    expect(result).toEqual({ content: [{ type: "text", text: 'Unknown consortium: "team"' }], isError: true });
  });
});

describe("with a store", () => {
  let store: SqliteStore;

  beforeEach(async () => {
    store = new SqliteStore(":memory:");
    await store.initialize();
  });

  afterEach(async () => {
    await store.close();
  });

  it("starts from a saved consortium", async () => {
    await store.saveConsortium("team", { ...resolvePreset(config), models: ["x:2"] });
    const { ctx, x } = context(0.9, store);

    const result = await handleConsortiumRun(ConsortiumRunInputSchema.parse({ prompt: "q", consortium: "team" }), ctx);

    expect(result.isError).toBeUndefined();
    expect(x.calls).toBe(2);
    expect(await store.listRuns()).toHaveLength(1);
  });

  it("lists saved consortiums", async () => {
    await store.saveConsortium("team", resolvePreset(config, { models: ["x:2"] }));
    const { ctx } = context(0.9, store);

    const list: unknown = JSON.parse((await handleConsortiumList(ctx)).content[0].text);

    expect(list).toEqual([expect.objectContaining({ name: "team", models: ["x:2"], arbiter: "judge" })]);
  });
});

describe("handleConsortiumList / handleListAgents", () => {
  it("returns an empty list without a store", async () => {
    const { ctx } = context();
    expect((await handleConsortiumList(ctx)).content[0].text).toBe("[]");
  });

  it("lists configured agents with availability", async () => {
    const { ctx } = context();
    const agents: unknown = JSON.parse((await handleListAgents(ctx)).content[0].text);

    expect(agents).toEqual([
      { name: "x", type: "cli", command: "x-cli", enabled: true, available: true },
      { name: "y", type: "ollama", model: "qwen3", enabled: false, available: false },
      { name: "judge", type: "cli", command: "judge-cli", enabled: false, available: true },
    ]);
  });

  it("builds an MCP server", () => {
    const { ctx } = context();
    expect(createServer(ctx)).toBeDefined();
  });
});

describe("runtime wiring", () => {
  it("defaults the roster to enabled agents", () => {
    expect(defaultModels(config)).toEqual(["x"]);
    expect(defaultModels(ConfigSchema.parse({ ...config, consortium: { models: ["y:2"] } }))).toEqual(["y:2"]);
  });

  it("layers presets, skipping undefined fields", () => {
    const preset = resolvePreset(config, { arbiter: "x", models: ["y"] }, { arbiter: undefined, confidenceThreshold: 0.5 });

    expect(preset).toEqual({
      models: ["y"],
      arbiter: "x",
      confidenceThreshold: 0.5,
      minIterations: 1,
      maxIterations: 2,
      judgingMethod: "default",
      retention: "last",
    });
  });

  it("turns a preset into an orchestration config", () => {
    const input = presetToConfig({ ...resolvePreset(config), models: ["x", "y:2"], systemPrompt: "Be terse." }, 2);

    expect(input.roster).toEqual([{ identifier: "x", instanceCount: 2 }, { identifier: "y", instanceCount: 2 }]);
    expect(input.systemPrompt).toBe("Be terse.");
    expect(input.arbiter).toBe("judge");
  });

  it("checks roster and arbiter names against the registry", () => {
    const registry = buildRegistry(config);
    expect(registry.names).toEqual(["x", "y", "judge"]);
    expect(() => assertAgentsKnown(registry, presetToConfig(resolvePreset(config)))).not.toThrow();
    expect(() => assertAgentsKnown(registry, presetToConfig({ ...resolvePreset(config), arbiter: "nobody" })))
      .toThrow(ConfigurationError);
  });

  describe("openStore", () => {
    let dir: string;

    afterEach(() => {
      resetLoadedConfigDir();
      rmSync(dir, { recursive: true, force: true });
    });

    it("creates the database next to the config file", async () => {
      dir = mkdtempSync(join(tmpdir(), "consortium-test-"));
      const path = join(dir, "consortium.config.json");
      writeFileSync(path, JSON.stringify({ database: { path: "./nested/db/runs.db" } }));

      const store = await openStore(loadConfig(path));
      try {
        expect(await store.listRuns()).toEqual([]);
      } finally {
        await store.close();
      }
    });
  });
});
