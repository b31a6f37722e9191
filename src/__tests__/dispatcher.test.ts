import { describe, it, expect, vi, afterEach } from "vitest";
import { dispatch, expandRoster, taskLabel } from "../consortium/dispatcher.js";
import { AgentInvocationError } from "../errors.js";
import { invocationDeadline } from "../adapters/base.js";
import { FakeInvoker, agentReply, hang } from "./fakes.js";

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("expandRoster", () => {
  it("gives each instance its own 1-based index", () => {
    const tasks = expandRoster([{ identifier: "a", instanceCount: 2 }, { identifier: "b", instanceCount: 1 }]);
    expect(tasks.map(taskLabel)).toEqual(["a#1", "a#2", "b#1"]);
  });
});

describe("dispatch", () => {
  it("runs every task concurrently and waits for all of them", async () => {
    let inFlight = 0;
    let peak = 0;
    const slow = async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await sleep(20);
      inFlight--;
      return agentReply("ok", 0.5);
    };
    const invoker = new FakeInvoker({ a: slow, b: slow });

    const outcome = await dispatch("q", [{ identifier: "a", instanceCount: 2 }, { identifier: "b", instanceCount: 1 }], { invoker });

    expect(peak).toBe(3);
    expect(inFlight).toBe(0);
    expect(outcome.responses).toHaveLength(3);
    expect(outcome.successes).toHaveLength(3);
    expect(outcome.failures).toEqual([]);
  });

  it("returns responses in task order with parsed fields", async () => {
    const invoker = new FakeInvoker({
      a: async () => { await sleep(15); return agentReply("first", 0.9, "because"); },
      b: agentReply("second"),
    });

    const { responses } = await dispatch("q", [{ identifier: "a", instanceCount: 1 }, { identifier: "b", instanceCount: 1 }], { invoker });

    expect(responses.map((r) => r.agent)).toEqual(["a", "b"]);
    expect(responses[0]).toMatchObject({ agent: "a", instance: 1, answer: "first", confidence: 0.9, reasoning: "because", durationMs: 5 });
    expect(responses[1].confidence).toBeUndefined();
    expect(responses[1].raw).toBe(agentReply("second"));
    expect(Object.isFrozen(responses[0])).toBe(true);
  });

  it("captures a failing task as a response with an error", async () => {
    const invoker = new FakeInvoker({
      a: agentReply("fine", 0.7),
      b: () => { throw new AgentInvocationError("b", "provider", "HTTP 500"); },
    });

    const outcome = await dispatch("q", [{ identifier: "a", instanceCount: 1 }, { identifier: "b", instanceCount: 1 }], { invoker });

    expect(outcome.successes.map((r) => r.agent)).toEqual(["a"]);
    expect(outcome.failures).toEqual([{ agent: "b", instance: 1, kind: "provider", message: "HTTP 500" }]);
    expect(outcome.responses[1]).toMatchObject({ agent: "b", answer: "", raw: "", error: { kind: "provider" } });
  });

  it("classifies a connection error as transport", async () => {
    const refused = Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:11434"), { code: "ECONNREFUSED" });
    const invoker = new FakeInvoker({ a: () => { throw refused; } });

    const { failures } = await dispatch("q", [{ identifier: "a", instanceCount: 1 }], { invoker });

    expect(failures[0].kind).toBe("transport");
  });

  it("times out a hanging task without holding up the others", async () => {
    const invoker = new FakeInvoker({ slow: () => hang(), fast: agentReply("done") });

    const outcome = await dispatch("q", [{ identifier: "slow", instanceCount: 1 }, { identifier: "fast", instanceCount: 1 }], {
      invoker,
      timeoutMs: 20,
    });

    expect(outcome.failures).toEqual([{ agent: "slow", instance: 1, kind: "timeout", message: "timed out after 20ms" }]);
    expect(outcome.successes.map((r) => r.agent)).toEqual(["fast"]);
  });

  it("marks every task cancelled when the run signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const invoker = new FakeInvoker({ a: () => hang() });

    const outcome = await dispatch("q", [{ identifier: "a", instanceCount: 2 }], { invoker, signal: controller.signal });

    expect(outcome.successes).toEqual([]);
    expect(outcome.failures.map((f) => f.kind)).toEqual(["cancelled", "cancelled"]);
  });

  it("cancels in-flight tasks when the run signal aborts", async () => {
    const controller = new AbortController();
    const invoker = new FakeInvoker({ a: () => hang() });
    setTimeout(() => controller.abort(), 10);

    const outcome = await dispatch("q", [{ identifier: "a", instanceCount: 1 }], { invoker, signal: controller.signal, timeoutMs: 5_000 });

    expect(outcome.failures[0].kind).toBe("cancelled");
  });

  it("passes prompt, system prompt, timeout and an abort signal to the invoker", async () => {
    const invoker = new FakeInvoker({ a: agentReply("x") });

    await dispatch("the prompt", [{ identifier: "a", instanceCount: 1 }], { invoker, systemPrompt: "be brief", timeoutMs: 1_000 });

    const [options] = invoker.callsTo("a");
    expect(options.prompt).toBe("the prompt");
    expect(options.systemPrompt).toBe("be brief");
    expect(options.timeoutMs).toBe(1_000);
    expect(options.signal).toBeInstanceOf(AbortSignal);
  });

  it("keeps token usage reported by the agent", async () => {
    const invoker = new FakeInvoker({
      a: () => ({ content: agentReply("x"), durationMs: 12, tokens: { inputTokens: 10, outputTokens: 4 } }),
    });

    const { responses } = await dispatch("q", [{ identifier: "a", instanceCount: 1 }], { invoker });

    expect(responses[0].tokens).toEqual({ inputTokens: 10, outputTokens: 4 });
    expect(responses[0].durationMs).toBe(12);
  });

  describe("without a configured timeout", () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it("still times out a task that never settles", async () => {
      vi.useFakeTimers();
      const invoker = new FakeInvoker({ stuck: () => hang(), ok: agentReply("fine", 0.7) });

      const pending = dispatch("q", [{ identifier: "stuck", instanceCount: 1 }, { identifier: "ok", instanceCount: 1 }], { invoker });
      await vi.advanceTimersByTimeAsync(invocationDeadline(1));
      const outcome = await pending;

      expect(invocationDeadline(1)).toBe(30_020);
      expect(outcome.successes.map(taskLabel)).toEqual(["ok#1"]);
      expect(outcome.failures).toEqual([{ agent: "stuck", instance: 1, kind: "timeout", message: "timed out after 30020ms" }]);
      expect(invoker.callsTo("stuck")[0].timeoutMs).toBeUndefined();
    });
  });
});
