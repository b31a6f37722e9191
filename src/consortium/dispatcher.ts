/**
 * Dispatcher — fan a prompt out to every roster instance and fan the replies back in.
 *
 * - Each AgentSpec expands to `instanceCount` tasks with the same identifier
 *   and instance indices 1..n.
 * - All tasks run concurrently; dispatch resolves only once every task has
 *   settled (a barrier, not a race).
 * - Each task has its own timeout. A task that fails for any reason becomes
 *   an AgentResponse carrying `error`; dispatch itself never rejects.
 */

import { invocationDeadline, type AgentInvoker } from "../adapters/base.js";
import type { AgentResponse, AgentSpec, TaskFailure, FailureKind } from "./types.js";
import { parseAgentResponse } from "./parser.js";
import { classifyFailure } from "../errors.js";
import { abortable, createDeadline } from "./abort.js";
import { createLogger, type RunLog } from "../logger.js";

const log = createLogger("dispatcher");

export interface DispatchTask {
  agent: string;
  instance: number;
}

export interface DispatchContext {
  invoker: AgentInvoker;
  systemPrompt?: string;
  /** Per-task timeout; omitted = the adapter's own estimate, bounded by invocationDeadline */
  timeoutMs?: number;
  /** Run-level cancellation */
  signal?: AbortSignal;
  runLog?: RunLog | null;
}

export interface DispatchOutcome {
  /** Every task's response, failed ones included, in task order */
  responses: AgentResponse[];
  successes: AgentResponse[];
  failures: TaskFailure[];
}

export function expandRoster(roster: readonly AgentSpec[]): DispatchTask[] {
  return roster.flatMap((spec) =>
    Array.from({ length: spec.instanceCount }, (_, i) => ({ agent: spec.identifier, instance: i + 1 }))
  );
}

export function taskLabel(task: DispatchTask): string {
  return `${task.agent}#${task.instance}`;
}

async function runTask(task: DispatchTask, prompt: string, ctx: DispatchContext): Promise<AgentResponse> {
  const label = taskLabel(task);
  const start = Date.now();
  const deadlineMs = ctx.timeoutMs ?? invocationDeadline(prompt.length);
  const guard = createDeadline(ctx.signal, deadlineMs);

  try {
    const reply = await abortable(
      ctx.invoker.invoke(task.agent, {
        prompt,
        systemPrompt: ctx.systemPrompt,
        timeoutMs: ctx.timeoutMs,
        signal: guard.signal,
      }),
      guard.signal
    );

    const parsed = parseAgentResponse(reply.content);
    log.debug(`${label} replied: ${reply.durationMs}ms, ${reply.content.length} chars, confidence: ${parsed.confidence ?? "n/a"}`);
    ctx.runLog?.write("debug", `--- ${label} response (${reply.durationMs}ms, confidence: ${parsed.confidence ?? "n/a"}) ---\n${reply.content}`);

    return Object.freeze({
      agent: task.agent,
      instance: task.instance,
      ...parsed,
      raw: reply.content,
      durationMs: reply.durationMs,
      ...(reply.tokens ? { tokens: reply.tokens } : {}),
    });
  } catch (err) {
    const kind: FailureKind = ctx.signal?.aborted
      ? "cancelled"
      : guard.timedOut()
        ? "timeout"
        : classifyFailure(err);
    const message = guard.timedOut() && !ctx.signal?.aborted
      ? `timed out after ${deadlineMs}ms`
      : err instanceof Error ? err.message : String(err);

    log.warn(`${label} failed (${kind}):`, message);
    ctx.runLog?.write("error", `${label} failed (${kind}): ${message}`);

    const failure: TaskFailure = Object.freeze({ agent: task.agent, instance: task.instance, kind, message });
    return Object.freeze({
      agent: task.agent,
      instance: task.instance,
      answer: "",
      raw: "",
      durationMs: Date.now() - start,
      error: failure,
    });
  } finally {
    guard.dispose();
  }
}

/**
 * Send `prompt` to every instance in the roster concurrently and wait for all of them.
 */
export async function dispatch(prompt: string, roster: readonly AgentSpec[], ctx: DispatchContext): Promise<DispatchOutcome> {
  const tasks = expandRoster(roster);
  log.debug(`dispatching ${tasks.length} tasks:`, tasks.map(taskLabel).join(", "));
  ctx.runLog?.write("debug", `--- dispatch prompt (${tasks.length} tasks) ---\n` +
    (ctx.systemPrompt ? `[system]\n${ctx.systemPrompt}\n` : "") + `[user]\n${prompt}`);

  const responses = await Promise.all(tasks.map((task) => runTask(task, prompt, ctx)));

  const successes = responses.filter((r) => r.error === undefined);
  const failures = responses.flatMap((r) => (r.error ? [r.error] : []));

  if (failures.length > 0 && successes.length > 0) {
    log.warn(`${failures.length}/${responses.length} tasks failed, continuing with ${successes.length}`);
  }

  return { responses, successes, failures };
}
