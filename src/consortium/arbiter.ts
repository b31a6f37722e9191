/**
 * Arbiter — turn one round of agent responses into a synthesis.
 *
 * The arbiter sees every successful response of the round, numbered 1..k,
 * plus a summary of earlier rounds. It is invoked exactly once per round;
 * its failure is fatal to the run (ArbiterFailedError).
 */

import { invocationDeadline, type AgentInvoker, type TokenUsage } from "../adapters/base.js";
import type { AgentResponse, IterationRecord, OrchestrationConfig, SynthesisResult } from "./types.js";
import {
  parseSynthesis, parsePickOne, parseRank,
  type NumberedResponse,
} from "./parser.js";
import { arbiterTemplate, loadPrompt, renderTemplate } from "./prompts.js";
import { abortable, createDeadline } from "./abort.js";
import { ArbiterFailedError } from "../errors.js";
import { createLogger, type RunLog } from "../logger.js";

const log = createLogger("arbiter");

export interface ArbiterContext {
  invoker: AgentInvoker;
  config: OrchestrationConfig;
  round: number;
  signal?: AbortSignal;
  runLog?: RunLog | null;
}

export interface ArbiterOutcome {
  synthesis: SynthesisResult;
  prompt: string;
  tokens?: TokenUsage;
}

export function numberResponses(successes: readonly AgentResponse[]): NumberedResponse[] {
  return successes.map((r, i) => ({ id: i + 1, agent: r.agent, instance: r.instance, answer: r.answer }));
}

export function formatResponses(successes: readonly AgentResponse[]): string {
  return successes
    .map((r, i) => {
      const lines = [
        `<response id="${i + 1}" agent="${r.agent}" instance="${r.instance}">`,
        `<confidence>${r.confidence !== undefined ? r.confidence.toFixed(2) : "not reported"}</confidence>`,
      ];
      if (r.reasoning) lines.push(`<reasoning>\n${r.reasoning}\n</reasoning>`);
      lines.push(`<answer>\n${r.answer}\n</answer>`, "</response>");
      return lines.join("\n");
    })
    .join("\n\n");
}

export function formatHistory(history: readonly IterationRecord[]): string {
  if (history.length === 0) return "None: this is the first round.";
  return history
    .map((record) => {
      const s = record.synthesis;
      const areas = s.refinementAreas.length > 0 ? s.refinementAreas.map((a) => `- ${a}`).join("\n") : "none";
      return [
        `<iteration round="${record.round}">`,
        `<confidence>${s.confidence.toFixed(2)}</confidence>`,
        `<synthesis>\n${s.synthesis}\n</synthesis>`,
        `<refinement_areas>\n${areas}\n</refinement_areas>`,
        "</iteration>",
      ].join("\n");
    })
    .join("\n\n");
}

export function buildArbiterPrompt(
  query: string,
  successes: readonly AgentResponse[],
  history: readonly IterationRecord[],
  config: Pick<OrchestrationConfig, "judgingMethod" | "systemPrompt">
): string {
  return renderTemplate(arbiterTemplate(config.judgingMethod), {
    original_prompt: query,
    user_instructions: config.systemPrompt ?? "None.",
    formatted_history: formatHistory(history),
    formatted_responses: formatResponses(successes),
  });
}

/**
 * Parse the arbiter's reply according to the judging method.
 * A pick-one or rank reply that names no valid response is read as a
 * default synthesis instead.
 */
export function interpretArbiterReply(
  raw: string,
  method: OrchestrationConfig["judgingMethod"],
  numbered: readonly NumberedResponse[]
): SynthesisResult {
  if (method === "pick-one" || method === "rank") {
    const selected = method === "pick-one" ? parsePickOne(raw, numbered) : parseRank(raw, numbered);
    if (selected) return selected;
    log.warn(`${method} reply named no valid response, parsing it as a synthesis`);
  }

  const { confidenceReported, ...synthesis } = parseSynthesis(raw);
  if (!confidenceReported) {
    log.warn("arbiter reported no usable confidence, treating it as 0");
  }
  return synthesis;
}

/**
 * Invoke the arbiter once for this round. Never retried here.
 */
export async function synthesize(
  query: string,
  successes: readonly AgentResponse[],
  history: readonly IterationRecord[],
  ctx: ArbiterContext
): Promise<ArbiterOutcome> {
  const { config, round } = ctx;
  const prompt = buildArbiterPrompt(query, successes, history, config);
  ctx.runLog?.write("debug", `--- round ${round} arbiter prompt (${config.arbiter}, ${config.judgingMethod}) ---\n${prompt}`);

  const deadlineMs = config.agentTimeoutMs ?? invocationDeadline(prompt.length);
  const deadline = createDeadline(ctx.signal, deadlineMs);
  try {
    const reply = await abortable(
      ctx.invoker.invoke(config.arbiter, { prompt, timeoutMs: config.agentTimeoutMs, signal: deadline.signal }),
      deadline.signal
    );
    ctx.runLog?.write("debug", `--- round ${round} arbiter reply (${reply.durationMs}ms) ---\n${reply.content}`);

    const synthesis = interpretArbiterReply(reply.content, config.judgingMethod, numberResponses(successes));
    log.debug(`round ${round} synthesis: confidence=${synthesis.confidence.toFixed(2)}, needsIteration=${synthesis.needsIteration}`);

    return {
      synthesis: Object.freeze(synthesis),
      prompt,
      ...(reply.tokens ? { tokens: reply.tokens } : {}),
    };
  } catch (err) {
    const cause = deadline.timedOut() && !ctx.signal?.aborted
      ? new Error(`timed out after ${deadlineMs}ms`, { cause: err })
      : err;
    ctx.runLog?.write("error", `round ${round} arbiter failed: ${cause instanceof Error ? cause.message : String(cause)}`);
    throw new ArbiterFailedError(round, config.arbiter, cause);
  } finally {
    deadline.dispose();
  }
}

/**
 * Prompt for round r+1: the original query, the user's instructions, and
 * the arbiter's feedback from round r.
 */
export function buildIterationPrompt(query: string, previous: SynthesisResult, systemPrompt?: string): string {
  const areas = previous.refinementAreas.length > 0
    ? previous.refinementAreas.map((a) => `- ${a}`).join("\n")
    : "- No specific areas were named; strengthen the weakest parts of the answer.";
  return renderTemplate(loadPrompt("iteration"), {
    original_prompt: query,
    user_instructions: systemPrompt ?? "None.",
    previous_confidence: previous.confidence.toFixed(2),
    analysis: previous.analysis || "No analysis was given.",
    refinement_areas: areas,
  });
}
