/**
 * ConsortiumOrchestrator — runs one query through repeated rounds of
 * dispatch → synthesis → convergence check until the stop rule fires.
 *
 * Responsibilities:
 * - Validate the orchestration config once, at construction
 * - Drive the per-run state machine (illegal transitions throw)
 * - Build each follow-up prompt from the arbiter's feedback
 * - Track token usage per agent, arbiter included
 * - Feed the interaction log without ever waiting on it
 * - Surface exactly one terminal outcome: a ConsortiumResult or one typed error
 */

import { randomUUID } from "node:crypto";
import type { AgentInvoker, TokenUsage } from "./adapters/base.js";
import { addTokens, emptyTokens } from "./adapters/base.js";
import type {
  ConsortiumResult,
  IterationRecord,
  OrchestrationConfig,
  OrchestrationState,
  TokenReport,
} from "./consortium/types.js";
import { createOrchestrationConfig, type OrchestrationConfigInput } from "./consortium/config.js";
import { dispatch } from "./consortium/dispatcher.js";
import { synthesize, buildIterationPrompt } from "./consortium/arbiter.js";
import { shouldStop, selectFinalIteration } from "./consortium/convergence.js";
import { loadPrompt } from "./consortium/prompts.js";
import { formatRoster, totalInstances } from "./consortium/roster.js";
import { OrchestrationEventBus } from "./consortium/events.js";
import type { IInteractionLog } from "./store/interfaces.js";
import type { RunFinish } from "./store/types.js";
import {
  AllAgentsFailedError,
  ConfigurationError,
  ConsortiumError,
  OrchestrationCancelledError,
} from "./errors.js";
import { createLogger, createRunLog, isValidRunId, type RunLog } from "./logger.js";

const log = createLogger("orchestrator");

const TRANSITIONS: Readonly<Record<OrchestrationState, readonly OrchestrationState[]>> = {
  dispatching: ["synthesizing", "failed"],
  synthesizing: ["evaluating", "failed"],
  evaluating: ["continuing", "done", "failed"],
  continuing: ["dispatching"],
  done: [],
  failed: [],
};

/** Per-run state machine. A run starts in "dispatching". */
export class RunStateMachine {
  private current: OrchestrationState | null = null;

  constructor(
    private readonly runId: string,
    private readonly events?: OrchestrationEventBus,
    private readonly runLog?: RunLog | null
  ) {}

  get state(): OrchestrationState | null {
    return this.current;
  }

  canTransition(next: OrchestrationState): boolean {
    if (this.current === null) return next === "dispatching";
    return TRANSITIONS[this.current].includes(next);
  }

  transition(next: OrchestrationState, round: number): void {
    if (!this.canTransition(next)) {
      throw new Error(`Illegal state transition: ${this.current ?? "(start)"} → ${next}`);
    }
    const from = this.current;
    this.current = next;
    log.debug(`run ${this.runId} round ${round}: ${from ?? "(start)"} → ${next}`);
    this.runLog?.write("debug", `state ${from ?? "(start)"} → ${next} (round ${round})`);
    this.events?.emitState({ runId: this.runId, round, from, to: next });
  }
}

class TokenTracker {
  private total = emptyTokens();
  private readonly perAgent = new Map<string, TokenUsage>();

  add(agent: string, tokens: TokenUsage | undefined): void {
    if (!tokens) return;
    this.total = addTokens(this.total, tokens);
    this.perAgent.set(agent, addTokens(this.perAgent.get(agent) ?? emptyTokens(), tokens));
  }

  report(): TokenReport {
    return { total: this.total, perAgent: Object.fromEntries(this.perAgent) };
  }
}

function totalTokenCount(t: TokenUsage): number {
  return t.inputTokens + t.outputTokens;
}

export interface OrchestratorDeps {
  invoker: AgentInvoker;
  /** Audit sink; written fire-and-forget */
  interactionLog?: IInteractionLog;
  events?: OrchestrationEventBus;
}

export interface OrchestrateOptions {
  /** Cancels every in-flight invocation and any later round */
  signal?: AbortSignal;
  /** Defaults to a random UUID */
  runId?: string;
}

export class ConsortiumOrchestrator {
  readonly config: OrchestrationConfig;
  readonly events: OrchestrationEventBus;
  private readonly invoker: AgentInvoker;
  private readonly interactionLog: IInteractionLog | null;
  /** Serializes log writes so records land in round order */
  private logChain: Promise<void> = Promise.resolve();

  /** @throws ConfigurationError synchronously when the config is invalid */
  constructor(config: OrchestrationConfigInput, deps: OrchestratorDeps) {
    this.config = createOrchestrationConfig(config);
    this.invoker = deps.invoker;
    this.interactionLog = deps.interactionLog ?? null;
    this.events = deps.events ?? new OrchestrationEventBus();
  }

  /** Resolves once every log write queued so far has settled. Never rejects. */
  flushLog(): Promise<void> {
    return this.logChain;
  }

  private record(what: string, write: (sink: IInteractionLog) => Promise<void>): void {
    const sink = this.interactionLog;
    if (!sink) return;
    this.logChain = this.logChain
      .then(() => write(sink))
      .catch((err: unknown) => {
        log.warn(`interaction log ${what} failed:`, err instanceof Error ? err.message : String(err));
      });
  }

  private agentSystemPrompt(): string {
    return [loadPrompt("system"), this.config.systemPrompt]
      .filter((p): p is string => p !== undefined && p.length > 0)
      .join("\n\n");
  }

  /**
   * Run the query to convergence.
   *
   * @throws ConfigurationError for an empty query or an unusable runId (nothing is dispatched)
   * @throws AllAgentsFailedError when no task of a round succeeds
   * @throws ArbiterFailedError when the arbiter invocation fails
   * @throws OrchestrationCancelledError when `signal` aborts
   */
  async orchestrate(query: string, options: OrchestrateOptions = {}): Promise<ConsortiumResult> {
    if (query.trim() === "") {
      throw new ConfigurationError("Query must not be empty");
    }
    const runId = options.runId ?? randomUUID();
    if (!isValidRunId(runId)) {
      throw new ConfigurationError(`Invalid run ID: "${runId}". Must be alphanumeric/hyphens/underscores, max 128 chars.`);
    }

    const { config } = this;
    const { signal } = options;
    const start = Date.now();

    const rlog = createRunLog(runId);
    rlog?.write("info", `run ${runId} | query: ${query}`);
    rlog?.write("info", `roster: ${formatRoster(config.roster)} | arbiter: ${config.arbiter} | threshold: ${config.confidenceThreshold} | iterations: ${config.minIterations}-${config.maxIterations} | judging: ${config.judgingMethod} | retention: ${config.retention}`);
    log.info(`run ${runId} start: ${totalInstances(config.roster)} tasks/round, arbiter=${config.arbiter}`);

    this.record("beginRun", (sink) => sink.beginRun({ id: runId, query, config, startedAt: new Date().toISOString() }));

    const machine = new RunStateMachine(runId, this.events, rlog);
    const history: IterationRecord[] = [];
    const tokens = new TokenTracker();
    const systemPrompt = this.agentSystemPrompt();

    let round = 1;
    let prompt = query;

    try {
      for (;;) {
        machine.transition("dispatching", round);
        if (signal?.aborted) throw new OrchestrationCancelledError(round);
        log.info(`round ${round}/${config.maxIterations} start`);

        const outcome = await dispatch(prompt, config.roster, {
          invoker: this.invoker,
          systemPrompt,
          timeoutMs: config.agentTimeoutMs,
          signal,
          runLog: rlog,
        });
        if (signal?.aborted) throw new OrchestrationCancelledError(round);
        for (const r of outcome.successes) tokens.add(r.agent, r.tokens);

        if (outcome.successes.length === 0) {
          throw new AllAgentsFailedError(round, outcome.failures);
        }

        machine.transition("synthesizing", round);
        const arbiter = await synthesize(query, outcome.successes, history, {
          invoker: this.invoker,
          config,
          round,
          signal,
          runLog: rlog,
        }).catch((err: unknown) => {
          throw signal?.aborted ? new OrchestrationCancelledError(round) : err;
        });
        tokens.add(config.arbiter, arbiter.tokens);

        machine.transition("evaluating", round);
        const record: IterationRecord = Object.freeze({
          round,
          prompt,
          responses: Object.freeze([...outcome.responses]),
          synthesis: arbiter.synthesis,
        });
        history.push(record);
        this.record("append", (sink) => sink.append(runId, record));

        const confidence = arbiter.synthesis.confidence;
        const stop = shouldStop(confidence, round, config);
        log.info(`round ${round} confidence ${confidence.toFixed(2)} (threshold ${config.confidenceThreshold}) → ${stop ? "stop" : "continue"}`);
        rlog?.write("info", `round ${round} complete: confidence ${confidence.toFixed(2)}, ${outcome.successes.length}/${outcome.responses.length} tasks ok, running tokens: ${totalTokenCount(tokens.report().total)}`);
        this.events.emitRound({ runId, record, stop });

        if (stop) {
          machine.transition("done", round);
          break;
        }

        const nextPrompt = buildIterationPrompt(query, arbiter.synthesis, config.systemPrompt);
        machine.transition("continuing", round);
        prompt = nextPrompt;
        round++;
      }
    } catch (err) {
      if (machine.canTransition("failed")) machine.transition("failed", round);
      const message = err instanceof Error ? err.message : String(err);
      const errorKind = err instanceof ConsortiumError ? err.kind : "internal";
      log.error(`run ${runId} failed in round ${round} (${errorKind}):`, message);
      rlog?.write("error", `run failed in round ${round} (${errorKind}): ${message}`);

      const finish: RunFinish = {
        status: err instanceof OrchestrationCancelledError ? "cancelled" : "failed",
        finishedAt: new Date().toISOString(),
        errorKind,
        error: message,
        tokens: tokens.report(),
      };
      this.record("finishRun", (sink) => sink.finishRun(runId, finish));
      throw err;
    }

    const final = selectFinalIteration(history, config.retention);
    if (final.round !== round) {
      log.info(`retention "${config.retention}": reporting round ${final.round} of ${round}`);
    }
    const s = final.synthesis;
    const report = tokens.report();
    const durationMs = Date.now() - start;

    this.record("finishRun", (sink) => sink.finishRun(runId, {
      status: "completed",
      finishedAt: new Date().toISOString(),
      finalRound: final.round,
      confidence: s.confidence,
      synthesis: s.synthesis,
      tokens: report,
    }));
    log.info(`run ${runId} done: ${round} rounds, confidence ${s.confidence.toFixed(2)}, ${totalTokenCount(report.total)} tokens, ${durationMs}ms`);
    rlog?.write("info", `run complete: ${round} rounds, final round ${final.round}, confidence ${s.confidence.toFixed(2)}, ${durationMs}ms\n--- synthesis ---\n${s.synthesis}`);

    return {
      runId,
      query,
      synthesis: s.synthesis,
      confidence: s.confidence,
      analysis: s.analysis,
      dissent: s.dissent,
      refinementAreas: [...s.refinementAreas],
      needsIteration: s.needsIteration,
      rawArbiterResponse: s.raw,
      finalRound: final.round,
      iterations: Object.freeze([...history]),
      tokens: report,
      durationMs,
    };
  }
}
