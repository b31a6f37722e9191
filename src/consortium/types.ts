/**
 * Consortium data model.
 *
 * Everything produced during a run is frozen once created: responses
 * belong to the round that made them, a round record is immutable once
 * the round completes, and the history is only ever appended to.
 */

import type { TokenUsage } from "../adapters/base.js";
import type { TaskFailure } from "../errors.js";
import type { JudgingMethod, RetentionPolicy } from "../config.js";

export type { TaskFailure, FailureKind } from "../errors.js";
export type { JudgingMethod, RetentionPolicy } from "../config.js";

export interface AgentSpec {
  identifier: string;
  instanceCount: number;
}

export interface AgentResponse {
  agent: string;
  /** 1-based index among the instances of `agent` in this round */
  instance: number;
  reasoning?: string;
  answer: string;
  /** Self-reported confidence in [0, 1]; undefined when the agent gave none */
  confidence?: number;
  raw: string;
  durationMs: number;
  tokens?: TokenUsage;
  error?: TaskFailure;
}

export interface SynthesisResult {
  synthesis: string;
  /** Authoritative confidence for convergence, in [0, 1] */
  confidence: number;
  analysis: string;
  /** Arbiter's own view on iterating again. Advisory only. */
  needsIteration: boolean;
  refinementAreas: string[];
  dissent: string;
  /** Unparsed arbiter reply */
  raw: string;
  /** pick-one: id of the chosen response */
  chosenResponseId?: number;
  /** rank: response ids, best first */
  ranking?: number[];
}

export interface IterationRecord {
  round: number;
  prompt: string;
  responses: readonly AgentResponse[];
  synthesis: SynthesisResult;
}

export interface OrchestrationConfig {
  roster: readonly AgentSpec[];
  arbiter: string;
  confidenceThreshold: number;
  minIterations: number;
  maxIterations: number;
  systemPrompt?: string;
  judgingMethod: JudgingMethod;
  retention: RetentionPolicy;
  /** Per-invocation timeout for agents and the arbiter */
  agentTimeoutMs?: number;
}

export type OrchestrationState =
  | "dispatching"
  | "synthesizing"
  | "evaluating"
  | "continuing"
  | "done"
  | "failed";

export interface TokenReport {
  total: TokenUsage;
  /** Keyed by agent identifier; the arbiter is included under its own name */
  perAgent: Record<string, TokenUsage>;
}

/** Caller-facing payload of a completed orchestration. */
export interface ConsortiumResult {
  runId: string;
  query: string;
  synthesis: string;
  confidence: number;
  analysis: string;
  dissent: string;
  refinementAreas: string[];
  needsIteration: boolean;
  rawArbiterResponse: string;
  /** Round whose synthesis is reported (differs from the last round only under "best" retention) */
  finalRound: number;
  iterations: readonly IterationRecord[];
  tokens: TokenReport;
  durationMs: number;
}
