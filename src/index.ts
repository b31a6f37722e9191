/**
 * Consortium — public API.
 *
 * Re-exports the orchestrator, its building blocks and the collaborators
 * (adapters, store) for programmatic use as a library.
 */

// --- Orchestration ---
export { ConsortiumOrchestrator, RunStateMachine } from "./orchestrator.js";
export type { OrchestratorDeps, OrchestrateOptions } from "./orchestrator.js";
export { OrchestrationEventBus } from "./consortium/events.js";
export type { StateChangedEvent, RoundCompletedEvent } from "./consortium/events.js";
export type {
  AgentSpec,
  AgentResponse,
  SynthesisResult,
  IterationRecord,
  OrchestrationConfig,
  OrchestrationState,
  ConsortiumResult,
  TokenReport,
} from "./consortium/types.js";

// --- Building blocks ---
export { parseRoster, formatRoster, totalInstances } from "./consortium/roster.js";
export { createOrchestrationConfig, normalizeConfidenceThreshold } from "./consortium/config.js";
export type { OrchestrationConfigInput } from "./consortium/config.js";
export { dispatch, expandRoster } from "./consortium/dispatcher.js";
export type { DispatchContext, DispatchOutcome, DispatchTask } from "./consortium/dispatcher.js";
export { synthesize, buildArbiterPrompt, buildIterationPrompt } from "./consortium/arbiter.js";
export { parseAgentResponse, parseSynthesis, parseConfidenceValue } from "./consortium/parser.js";
export { shouldStop, selectFinalIteration } from "./consortium/convergence.js";

// --- Errors ---
export {
  ConsortiumError,
  ConfigurationError,
  AgentInvocationError,
  AllAgentsFailedError,
  ArbiterFailedError,
  OrchestrationCancelledError,
} from "./errors.js";
export type { FailureKind, TaskFailure, ConsortiumErrorKind } from "./errors.js";

// --- Adapters ---
export { createAdapter, AgentRegistry } from "./adapters/index.js";
export type { IAgentAdapter, AgentReply, AgentInvokeOptions, AgentInvoker, TokenUsage } from "./adapters/base.js";
export type { RetryPolicy } from "./adapters/registry.js";

// --- Store ---
export { SqliteStore } from "./store/sqlite.js";
export type { IInteractionLog, IConsortiumStore, IRunReader, IStore } from "./store/interfaces.js";
export type { ConsortiumPreset, SavedConsortium, RunSummary, RunDetail } from "./store/types.js";

// --- Config ---
export { loadConfig, getUserDataDir } from "./config.js";
export type { Config, AgentConfig, JudgingMethod, RetentionPolicy } from "./config.js";
