/**
 * Agent adapter interface.
 *
 * An adapter wraps one agent endpoint (CLI subprocess or HTTP API) and
 * gives the orchestrator a uniform way to send it a prompt. Adapters
 * return raw text only; structure is extracted by the consortium parser.
 */

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  /** Monetary cost if the adapter can report it (e.g. Claude returns total_cost_usd) */
  costUsd?: number;
}

export interface AgentReply {
  /** The agent's raw text response */
  content: string;
  /** Token usage for this invocation (if available from the agent) */
  tokens?: TokenUsage;
  /** Raw provider payload for debugging */
  raw?: unknown;
  /** Execution time in milliseconds */
  durationMs: number;
}

export type AdapterType = "cli" | "http";

/**
 * Calculate a dynamic timeout based on estimated response size.
 * CLI adapters have higher base but lower per-token cost.
 * HTTP adapters have lower base but allow longer max for large models.
 */
export function calculateTimeout(promptLength: number, type: AdapterType): number {
  const estimatedTokens = Math.ceil(promptLength / 4);
  if (type === "cli") {
    // base 30s + 20ms/token, max 5 min
    return Math.min(30_000 + estimatedTokens * 20, 300_000);
  }
  // http: base 15s + 15ms/token, max 10 min
  return Math.min(15_000 + estimatedTokens * 15, 600_000);
}

/**
 * Outer deadline for one invocation when no timeout is configured: the
 * larger of the CLI and HTTP estimates, whatever kind of adapter answers.
 */
export function invocationDeadline(promptLength: number): number {
  return Math.max(calculateTimeout(promptLength, "cli"), calculateTimeout(promptLength, "http"));
}

export interface AgentInvokeOptions {
  /** The prompt to send to the agent */
  prompt: string;
  /** Optional system prompt */
  systemPrompt?: string;
  /** Timeout in milliseconds */
  timeoutMs?: number;
  /** Aborts the in-flight request (orchestration cancelled or task timed out) */
  signal?: AbortSignal;
}

export interface IAgentAdapter {
  /** Unique name for this agent (e.g. "claude", "qwen") */
  readonly name: string;

  /** Check if the agent is reachable on this system */
  isAvailable(): Promise<boolean>;

  /** Invoke the agent with a prompt and return its raw reply */
  invoke(options: AgentInvokeOptions): Promise<AgentReply>;
}

/**
 * Agent Invocation Interface consumed by the consortium core.
 * Addresses agents by identifier; failures surface as AgentInvocationError.
 */
export interface AgentInvoker {
  invoke(agent: string, options: AgentInvokeOptions): Promise<AgentReply>;
}

export function addTokens(a: TokenUsage, b: TokenUsage): TokenUsage {
  return {
    inputTokens: a.inputTokens + b.inputTokens,
    outputTokens: a.outputTokens + b.outputTokens,
    costUsd: (a.costUsd ?? 0) + (b.costUsd ?? 0) || undefined,
  };
}

export function emptyTokens(): TokenUsage {
  return { inputTokens: 0, outputTokens: 0 };
}
