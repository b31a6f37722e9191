/**
 * Typed errors for the consortium.
 *
 * Every error a caller can see extends ConsortiumError and carries a `kind`
 * so callers can branch without string matching:
 *
 *   configuration      — invalid roster, bounds, threshold or query (raised before dispatch)
 *   timeout/transport/provider/cancelled — one agent invocation failed (recovered per task)
 *   all-agents-failed  — every task of a round failed, the arbiter is never called
 *   arbiter-failed     — the arbiter invocation itself failed
 *   cancelled          — the caller aborted the orchestration
 */

export type FailureKind = "timeout" | "transport" | "provider" | "cancelled";

export type ConsortiumErrorKind =
  | "configuration"
  | FailureKind
  | "all-agents-failed"
  | "arbiter-failed";

export abstract class ConsortiumError extends Error {
  abstract readonly kind: ConsortiumErrorKind;
}

export class ConfigurationError extends ConsortiumError {
  readonly kind = "configuration" as const;
  readonly issues: string[];

  constructor(issues: string[] | string) {
    const list = Array.isArray(issues) ? issues : [issues];
    super(`Invalid configuration: ${list.join("; ")}`);
    this.name = "ConfigurationError";
    this.issues = list;
  }
}

export class AgentInvocationError extends ConsortiumError {
  readonly kind: FailureKind;
  readonly agent: string;
  /** True when the provider signalled a transient condition (rate limit, overload). */
  readonly retryable: boolean;

  constructor(agent: string, kind: FailureKind, message: string, options?: { retryable?: boolean; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "AgentInvocationError";
    this.agent = agent;
    this.kind = kind;
    this.retryable = options?.retryable ?? false;
  }
}

/** One failed dispatch task, as recorded in the round. */
export interface TaskFailure {
  agent: string;
  instance: number;
  kind: FailureKind;
  message: string;
}

export class AllAgentsFailedError extends ConsortiumError {
  readonly kind = "all-agents-failed" as const;
  readonly round: number;
  readonly failures: TaskFailure[];

  constructor(round: number, failures: TaskFailure[]) {
    const detail = failures
      .map((f) => `${f.agent}#${f.instance} (${f.kind}): ${f.message}`)
      .join("; ");
    super(`Round ${round}: all ${failures.length} agent tasks failed — ${detail}`);
    this.name = "AllAgentsFailedError";
    this.round = round;
    this.failures = failures;
  }
}

export class ArbiterFailedError extends ConsortiumError {
  readonly kind = "arbiter-failed" as const;
  readonly round: number;
  readonly arbiter: string;

  constructor(round: number, arbiter: string, cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super(`Round ${round}: arbiter "${arbiter}" failed — ${message}`, { cause });
    this.name = "ArbiterFailedError";
    this.round = round;
    this.arbiter = arbiter;
  }
}

export class OrchestrationCancelledError extends ConsortiumError {
  readonly kind = "cancelled" as const;
  readonly round: number;

  constructor(round: number) {
    super(`Orchestration cancelled during round ${round}`);
    this.name = "OrchestrationCancelledError";
    this.round = round;
  }
}

const TRANSPORT_CODES = new Set([
  "ECONNREFUSED", "ECONNRESET", "ENOTFOUND", "EAI_AGAIN", "EPIPE", "EHOSTUNREACH", "ENETUNREACH",
]);

/**
 * Map an arbitrary invocation error onto a failure kind.
 * Adapters throw AgentInvocationError; anything else is classified by shape.
 */
export function classifyFailure(err: unknown): FailureKind {
  if (err instanceof AgentInvocationError) return err.kind;
  if (err instanceof Error) {
    if (err.name === "TimeoutError") return "timeout";
    if (err.name === "AbortError") return "cancelled";
    const code = "code" in err && typeof err.code === "string" ? err.code : undefined;
    if (code === "ETIMEDOUT") return "timeout";
    if (code !== undefined && TRANSPORT_CODES.has(code)) return "transport";
  }
  return "provider";
}
