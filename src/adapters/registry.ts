import type { IAgentAdapter, AgentInvoker, AgentInvokeOptions, AgentReply } from "./base.js";
import { Backoff } from "./backoff.js";
import { AgentInvocationError, ConfigurationError, classifyFailure } from "../errors.js";
import { createLogger } from "../logger.js";

const log = createLogger("registry");

export interface RetryPolicy {
  /** Total attempts per invocation, including the first. */
  maxAttempts: number;
  baseMs: number;
  maxMs: number;
}

const NO_RETRY: RetryPolicy = { maxAttempts: 1, baseMs: 0, maxMs: 0 };

/**
 * Maps agent identifiers to adapters and implements the Agent Invocation
 * Interface for the consortium core.
 *
 * Retry lives here, not in the core: retryable provider errors (rate
 * limits, overload) are retried with exponential backoff up to
 * `maxAttempts`. Timeouts, transport errors and cancellations are not.
 */
export class AgentRegistry implements AgentInvoker {
  private readonly adapters = new Map<string, IAgentAdapter>();
  private readonly retry: RetryPolicy;

  constructor(adapters: Iterable<IAgentAdapter>, retry?: RetryPolicy) {
    for (const adapter of adapters) {
      if (this.adapters.has(adapter.name)) {
        throw new ConfigurationError(`Duplicate agent name: "${adapter.name}"`);
      }
      this.adapters.set(adapter.name, adapter);
    }
    this.retry = retry ?? NO_RETRY;
  }

  get names(): string[] {
    return [...this.adapters.keys()];
  }

  has(name: string): boolean {
    return this.adapters.has(name);
  }

  get(name: string): IAgentAdapter | undefined {
    return this.adapters.get(name);
  }

  /**
   * Throw a ConfigurationError naming every identifier with no adapter.
   * Call before orchestrating so unknown agents never reach dispatch.
   */
  assertKnown(names: Iterable<string>): void {
    const unknown = [...new Set(names)].filter((n) => !this.adapters.has(n));
    if (unknown.length > 0) {
      const available = this.names.join(", ") || "(none)";
      throw new ConfigurationError(
        unknown.map((n) => `Unknown agent: "${n}". Available: ${available}`)
      );
    }
  }

  async invoke(agent: string, options: AgentInvokeOptions): Promise<AgentReply> {
    const adapter = this.adapters.get(agent);
    if (!adapter) {
      throw new AgentInvocationError(agent, "provider", `No adapter registered for agent "${agent}"`);
    }

    const backoff = new Backoff({ baseMs: this.retry.baseMs, maxMs: this.retry.maxMs });
    for (let attempt = 1; ; attempt++) {
      try {
        return await adapter.invoke(options);
      } catch (err) {
        const retryable = err instanceof AgentInvocationError && err.retryable;
        if (!retryable || attempt >= this.retry.maxAttempts || options.signal?.aborted) {
          if (err instanceof AgentInvocationError) throw err;
          const message = err instanceof Error ? err.message : String(err);
          throw new AgentInvocationError(agent, classifyFailure(err), message, { cause: err });
        }
        log.warn(`${agent}: retryable failure (attempt ${attempt}/${this.retry.maxAttempts}), backing off`);
        await backoff.wait(options.signal);
      }
    }
  }
}
