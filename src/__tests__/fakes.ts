/**
 * In-process stand-ins for agents, shared by the test suites.
 */

import type { AgentInvoker, AgentInvokeOptions, AgentReply, IAgentAdapter } from "../adapters/base.js";
import { AgentInvocationError } from "../errors.js";

export type Script = (options: AgentInvokeOptions, call: number) => string | AgentReply | Promise<string | AgentReply>;

/** AgentInvoker answering from per-agent scripts; records every call. */
export class FakeInvoker implements AgentInvoker {
  readonly calls: Array<{ agent: string; options: AgentInvokeOptions }> = [];
  private readonly counts = new Map<string, number>();

  constructor(private readonly scripts: Record<string, Script | string>) {}

  async invoke(agent: string, options: AgentInvokeOptions): Promise<AgentReply> {
    this.calls.push({ agent, options });
    const call = (this.counts.get(agent) ?? 0) + 1;
    this.counts.set(agent, call);

    const script = this.scripts[agent];
    if (script === undefined) {
      throw new AgentInvocationError(agent, "provider", `no script for ${agent}`);
    }
    const out = typeof script === "string" ? script : await script(options, call);
    return typeof out === "string" ? { content: out, durationMs: 5 } : out;
  }

  callsTo(agent: string): AgentInvokeOptions[] {
    return this.calls.filter((c) => c.agent === agent).map((c) => c.options);
  }
}

/** IAgentAdapter backed by a script, for registry and server tests. */
export class FakeAdapter implements IAgentAdapter {
  calls = 0;

  constructor(readonly name: string, private readonly script: Script | string, private readonly available = true) {}

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  async invoke(options: AgentInvokeOptions): Promise<AgentReply> {
    this.calls++;
    const out = typeof this.script === "string" ? this.script : await this.script(options, this.calls);
    return typeof out === "string" ? { content: out, durationMs: 5 } : out;
  }
}

export function agentReply(answer: string, confidence?: number, reasoning?: string): string {
  return [
    reasoning !== undefined ? `<reasoning>${reasoning}</reasoning>` : "",
    `<answer>${answer}</answer>`,
    confidence !== undefined ? `<confidence>${confidence}</confidence>` : "",
  ].join("\n");
}

export interface ArbiterReplyFields {
  synthesis: string;
  confidence: number;
  analysis?: string;
  dissent?: string;
  needsIteration?: boolean;
  areas?: string[];
}

export function arbiterReply(fields: ArbiterReplyFields): string {
  return [
    `<synthesis>${fields.synthesis}</synthesis>`,
    `<confidence>${fields.confidence}</confidence>`,
    `<analysis>${fields.analysis ?? ""}</analysis>`,
    `<dissent>${fields.dissent ?? ""}</dissent>`,
    `<needs_iteration>${fields.needsIteration ?? false}</needs_iteration>`,
    `<refinement_areas>${(fields.areas ?? []).map((a) => `<area>${a}</area>`).join("")}</refinement_areas>`,
  ].join("\n");
}

/** A promise that never settles: an agent that hangs. */
export function hang(): Promise<never> {
  return new Promise<never>(() => {});
}
