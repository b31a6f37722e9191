import type { IAgentAdapter, AgentReply, AgentInvokeOptions, TokenUsage } from "./base.js";
import { calculateTimeout } from "./base.js";
import { httpRequest, parseJsonBody, isRecord } from "./http.js";
import type { AgentConfig } from "../config.js";
import { createLogger } from "../logger.js";

const log = createLogger("ollama");

interface OllamaGenerateResponse {
  response: string;
  done?: boolean;
  prompt_eval_count?: number;
  eval_count?: number;
}

function isGenerateResponse(value: unknown): value is OllamaGenerateResponse {
  return isRecord(value) && typeof value.response === "string";
}

function isTagList(value: unknown): value is { models?: Array<{ name: string }> } {
  return isRecord(value) && (value.models === undefined || Array.isArray(value.models));
}

/**
 * Adapter for Ollama via HTTP API.
 * Calls POST /api/generate on the configured endpoint.
 * Supports system prompts natively via Ollama's "system" field.
 */
export class OllamaAdapter implements IAgentAdapter {
  readonly name: string;
  private readonly model: string;
  readonly endpoint: string;

  constructor(config: AgentConfig) {
    this.name = config.name;
    this.model = config.model ?? "llama3";
    this.endpoint = (config.endpoint ?? "http://localhost:11434").replace(/\/+$/, "");
  }

  async isAvailable(): Promise<boolean> {
    try {
      const response = await httpRequest(this.name, "GET", `${this.endpoint}/api/tags`, { timeoutMs: 5000 });
      const data = parseJsonBody(this.name, response, isTagList);
      // Check if our specific model is pulled
      const available = data.models?.some((m) => m.name.startsWith(this.model)) ?? false;
      log.debug(this.name, "isAvailable:", available, "model=" + this.model);
      return available;
    } catch {
      log.debug(this.name, "isAvailable: false (connection failed)");
      return false;
    }
  }

  async invoke(options: AgentInvokeOptions): Promise<AgentReply> {
    const { prompt, systemPrompt, signal } = options;
    const timeoutMs = options.timeoutMs ?? calculateTimeout(prompt.length, "http");
    const start = Date.now();
    log.debug(this.name, "invoke start, model=" + this.model + ", prompt length:", prompt.length);

    const body = {
      model: this.model,
      prompt,
      ...(systemPrompt ? { system: systemPrompt } : {}),
      stream: false,
    };

    const raw = await httpRequest(this.name, "POST", `${this.endpoint}/api/generate`, { body, timeoutMs, signal });
    const durationMs = Date.now() - start;
    const parsed = parseJsonBody(this.name, raw, isGenerateResponse);

    // Ollama reports token counts directly; local models have no monetary cost
    const tokens: TokenUsage | undefined =
      parsed.prompt_eval_count !== undefined || parsed.eval_count !== undefined
        ? {
            inputTokens: parsed.prompt_eval_count ?? 0,
            outputTokens: parsed.eval_count ?? 0,
          }
        : undefined;

    log.info(this.name, "invoke complete:", durationMs + "ms" +
      (tokens ? `, ${tokens.inputTokens + tokens.outputTokens} tokens` : ""));

    return {
      content: parsed.response.trim(),
      tokens,
      raw: parsed,
      durationMs,
    };
  }
}
