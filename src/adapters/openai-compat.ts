import type { IAgentAdapter, AgentReply, AgentInvokeOptions, TokenUsage } from "./base.js";
import { calculateTimeout } from "./base.js";
import { httpRequest, parseJsonBody, isRecord } from "./http.js";
import type { AgentConfig } from "../config.js";
import { resolveApiKey } from "../config.js";
import { AgentInvocationError } from "../errors.js";
import { createLogger } from "../logger.js";

const log = createLogger("openai-compat");

interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

interface ChatCompletionResponse {
  choices: Array<{
    message?: { role?: string; content?: string | null };
    finish_reason?: string;
  }>;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
  };
}

function isChatCompletion(value: unknown): value is ChatCompletionResponse {
  return isRecord(value) && Array.isArray(value.choices);
}

function isModelList(value: unknown): value is { data?: Array<{ id: string }> } {
  return isRecord(value) && (value.data === undefined || Array.isArray(value.data));
}

/** finish_reason values that mean the reply was cut off. */
const TRUNCATION_REASONS = ["length", "max_tokens"];

/**
 * Adapter for any OpenAI-compatible chat completions API.
 *
 * Works with: LM Studio, Ollama (/v1), vLLM, llama.cpp, LocalAI,
 * Groq, Mistral, Deepseek, Together AI, Fireworks, OpenAI.
 *
 * Uses the standard POST /v1/chat/completions endpoint.
 */
export class OpenAICompatAdapter implements IAgentAdapter {
  readonly name: string;
  readonly endpoint: string;
  private readonly apiKey: string | undefined;
  private readonly model: string;

  constructor(config: AgentConfig) {
    this.name = config.name;
    this.endpoint = (config.endpoint ?? "http://localhost:8000").replace(/\/+$/, "");
    this.apiKey = resolveApiKey(config);
    this.model = config.model ?? "default";
  }

  async isAvailable(): Promise<boolean> {
    try {
      const response = await httpRequest(this.name, "GET", `${this.endpoint}/v1/models`, {
        apiKey: this.apiKey,
        timeoutMs: 5000,
      });
      const data = parseJsonBody(this.name, response, isModelList);
      // Some providers don't list models — if we got a response, assume available
      if (!data.data) {
        log.debug(this.name, "isAvailable: true (endpoint responded, model list not checked)");
        return true;
      }
      const found = data.data.some((m) => m.id === this.model || m.id.includes(this.model));
      log.debug(this.name, "isAvailable:", found, "model=" + this.model);
      return found;
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

    const messages: ChatMessage[] = [];
    if (systemPrompt) {
      messages.push({ role: "system", content: systemPrompt });
    }
    messages.push({ role: "user", content: prompt });

    const url = `${this.endpoint}/v1/chat/completions`;
    const raw = await httpRequest(this.name, "POST", url, {
      body: { model: this.model, messages, stream: false },
      apiKey: this.apiKey,
      timeoutMs,
      signal,
    });
    const durationMs = Date.now() - start;

    const parsed = parseJsonBody(this.name, raw, isChatCompletion);
    const choice = parsed.choices[0];
    if (!choice) {
      throw new AgentInvocationError(this.name, "provider", `${this.name}: empty response from ${url}`);
    }

    if (choice.finish_reason && TRUNCATION_REASONS.includes(choice.finish_reason.toLowerCase())) {
      log.warn(this.name, "response truncated, finish_reason=" + choice.finish_reason);
    }

    // Cost is not available from most OpenAI-compatible APIs
    const tokens: TokenUsage | undefined = parsed.usage
      ? {
          inputTokens: parsed.usage.prompt_tokens ?? 0,
          outputTokens: parsed.usage.completion_tokens ?? 0,
        }
      : undefined;

    log.info(this.name, "invoke complete:", durationMs + "ms" +
      (tokens ? `, ${tokens.inputTokens + tokens.outputTokens} tokens` : ""));

    return {
      content: (choice.message?.content ?? "").trim(),
      tokens,
      raw: parsed,
      durationMs,
    };
  }
}
