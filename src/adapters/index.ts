import type { IAgentAdapter } from "./base.js";
import type { AgentConfig } from "../config.js";
import { ClaudeAdapter } from "./claude.js";
import { OllamaAdapter } from "./ollama.js";
import { OpenAICompatAdapter } from "./openai-compat.js";
import { ConfigurationError } from "../errors.js";
import { createLogger } from "../logger.js";

const log = createLogger("adapters");

/**
 * Create the right adapter based on agent config.
 *
 * Selection order:
 * 1. Explicit `type` field (if set)
 * 2. Auto-detect: `model` → Ollama, `command` → CLI
 */
export function createAdapter(config: AgentConfig): IAgentAdapter {
  switch (config.type) {
    case "openai-compat":
      log.debug("creating OpenAICompatAdapter for", config.name, "model=" + config.model);
      return new OpenAICompatAdapter(config);
    case "ollama":
      log.debug("creating OllamaAdapter for", config.name, "model=" + config.model);
      return new OllamaAdapter(config);
    case "cli":
      log.debug("creating CLI adapter for", config.name, "command=" + config.command);
      return new ClaudeAdapter(config);
    case undefined:
      break;
  }

  if (config.model) {
    log.debug("creating OllamaAdapter for", config.name, "model=" + config.model);
    return new OllamaAdapter(config);
  }

  if (config.command) {
    log.debug("creating CLI adapter for", config.name, "command=" + config.command);
    return new ClaudeAdapter(config);
  }

  throw new ConfigurationError(
    `Agent "${config.name}": must have "type", "command" (CLI), or "model" (Ollama/OpenAI-compat) configured.`
  );
}

export { ClaudeAdapter } from "./claude.js";
export { OllamaAdapter } from "./ollama.js";
export { OpenAICompatAdapter } from "./openai-compat.js";
export { AgentRegistry } from "./registry.js";
export type { IAgentAdapter, AgentReply, AgentInvokeOptions, AgentInvoker, TokenUsage } from "./base.js";
