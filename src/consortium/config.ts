import { z } from "zod";
import { JudgingMethodSchema, RetentionPolicySchema } from "../config.js";
import { ConfigurationError } from "../errors.js";
import type { OrchestrationConfig } from "./types.js";
import { MAX_INSTANCE_COUNT } from "./roster.js";

export const AgentSpecSchema = z.object({
  identifier: z.string().trim().min(1, "agent identifier must not be empty"),
  instanceCount: z.number().int("instance count must be an integer").min(1, "instance count must be at least 1")
    .max(MAX_INSTANCE_COUNT, `instance count must be at most ${MAX_INSTANCE_COUNT}`).default(1),
});

export const OrchestrationConfigSchema = z
  .object({
    roster: z.array(AgentSpecSchema).min(1, "roster must contain at least one agent"),
    arbiter: z.string().trim().min(1, "arbiter must be set"),
    confidenceThreshold: z.number().min(0).max(1).default(0.8),
    minIterations: z.number().int().min(1).default(1),
    maxIterations: z.number().int().min(1).default(3),
    systemPrompt: z.string().optional(),
    judgingMethod: JudgingMethodSchema.default("default"),
    retention: RetentionPolicySchema.default("last"),
    agentTimeoutMs: z.number().int().positive().optional(),
  })
  .refine((c) => c.maxIterations >= c.minIterations, {
    message: "maxIterations must be greater than or equal to minIterations",
    path: ["maxIterations"],
  });

export type OrchestrationConfigInput = z.input<typeof OrchestrationConfigSchema>;

/**
 * Validate and freeze an orchestration config.
 * Throws ConfigurationError listing every issue; nothing is dispatched on failure.
 */
export function createOrchestrationConfig(input: OrchestrationConfigInput): OrchestrationConfig {
  const parsed = OrchestrationConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
    );
  }

  const { roster, systemPrompt, agentTimeoutMs, ...rest } = parsed.data;
  // pick-one and rank select an answer in one round; only the minimum adds more.
  const maxIterations = rest.judgingMethod === "default" ? rest.maxIterations : rest.minIterations;
  return Object.freeze({
    ...rest,
    maxIterations,
    roster: Object.freeze(roster.map((s) => Object.freeze({ ...s }))),
    ...(systemPrompt !== undefined && systemPrompt.trim() !== "" ? { systemPrompt } : {}),
    ...(agentTimeoutMs !== undefined ? { agentTimeoutMs } : {}),
  });
}

/**
 * Accept a confidence threshold as a fraction or a percentage.
 * (1, 100] is read as a percentage; negatives and values above 100 are rejected.
 */
export function normalizeConfidenceThreshold(value: number): number {
  if (Number.isNaN(value)) {
    throw new ConfigurationError("Confidence threshold must be a number");
  }
  if (value < 0) {
    throw new ConfigurationError("Confidence threshold must be non-negative");
  }
  if (value > 1) {
    if (value <= 100) return value / 100;
    throw new ConfigurationError("Confidence threshold must be between 0.0 and 1.0 (or 0 and 100)");
  }
  return value;
}
