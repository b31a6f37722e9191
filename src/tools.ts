/**
 * MCP tool definitions (Zod schemas).
 *
 * - consortium_run: run a query through a consortium to convergence
 * - consortium_list: saved consortiums
 * - list_agents: configured agents and their availability
 */

import { z } from "zod";
import { JudgingMethodSchema, RetentionPolicySchema } from "./config.js";

export const ConsortiumRunInputSchema = z.object({
  prompt: z.string().min(1).describe("The question or task for the consortium"),
  consortium: z
    .string()
    .optional()
    .describe("Name of a saved consortium to start from"),
  models: z
    .array(z.string())
    .optional()
    .describe('Roster entries, "agent" or "agent:count" (default: from config)'),
  arbiter: z.string().optional().describe("Agent that synthesizes each round"),
  confidence_threshold: z
    .number()
    .min(0)
    .max(1)
    .optional()
    .describe("Stop once the arbiter's confidence reaches this value"),
  min_iterations: z.number().int().min(1).optional().describe("Rounds to run before checking confidence"),
  max_iterations: z.number().int().min(1).max(10).optional().describe("Hard ceiling on rounds"),
  system_prompt: z.string().optional().describe("Extra instructions for every agent and the arbiter"),
  judging_method: JudgingMethodSchema.optional().describe("default = synthesize, pick-one, or rank"),
  retention: RetentionPolicySchema.optional().describe("last = final round's answer, best = highest confidence round"),
  include_history: z
    .boolean()
    .default(false)
    .describe("Include every round's responses in the result"),
});

export const ConsortiumListInputSchema = z.object({});

export const ListAgentsInputSchema = z.object({});

export type ConsortiumRunInput = z.infer<typeof ConsortiumRunInputSchema>;
