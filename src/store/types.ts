/**
 * Store types: the interaction log (runs and their rounds) and named
 * consortiums (saved orchestration presets).
 */

import { z } from "zod";
import { JudgingMethodSchema, RetentionPolicySchema } from "../config.js";
import type { IterationRecord, OrchestrationConfig, TokenReport } from "../consortium/types.js";

export type RunStatus = "running" | "completed" | "failed" | "cancelled";

export interface RunStart {
  id: string;
  query: string;
  config: OrchestrationConfig;
  startedAt: string;
}

export interface RunFinish {
  status: Exclude<RunStatus, "running">;
  finishedAt: string;
  finalRound?: number;
  confidence?: number;
  synthesis?: string;
  /** ConsortiumError kind, or "internal" */
  errorKind?: string;
  error?: string;
  tokens?: TokenReport;
}

export interface RunSummary {
  id: string;
  query: string;
  status: RunStatus;
  rounds: number;
  confidence: number | null;
  startedAt: string;
  finishedAt: string | null;
}

export interface RunDetail extends RunSummary {
  config: OrchestrationConfig;
  synthesis: string | null;
  finalRound: number | null;
  errorKind: string | null;
  error: string | null;
  iterations: IterationRecord[];
}

/**
 * A named consortium: everything needed to rebuild an OrchestrationConfig.
 * The roster is kept in entry syntax ("id:count").
 */
export const ConsortiumPresetSchema = z.object({
  models: z.array(z.string().min(1)).min(1),
  arbiter: z.string().min(1),
  confidenceThreshold: z.number().min(0).max(1),
  minIterations: z.number().int().min(1),
  maxIterations: z.number().int().min(1),
  systemPrompt: z.string().optional(),
  judgingMethod: JudgingMethodSchema,
  retention: RetentionPolicySchema,
  agentTimeoutMs: z.number().int().positive().optional(),
});

export type ConsortiumPreset = z.infer<typeof ConsortiumPresetSchema>;

export interface SavedConsortium {
  name: string;
  preset: ConsortiumPreset;
  createdAt: string;
  updatedAt: string;
}

const CONSORTIUM_NAME = /^[a-zA-Z0-9][a-zA-Z0-9_.-]{0,63}$/;

export function isValidConsortiumName(name: string): boolean {
  return CONSORTIUM_NAME.test(name);
}
