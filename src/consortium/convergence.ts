import type { IterationRecord, OrchestrationConfig, RetentionPolicy } from "./types.js";

type ConvergenceBounds = Pick<OrchestrationConfig, "confidenceThreshold" | "minIterations" | "maxIterations">;

/**
 * Stop rule. Pure: the same inputs always give the same answer.
 *
 *   stop ⇔ (round ≥ minIterations ∧ confidence ≥ threshold) ∨ round ≥ maxIterations
 *
 * The arbiter's needsIteration flag is deliberately not an input.
 */
export function shouldStop(confidence: number, round: number, config: ConvergenceBounds): boolean {
  if (round >= config.maxIterations) return true;
  return round >= config.minIterations && confidence >= config.confidenceThreshold;
}

/**
 * Pick the round whose synthesis becomes the final answer.
 * "last": the round that stopped the loop. "best": highest confidence, earliest on ties.
 */
export function selectFinalIteration(history: readonly IterationRecord[], retention: RetentionPolicy): IterationRecord {
  if (history.length === 0) {
    throw new Error("selectFinalIteration: history is empty");
  }
  if (retention === "last") {
    return history[history.length - 1];
  }
  return history.reduce((best, record) =>
    record.synthesis.confidence > best.synthesis.confidence ? record : best
  );
}
