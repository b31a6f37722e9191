import { describe, it, expect } from "vitest";
import { shouldStop, selectFinalIteration } from "../consortium/convergence.js";
import type { IterationRecord } from "../consortium/types.js";

const bounds = { confidenceThreshold: 0.8, minIterations: 2, maxIterations: 4 };

function record(round: number, confidence: number): IterationRecord {
  return {
    round,
    prompt: `prompt ${round}`,
    responses: [],
    synthesis: {
      synthesis: `answer ${round}`,
      confidence,
      analysis: "",
      dissent: "",
      needsIteration: false,
      refinementAreas: [],
      raw: "",
    },
  };
}

describe("shouldStop", () => {
  it.each([
    // confidence, round, expected
    [0.95, 1, false], // below minIterations
    [0.79, 2, false],
    [0.8, 2, true], // threshold is inclusive
    [0.9, 3, true],
    [0.1, 3, false],
    [0.1, 4, true], // maxIterations is a hard ceiling
    [0, 5, true],
  ])("confidence %s at round %s → %s", (confidence, round, expected) => {
    expect(shouldStop(confidence, round, bounds)).toBe(expected);
  });

  it("stops after exactly k rounds when min = max = k", () => {
    const fixed = { confidenceThreshold: 1, minIterations: 3, maxIterations: 3 };
    expect([1, 2, 3].map((r) => shouldStop(0, r, fixed))).toEqual([false, false, true]);
  });

  it("gives the same answer for the same inputs", () => {
    const first = shouldStop(0.8, 2, bounds);
    for (let i = 0; i < 5; i++) expect(shouldStop(0.8, 2, bounds)).toBe(first);
  });

  it("always stops somewhere in [minIterations, maxIterations]", () => {
    for (let min = 1; min <= 3; min++) {
      for (let max = min; max <= 5; max++) {
        for (const confidence of [0, 0.5, 0.8, 1]) {
          const config = { confidenceThreshold: 0.8, minIterations: min, maxIterations: max };
          let round = 1;
          while (!shouldStop(confidence, round, config)) round++;
          expect(round).toBeGreaterThanOrEqual(min);
          expect(round).toBeLessThanOrEqual(max);
        }
      }
    }
  });
});

describe("selectFinalIteration", () => {
  const history = [record(1, 0.6), record(2, 0.9), record(3, 0.7)];

  it("last: the final round", () => {
    expect(selectFinalIteration(history, "last").round).toBe(3);
  });

  it("best: the highest-confidence round", () => {
    expect(selectFinalIteration(history, "best").round).toBe(2);
  });

  it("best: earliest round wins a tie", () => {
    expect(selectFinalIteration([record(1, 0.9), record(2, 0.9)], "best").round).toBe(1);
  });

  it("throws on an empty history", () => {
    expect(() => selectFinalIteration([], "last")).toThrow(/history is empty/);
  });
});
