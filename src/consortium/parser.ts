/**
 * Tolerant extraction of tagged segments from agent and arbiter output.
 *
 * Agent output is untrusted free text: nothing here throws. A reply with
 * no recognizable structure degrades to "the whole text is the answer".
 */

import type { SynthesisResult } from "./types.js";

function escapeTag(tag: string): string {
  return tag.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Content of the first `<tag>…</tag>` segment (attributes allowed, case-insensitive), trimmed. */
export function extractTag(text: string, tag: string): string | undefined {
  const t = escapeTag(tag);
  const match = new RegExp(`<${t}(?:\\s[^>]*)?>([\\s\\S]*?)</${t}\\s*>`, "i").exec(text);
  return match ? match[1].trim() : undefined;
}

/** Contents of every `<tag>…</tag>` segment, trimmed, in document order. */
export function extractAllTags(text: string, tag: string): string[] {
  const t = escapeTag(tag);
  const re = new RegExp(`<${t}(?:\\s[^>]*)?>([\\s\\S]*?)</${t}\\s*>`, "gi");
  return [...text.matchAll(re)].map((m) => m[1].trim());
}

const CONFIDENCE_NUMBER = /^(\d+(?:\.\d+)?|\.\d+)\s*(%?)$/;

/**
 * Parse a confidence value into [0, 1].
 * "0.85" → 0.85, "85" → 0.85, "85%" → 0.85. Anything else, including
 * values above 100, is undefined, never 0.
 */
export function parseConfidenceValue(text: string): number | undefined {
  const match = CONFIDENCE_NUMBER.exec(text.trim());
  if (!match) return undefined;
  let value = parseFloat(match[1]);
  if (match[2] === "%" || value > 1) value = value / 100;
  return value >= 0 && value <= 1 ? value : undefined;
}

export interface ParsedAgentResponse {
  reasoning?: string;
  answer: string;
  confidence?: number;
}

/**
 * Extract {reasoning, answer, confidence} from one agent's raw reply.
 * Segments may come in any order. Without an <answer> segment the whole
 * reply is the answer and the other fields are absent.
 */
export function parseAgentResponse(raw: string): ParsedAgentResponse {
  const answer = extractTag(raw, "answer");
  if (answer === undefined) {
    return { answer: raw.trim() };
  }

  const reasoning = extractTag(raw, "reasoning");
  const confidenceText = extractTag(raw, "confidence");
  const confidence = confidenceText !== undefined ? parseConfidenceValue(confidenceText) : undefined;

  return {
    answer,
    ...(reasoning !== undefined ? { reasoning } : {}),
    ...(confidence !== undefined ? { confidence } : {}),
  };
}

const BULLET = /^(?:[-*•]|\d+[.)])\s+/;

function parseRefinementAreas(block: string): string[] {
  const areas = extractAllTags(block, "area");
  if (areas.length > 0) return areas.filter((a) => a.length > 0);
  return block
    .split("\n")
    .map((line) => line.trim().replace(BULLET, "").trim())
    .filter((line) => line.length > 0);
}

/**
 * Parse a default-method arbiter reply.
 * Missing synthesis → the whole reply; missing or unparsable confidence → 0.
 * `confidenceReported` tells the caller which one happened.
 */
export function parseSynthesis(raw: string): SynthesisResult & { confidenceReported: boolean } {
  const synthesis = extractTag(raw, "synthesis");
  const confidenceText = extractTag(raw, "confidence");
  const confidence = confidenceText !== undefined ? parseConfidenceValue(confidenceText) : undefined;
  const needsIteration = extractTag(raw, "needs_iteration");
  const areas = extractTag(raw, "refinement_areas");

  return {
    synthesis: synthesis ?? raw.trim(),
    confidence: confidence ?? 0,
    confidenceReported: confidence !== undefined,
    analysis: extractTag(raw, "analysis") ?? "",
    dissent: extractTag(raw, "dissent") ?? "",
    needsIteration: needsIteration !== undefined && /^(true|yes)$/i.test(needsIteration),
    refinementAreas: areas !== undefined ? parseRefinementAreas(areas) : [],
    raw,
  };
}

/** A successful response as numbered for the arbiter. */
export interface NumberedResponse {
  id: number;
  agent: string;
  instance: number;
  answer: string;
}

function selectionResult(raw: string, chosen: NumberedResponse, analysis: string): SynthesisResult {
  return {
    synthesis: chosen.answer,
    confidence: 1,
    analysis,
    dissent: "",
    needsIteration: false,
    refinementAreas: [],
    raw,
  };
}

/**
 * Parse a pick-one arbiter reply. Returns null when no <response_id>
 * names one of the numbered responses; the caller falls back to parseSynthesis.
 */
export function parsePickOne(raw: string, responses: readonly NumberedResponse[]): SynthesisResult | null {
  const idText = extractTag(raw, "response_id");
  if (idText === undefined || !/^\d+$/.test(idText)) return null;
  const id = Number(idText);
  const chosen = responses.find((r) => r.id === id);
  if (!chosen) return null;

  const analysis = extractTag(raw, "analysis")
    || `Arbiter selected response #${id} from ${chosen.agent}#${chosen.instance}.`;
  return { ...selectionResult(raw, chosen, analysis), chosenResponseId: id };
}

/**
 * Parse a rank arbiter reply. Ranks are ordered by their `position`
 * attribute (document order when absent). Returns null when the ranking
 * is missing or its top entry names no numbered response.
 */
export function parseRank(raw: string, responses: readonly NumberedResponse[]): SynthesisResult | null {
  const block = extractTag(raw, "ranking");
  if (block === undefined) return null;

  const ranks = [...block.matchAll(/<rank(?:\s+position\s*=\s*"(\d+)")?[^>]*>\s*(\d+)\s*<\/rank\s*>/gi)]
    .map((m, index) => ({ position: m[1] !== undefined ? Number(m[1]) : index + 1, id: Number(m[2]) }))
    .sort((a, b) => a.position - b.position);
  if (ranks.length === 0) return null;

  const ranking = ranks.map((r) => r.id);
  const top = responses.find((r) => r.id === ranking[0]);
  if (!top) return null;

  const analysis = extractTag(raw, "analysis")
    || `Arbiter ranked all responses. Top choice is #${top.id} from ${top.agent}#${top.instance}. Full ranking: ${ranking.join(", ")}`;
  return { ...selectionResult(raw, top, analysis), ranking };
}
