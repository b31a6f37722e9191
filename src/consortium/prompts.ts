import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import type { JudgingMethod } from "./types.js";

/**
 * Prompt templates live in <package>/prompts/ as plain files so they can be
 * tuned without touching code. Placeholders are `{name}`; unknown
 * placeholders are left as-is.
 */

export type PromptName = "system" | "arbiter" | "pick-one" | "rank" | "iteration";

const FILES: Record<PromptName, string> = {
  system: "system.txt",
  arbiter: "arbiter.xml",
  "pick-one": "pick-one.xml",
  rank: "rank.xml",
  iteration: "iteration.txt",
};

// src/consortium/ and dist/consortium/ both sit two levels below the package root
const PROMPTS_DIR = new URL("../../prompts/", import.meta.url);

const cache = new Map<PromptName, string>();

export function loadPrompt(name: PromptName): string {
  const cached = cache.get(name);
  if (cached !== undefined) return cached;
  const text = readFileSync(fileURLToPath(new URL(FILES[name], PROMPTS_DIR)), "utf-8").trim();
  cache.set(name, text);
  return text;
}

export function arbiterTemplate(method: JudgingMethod): string {
  switch (method) {
    case "pick-one": return loadPrompt("pick-one");
    case "rank": return loadPrompt("rank");
    case "default": return loadPrompt("arbiter");
  }
}

/** Replace `{key}` placeholders in a single pass; substituted text is never re-scanned. */
export function renderTemplate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{([a-z_]+)\}/g, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(vars, key) ? vars[key] : match
  );
}
