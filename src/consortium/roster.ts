import type { AgentSpec } from "./types.js";
import { ConfigurationError } from "../errors.js";

const INTEGER = /^\d+$/;

/** Upper bound on instances of one agent per round. */
export const MAX_INSTANCE_COUNT = 32;

/**
 * Parse roster entries into AgentSpecs.
 *
 * Each entry is `identifier` or `identifier:count`; entries may also be
 * comma-separated inside one string ("a:1,b:2"). The count follows the
 * last colon so identifiers may contain colons when a count is given
 * ("qwen3:8b:2"). Entries without a count take `defaultCount`.
 * Repeated identifiers are merged: counts add up, first position wins.
 *
 * Every bad entry is reported in one ConfigurationError.
 */
export function parseRoster(entries: string | readonly string[], defaultCount = 1): AgentSpec[] {
  if (!Number.isInteger(defaultCount) || defaultCount < 1 || defaultCount > MAX_INSTANCE_COUNT) {
    throw new ConfigurationError(`Default instance count must be an integer from 1 to ${MAX_INSTANCE_COUNT} (got ${defaultCount})`);
  }

  const items = (typeof entries === "string" ? [entries] : entries)
    .flatMap((e) => e.split(","))
    .map((e) => e.trim())
    .filter((e) => e.length > 0);

  const specs = new Map<string, AgentSpec>();
  const issues: string[] = [];

  for (const item of items) {
    const colon = item.lastIndexOf(":");
    let identifier = item;
    let count = defaultCount;

    if (colon >= 0) {
      identifier = item.slice(0, colon).trim();
      const countText = item.slice(colon + 1).trim();
      if (!INTEGER.test(countText) || Number(countText) < 1) {
        issues.push(`Invalid instance count for "${identifier}": "${countText}" (must be a positive integer)`);
        continue;
      }
      count = Number(countText);
    }

    if (identifier.length === 0) {
      issues.push(`Missing agent identifier in roster entry "${item}"`);
      continue;
    }

    const existing = specs.get(identifier);
    if (existing) {
      existing.instanceCount += count;
    } else {
      specs.set(identifier, { identifier, instanceCount: count });
    }
  }

  for (const spec of specs.values()) {
    if (spec.instanceCount > MAX_INSTANCE_COUNT) {
      issues.push(`Too many instances of "${spec.identifier}": ${spec.instanceCount} (at most ${MAX_INSTANCE_COUNT})`);
    }
  }

  if (issues.length > 0) throw new ConfigurationError(issues);
  if (specs.size === 0) throw new ConfigurationError("Roster is empty: at least one agent is required");

  return [...specs.values()];
}

/** Render a roster back to its entry syntax, e.g. "a:1,b:2". */
export function formatRoster(roster: readonly AgentSpec[]): string {
  return roster.map((s) => `${s.identifier}:${s.instanceCount}`).join(",");
}

/** Number of tasks dispatched per round. */
export function totalInstances(roster: readonly AgentSpec[]): number {
  return roster.reduce((sum, s) => sum + s.instanceCount, 0);
}
