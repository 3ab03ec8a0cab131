/**
 * Timing Log Extractor
 *
 * Pulls WNS/TNS and a hold-problem flag out of freeform Tempus/PrimeTime/OpenSTA
 * style logs. Nothing here throws: a miss leaves the field undefined.
 */

import type { TimingIndicators } from "../types/timing.js";

const NUMBER = String.raw`([+-]?\d+(?:\.\d+)?)`;

/**
 * Phrases that mark hold problems, compared against the lowercased log
 */
export const HOLD_NEEDLES: readonly string[] = [
  "hold violation",
  "negative hold slack",
  "slack (hold)",
  "hold slack (violated)",
];

/**
 * A way of finding WNS/TNS. Returns null when it does not apply to the text.
 */
export interface SlackStrategy {
  name: string;
  extract(text: string): TimingIndicators | null;
}

/**
 * Parse a captured number; anything non-finite counts as not found
 */
export function parseNumber(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * 'WNS: -0.120  TNS: -57.000' on one line
 */
export const combinedStrategy: SlackStrategy = {
  name: "combined",
  extract(text) {
    const match = text.match(new RegExp(`WNS:\\s*${NUMBER}\\s+TNS:\\s*${NUMBER}`, "i"));
    if (!match) return null;
    return { wns: parseNumber(match[1]), tns: parseNumber(match[2]) };
  },
};

/**
 * Standalone 'WNS:' and 'TNS:' markers anywhere in the text, each optional
 */
export const independentStrategy: SlackStrategy = {
  name: "independent",
  extract(text) {
    const wnsMatch = text.match(new RegExp(`WNS:\\s*${NUMBER}`, "i"));
    const tnsMatch = text.match(new RegExp(`TNS:\\s*${NUMBER}`, "i"));
    return { wns: parseNumber(wnsMatch?.[1]), tns: parseNumber(tnsMatch?.[1]) };
  },
};

/**
 * Strategies in precedence order
 */
export const SLACK_STRATEGIES: readonly SlackStrategy[] = [combinedStrategy, independentStrategy];

/**
 * Extract WNS/TNS using the first strategy that applies
 */
export function extractTimingIndicators(
  text: string,
  strategies: readonly SlackStrategy[] = SLACK_STRATEGIES
): TimingIndicators {
  for (const strategy of strategies) {
    const result = strategy.extract(text);
    if (result) return result;
  }
  return {};
}

/**
 * Rough hold-problem detection. False negatives are expected.
 */
export function detectHoldIssues(text: string, extraNeedles: readonly string[] = []): boolean {
  const lowered = text.toLowerCase();
  return [...HOLD_NEEDLES, ...extraNeedles]
    .map((needle) => needle.trim().toLowerCase())
    .filter((needle) => needle.length > 0)
    .some((needle) => lowered.includes(needle));
}
