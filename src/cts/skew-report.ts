/**
 * Skew Report Extractor
 *
 * Reads ccopt.skew.rpt-like text into per-domain insertion delay and skew.
 * Expected lines (layout varies by tool version):
 *   Clock Domain: core_clk
 *   Average insertion delay: 1.82 ns
 *   Global skew: 125 ps
 */

import type { ClockDomainObservation } from "../types/timing.js";
import { parseNumber } from "./timing-log.js";

const DOMAIN_HEADER = /^(?:Clock\s*Domain|Domain)\s*:\s*(\S+)/i;
const INSERTION_LINE = /(?:Average\s+insertion\s+delay|Insertion\s+Delay)\s*:\s*([0-9.]+)\s*ns/i;
const SKEW_LINE = /(?:Global\s+skew|Skew)\s*:\s*([0-9.]+)\s*ps/i;

/**
 * Parser state threaded through the line fold
 */
export interface SkewParseState {
  current?: string;
  domains: ReadonlyMap<string, ClockDomainObservation>;
}

export const INITIAL_SKEW_STATE: SkewParseState = { domains: new Map() };

function withDomain(
  domains: ReadonlyMap<string, ClockDomainObservation>,
  observation: ClockDomainObservation
): ReadonlyMap<string, ClockDomainObservation> {
  return new Map(domains).set(observation.name, observation);
}

/**
 * Apply one report line to the parser state
 */
export function reduceSkewLine(state: SkewParseState, rawLine: string): SkewParseState {
  const line = rawLine.trim();

  const header = line.match(DOMAIN_HEADER);
  if (header) {
    const name = header[1];
    if (state.domains.has(name)) {
      return { ...state, current: name };
    }
    return { current: name, domains: withDomain(state.domains, { name }) };
  }

  if (state.current === undefined) return state;
  const existing = state.domains.get(state.current);
  if (!existing) return state;

  let updated = existing;

  const insertion = parseNumber(line.match(INSERTION_LINE)?.[1]);
  if (insertion !== undefined) {
    updated = { ...updated, avgInsertionNs: insertion };
  }

  const skew = parseNumber(line.match(SKEW_LINE)?.[1]);
  if (skew !== undefined) {
    updated = { ...updated, globalSkewPs: skew };
  }

  if (updated === existing) return state;
  return { ...state, domains: withDomain(state.domains, updated) };
}

/**
 * Parse a skew report. Map order is the order domain headers first appear.
 */
export function parseSkewReport(text: string): Map<string, ClockDomainObservation> {
  const final = text.split(/\r?\n/).reduce(reduceSkewLine, INITIAL_SKEW_STATE);
  return new Map(final.domains);
}
