/**
 * Domain Recommendation Policy
 *
 * Heuristics for one clock domain:
 * - Setup failing (WNS < -0.02): lower insertion delay 10-15% and tighten skew.
 * - Hold issues: raise insertion delay ~8% and allow a little more skew.
 * - Global skew above 120 ps: tighten the skew target.
 * Rules run in that order and compound; guardrails are applied last.
 */

import type { DomainRecommendation } from "../types/timing.js";

export const BASELINE_INSERTION_NS = 1.5;
export const BASELINE_SKEW_PS = 80.0;

export const INSERTION_BAND_NS = { min: 0.6, max: 2.2 } as const;
export const SKEW_BAND_PS = { min: 60.0, max: 120.0 } as const;

const SETUP_FAIL_WNS = -0.02;
const SEVERE_SETUP_WNS = -0.1;
const SETUP_INSERTION_FLOOR_NS = 0.7;
const TIGHT_SKEW_PS = 70.0;
const HOLD_INSERTION_FACTOR = 1.08;
const HOLD_SKEW_PS = 90.0;
const HIGH_GLOBAL_SKEW_PS = 120.0;

export const IMPLEMENTATION_HINTS: readonly string[] = [
  "Reduce max_transition on long spines; upsize root buffers if latency balloons.",
  "Constrain ccopt with tighter -target_skew where failing, and adjust -max_insertion_delay accordingly.",
  "Rebalance CTS levels on critical domains; avoid over-buffering near sinks.",
  "Re-run STA (setup/hold) across worst/best PVT corners after CTS tweak.",
];

/**
 * Everything the policy looks at for one domain
 */
export interface PolicyInput {
  domain: string;
  wns?: number;
  holdIssues: boolean;
  avgInsertionNs?: number;
  globalSkewPs?: number;
}

/**
 * Running targets while rules are applied
 */
export interface PolicyState {
  insertionNs: number;
  skewPs: number;
  notes: readonly string[];
}

export type PolicyRule = (state: PolicyState, input: PolicyInput) => PolicyState;

// Enough extra places to see the exact binary value past the rounding digit
const EXTRA_DIGITS = 25;
const EXACT_TIE_TAIL = `5${"0".repeat(EXTRA_DIGITS - 1)}`;

/**
 * Fixed-point text with `digits` decimals. Exact ties go to the even digit;
 * everything else rounds to nearest like `toFixed`.
 */
export function formatFixed(value: number, digits: number): string {
  const exact = value.toFixed(digits + EXTRA_DIGITS);
  if (!exact.endsWith(EXACT_TIE_TAIL)) return value.toFixed(digits);

  // toFixed breaks ties away from zero; keep the truncated form when its last digit is even
  const truncated = exact.slice(0, -EXTRA_DIGITS).replace(/\.$/, "");
  const lastDigit = Number(truncated[truncated.length - 1]);
  return lastDigit % 2 === 0 ? truncated : value.toFixed(digits);
}

/**
 * Round to `digits` decimal places, ties to even
 */
export function roundTo(value: number, digits: number): number {
  return Number(formatFixed(value, digits));
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

export function initialState(input: PolicyInput): PolicyState {
  return {
    insertionNs: input.avgInsertionNs ?? BASELINE_INSERTION_NS,
    skewPs: BASELINE_SKEW_PS,
    notes: [],
  };
}

export const setupFailureRule: PolicyRule = (state, { domain, wns }) => {
  if (wns === undefined || !(wns < SETUP_FAIL_WNS)) return state;

  const factor = wns < SEVERE_SETUP_WNS ? 0.85 : 0.9;
  return {
    insertionNs: Math.max(SETUP_INSERTION_FLOOR_NS, roundTo(state.insertionNs * factor, 3)),
    skewPs: Math.min(state.skewPs, TIGHT_SKEW_PS),
    notes: [
      ...state.notes,
      `${domain}: Setup failing (WNS=${formatFixed(wns, 3)}). Reduce insertion delay ~10–15% and tighten skew target.`,
    ],
  };
};

export const holdFailureRule: PolicyRule = (state, { domain, holdIssues }) => {
  if (!holdIssues) return state;

  return {
    insertionNs: roundTo(state.insertionNs * HOLD_INSERTION_FACTOR, 3),
    skewPs: Math.max(state.skewPs, HOLD_SKEW_PS),
    notes: [
      ...state.notes,
      `${domain}: Hold issues detected. Increase insertion delay ~5–10% and review min-delay fixes.`,
    ],
  };
};

export const highSkewRule: PolicyRule = (state, { domain, globalSkewPs }) => {
  if (globalSkewPs === undefined || !(globalSkewPs > HIGH_GLOBAL_SKEW_PS)) return state;

  return {
    ...state,
    skewPs: Math.min(state.skewPs, TIGHT_SKEW_PS),
    notes: [
      ...state.notes,
      `${domain}: High global skew (${formatFixed(globalSkewPs, 0)} ps). Target ≤70–80 ps.`,
    ],
  };
};

export const guardrailRule: PolicyRule = (state) => ({
  ...state,
  insertionNs: clamp(state.insertionNs, INSERTION_BAND_NS.min, INSERTION_BAND_NS.max),
  skewPs: clamp(state.skewPs, SKEW_BAND_PS.min, SKEW_BAND_PS.max),
});

/**
 * Rules in application order. The guardrail must stay last.
 */
export const POLICY_RULES: readonly PolicyRule[] = [
  setupFailureRule,
  holdFailureRule,
  highSkewRule,
  guardrailRule,
];

/**
 * Compute the recommendation for one domain
 */
export function recommendForDomain(input: PolicyInput): DomainRecommendation {
  const final = POLICY_RULES.reduce<PolicyState>(
    (state, rule) => rule(state, input),
    initialState(input)
  );

  return {
    domain: input.domain,
    recommended_insertion_delay_ns: final.insertionNs,
    recommended_skew_target_ps: final.skewPs,
    observed: {
      avg_insertion_ns: input.avgInsertionNs ?? null,
      global_skew_ps: input.globalSkewPs ?? null,
      wns: input.wns ?? null,
      hold_issues: input.holdIssues,
    },
    notes: [...final.notes],
    implementation_hints: [...IMPLEMENTATION_HINTS],
  };
}
