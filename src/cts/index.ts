/**
 * CTS Module Index
 *
 * Timing-log and skew-report extraction plus the per-domain tuning policy
 */

export {
  HOLD_NEEDLES,
  SLACK_STRATEGIES,
  combinedStrategy,
  independentStrategy,
  extractTimingIndicators,
  detectHoldIssues,
  parseNumber,
  type SlackStrategy,
} from "./timing-log.js";

export {
  INITIAL_SKEW_STATE,
  reduceSkewLine,
  parseSkewReport,
  type SkewParseState,
} from "./skew-report.js";

export {
  BASELINE_INSERTION_NS,
  BASELINE_SKEW_PS,
  INSERTION_BAND_NS,
  SKEW_BAND_PS,
  IMPLEMENTATION_HINTS,
  POLICY_RULES,
  setupFailureRule,
  holdFailureRule,
  highSkewRule,
  guardrailRule,
  initialState,
  recommendForDomain,
  roundTo,
  formatFixed,
  clamp,
  type PolicyInput,
  type PolicyState,
  type PolicyRule,
} from "./policy.js";

export {
  DEFAULT_DOMAIN,
  SUMMARY_NOTES,
  proposeTuning,
  formatTuningReport,
  type TuningInput,
} from "./aggregator.js";
