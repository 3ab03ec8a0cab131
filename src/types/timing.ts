/**
 * Timing and Clock-Tree Types for the CTS tuner
 */

/**
 * Slack figures pulled from a timing log
 */
export interface TimingIndicators {
  wns?: number; // Worst Negative Slack (ns)
  tns?: number; // Total Negative Slack (ns)
}

/**
 * One clock domain as seen in a skew report
 */
export interface ClockDomainObservation {
  name: string;
  avgInsertionNs?: number;
  globalSkewPs?: number;
}

/**
 * Values the policy saw when it made a recommendation
 */
export interface ObservedSnapshot {
  avg_insertion_ns: number | null;
  global_skew_ps: number | null;
  wns: number | null;
  hold_issues: boolean;
}

/**
 * Per-domain recommendation (JSON wire shape)
 */
export interface DomainRecommendation {
  domain: string;
  recommended_insertion_delay_ns: number;
  recommended_skew_target_ps: number;
  observed: ObservedSnapshot;
  notes: string[];
  implementation_hints: string[];
}

/**
 * Global part of a tuning report
 */
export interface TuningSummary {
  wns: number | null;
  tns: number | null;
  hold_issues: boolean;
  notes: string[];
}

/**
 * Complete tuning report written by the CLI and returned by the MCP tool
 */
export interface TuningReport {
  summary: TuningSummary;
  recommendations: DomainRecommendation[];
}
