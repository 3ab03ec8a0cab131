/**
 * Report Aggregator
 *
 * Ties the extractors and the policy together into a TuningReport.
 */

import type { ClockDomainObservation, TuningReport } from "../types/timing.js";
import { detectHoldIssues, extractTimingIndicators } from "./timing-log.js";
import { parseSkewReport } from "./skew-report.js";
import { formatFixed, recommendForDomain } from "./policy.js";

export const DEFAULT_DOMAIN = "default";

export const SUMMARY_NOTES = {
  wnsMissing: "WNS not found; consider providing --wns override.",
  holdIssues: "Hold issues detected; verify min-delay fixes after CTS retune.",
  noDomains: "No domains parsed from skew report; check report format.",
} as const;

/**
 * Inputs for one tuning run
 */
export interface TuningInput {
  logText: string;
  skewText?: string;
  wnsOverride?: number;
  holdOverride?: boolean;
  extraHoldPatterns?: readonly string[];
}

/**
 * Build the tuning report for one log and optional skew report
 */
export function proposeTuning(input: TuningInput): TuningReport {
  const timing = extractTimingIndicators(input.logText);
  const wns = input.wnsOverride ?? timing.wns;
  const holdIssues =
    input.holdOverride ?? detectHoldIssues(input.logText, input.extraHoldPatterns);

  const skewText = input.skewText ?? "";
  const skewSupplied = skewText.length > 0;
  const parsed = parseSkewReport(skewText);

  // No domain headers: treat the whole design as one implicit domain
  const domains: ClockDomainObservation[] =
    parsed.size > 0 ? [...parsed.values()] : [{ name: DEFAULT_DOMAIN }];

  const recommendations = domains.map((observation) =>
    recommendForDomain({
      domain: observation.name,
      wns,
      holdIssues,
      avgInsertionNs: observation.avgInsertionNs,
      globalSkewPs: observation.globalSkewPs,
    })
  );

  const notes: string[] = [];
  if (wns === undefined) {
    notes.push(SUMMARY_NOTES.wnsMissing);
  }
  if (holdIssues) {
    notes.push(SUMMARY_NOTES.holdIssues);
  }
  if (skewSupplied && parsed.size === 0) {
    notes.push(SUMMARY_NOTES.noDomains);
  }

  return {
    summary: {
      wns: wns ?? null,
      tns: timing.tns ?? null,
      hold_issues: holdIssues,
      notes,
    },
    recommendations,
  };
}

/**
 * Human-readable summary of a report
 */
export function formatTuningReport(report: TuningReport): string {
  const lines: string[] = [];

  lines.push("=== CTS Tuning Recommendation ===");
  lines.push("");
  lines.push("Timing:");
  lines.push(`  WNS: ${report.summary.wns !== null ? `${formatFixed(report.summary.wns, 3)} ns` : "n/a"}`);
  lines.push(`  TNS: ${report.summary.tns !== null ? `${formatFixed(report.summary.tns, 3)} ns` : "n/a"}`);
  lines.push(`  Hold issues: ${report.summary.hold_issues ? "yes" : "no"}`);

  for (const rec of report.recommendations) {
    lines.push("");
    lines.push(`Domain ${rec.domain}:`);
    lines.push(`  Insertion delay: ${rec.recommended_insertion_delay_ns.toFixed(3)} ns`);
    lines.push(`  Skew target: ${rec.recommended_skew_target_ps.toFixed(1)} ps`);
    for (const note of rec.notes) {
      lines.push(`  - ${note}`);
    }
  }

  if (report.summary.notes.length > 0) {
    lines.push("");
    lines.push("Notes:");
    for (const note of report.summary.notes) {
      lines.push(`  - ${note}`);
    }
  }

  return lines.join("\n");
}
