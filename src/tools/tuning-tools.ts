/**
 * CTS Tuning Tool
 *
 * File-level entry to the tuner: read the timing log and optional skew
 * report, build the report, optionally write it as JSON.
 */

import { formatTuningReport, proposeTuning } from "../cts/index.js";
import { readTextInput, writeJsonOutput } from "../files/file-manager.js";
import type { TunerConfig } from "../config.js";
import type { TuningReport } from "../types/timing.js";

export interface TuneOptions {
  logPath?: string;
  logText?: string;
  skewRptPath?: string;
  skewText?: string;
  wns?: number;
  hasHold?: boolean;
  outPath?: string;
}

export interface TuneResult {
  report: TuningReport;
  outPath?: string;
}

/**
 * Run the tuner. All inputs are read before anything is written.
 */
export async function runCtsTuning(options: TuneOptions, config: TunerConfig): Promise<TuneResult> {
  const logText =
    options.logPath !== undefined
      ? await readTextInput(options.logPath, "timing log")
      : options.logText;
  if (logText === undefined) {
    throw new Error("A timing log path or timing log text is required");
  }

  const skewText =
    options.skewRptPath !== undefined
      ? await readTextInput(options.skewRptPath, "skew report")
      : options.skewText;

  const report = proposeTuning({
    logText,
    skewText,
    wnsOverride: options.wns,
    holdOverride: options.hasHold,
    extraHoldPatterns: config.extraHoldPatterns,
  });

  if (config.verbose) {
    console.error(formatTuningReport(report));
  }

  if (options.outPath !== undefined) {
    await writeJsonOutput(options.outPath, report);
  }

  return { report, outPath: options.outPath };
}
