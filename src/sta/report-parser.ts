/**
 * STA Report Parser
 *
 * Summarizes Tempus/PrimeTime timing reports: WNS/TNS plus the
 * startpoint/endpoint of every reported path.
 */

import { parseNumber } from "../cts/timing-log.js";
import { toCsv } from "./csv.js";

export interface TimingPath {
  start: string;
  end?: string;
}

export interface StaSummary {
  wns?: number;
  tns?: number;
  paths: TimingPath[];
}

export const STA_CSV_HEADERS = ["WNS", "TNS", "Start", "End"] as const;

/**
 * Parse report text line by line
 */
export function parseStaReport(text: string): StaSummary {
  const summary: StaSummary = { paths: [] };

  for (const line of text.split(/\r?\n/)) {
    if (line.includes("WNS:") && line.includes("TNS:")) {
      const wnsMatch = line.match(/WNS:\s*(\S+)/);
      const tnsMatch = line.match(/TNS:\s*(\S+)/);
      const wns = parseNumber(wnsMatch?.[1]);
      const tns = parseNumber(tnsMatch?.[1]);
      // Keep the previous pair unless both numbers parse
      if (wns !== undefined && tns !== undefined) {
        summary.wns = wns;
        summary.tns = tns;
      }
    }

    const trimmed = line.trim();
    if (trimmed.startsWith("Startpoint:")) {
      summary.paths.push({ start: trimmed.slice("Startpoint:".length).trim() });
    } else if (trimmed.startsWith("Endpoint:") && summary.paths.length > 0) {
      summary.paths[summary.paths.length - 1].end = trimmed.slice("Endpoint:".length).trim();
    }
  }

  return summary;
}

/**
 * One CSV row per path; a single row with empty Start/End when there are none
 */
export function staSummaryToCsv(summary: StaSummary): string {
  const base = { WNS: summary.wns, TNS: summary.tns };
  const rows =
    summary.paths.length > 0
      ? summary.paths.map((path) => ({ ...base, Start: path.start, End: path.end ?? "" }))
      : [{ ...base, Start: "", End: "" }];

  return toCsv(STA_CSV_HEADERS, rows);
}
