/**
 * SPEF Probe
 *
 * Summarizes parasitics for selected nets: total capacitance from the
 * *D_NET header, summed *RES resistance, and a lumped R*C estimate.
 */

import { parseNumber } from "../cts/timing-log.js";
import { roundTo } from "../cts/policy.js";
import { toCsv } from "../sta/csv.js";

export interface NetParasitics {
  net: string;
  totalCapPf: number;
  rcEstNs: number;
}

export const SPEF_CSV_HEADERS = ["Net", "TotalCap(pF)", "RC_Est(ns)"] as const;

const CAP_UNITS_TO_PF: Record<string, number> = { FF: 1e-3, PF: 1, NF: 1e3, UF: 1e6 };
const RES_UNITS_TO_OHM: Record<string, number> = { OHM: 1, KOHM: 1e3, MOHM: 1e6 };

function unitScale(line: string, table: Record<string, number>): number | undefined {
  const [, magnitude, unit] = line.trim().split(/\s+/);
  const value = parseNumber(magnitude);
  const factor = unit ? table[unit.toUpperCase()] : undefined;
  return value !== undefined && factor !== undefined ? value * factor : undefined;
}

/**
 * Collect capacitance and resistance totals for every *D_NET in the file
 */
export function parseSpef(text: string): Map<string, { capPf: number; resOhm: number }> {
  const nameMap = new Map<string, string>();
  const nets = new Map<string, { capPf: number; resOhm: number }>();
  let capScale = 1;
  let resScale = 1;
  let current: string | undefined;
  let inRes = false;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith("//")) continue;

    if (line.startsWith("*C_UNIT")) {
      capScale = unitScale(line, CAP_UNITS_TO_PF) ?? capScale;
      continue;
    }
    if (line.startsWith("*R_UNIT")) {
      resScale = unitScale(line, RES_UNITS_TO_OHM) ?? resScale;
      continue;
    }

    const mapping = line.match(/^\*(\d+)\s+(\S+)$/);
    if (mapping && current === undefined) {
      nameMap.set(`*${mapping[1]}`, mapping[2]);
      continue;
    }

    const dnet = line.match(/^\*D_NET\s+(\S+)\s+(\S+)/);
    if (dnet) {
      current = nameMap.get(dnet[1]) ?? dnet[1];
      nets.set(current, { capPf: (parseNumber(dnet[2]) ?? 0) * capScale, resOhm: 0 });
      inRes = false;
      continue;
    }

    if (line.startsWith("*END")) {
      current = undefined;
      inRes = false;
      continue;
    }

    if (line.startsWith("*")) {
      inRes = line.startsWith("*RES");
      continue;
    }

    if (inRes && current !== undefined) {
      const fields = line.split(/\s+/);
      const value = parseNumber(fields[3]);
      const entry = nets.get(current);
      if (entry && value !== undefined) {
        entry.resOhm += value * resScale;
      }
    }
  }

  return nets;
}

/**
 * Parasitics for the requested nets; nets absent from the file report zeros
 */
export function probeNets(spefText: string, netNames: readonly string[]): NetParasitics[] {
  const nets = parseSpef(spefText);

  return netNames.map((net) => {
    const entry = nets.get(net);
    const capPf = entry?.capPf ?? 0;
    const resOhm = entry?.resOhm ?? 0;
    return {
      net,
      totalCapPf: roundTo(capPf, 6),
      // ohm * pF = ps
      rcEstNs: roundTo((resOhm * capPf) / 1000, 6),
    };
  });
}

export function parasiticsToCsv(rows: readonly NetParasitics[]): string {
  return toCsv(
    SPEF_CSV_HEADERS,
    rows.map((row) => ({
      Net: row.net,
      "TotalCap(pF)": row.totalCapPf,
      "RC_Est(ns)": row.rcEstNs,
    }))
  );
}
