/**
 * Liberty Sanity Check
 *
 * Looks for required cells and the library-wide max transition/capacitance
 * defaults in a .lib file.
 */

import { parseNumber } from "../cts/timing-log.js";

export interface LibCheckFindings {
  missing_cells: string[];
  max_transition_ns: number | null;
  max_capacitance_pf: number | null;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function readAttribute(text: string, attribute: string): number | null {
  const match = text.match(new RegExp(`\\b${attribute}\\s*:\\s*([-+0-9.eE]+)\\s*;`));
  return parseNumber(match?.[1]) ?? null;
}

export function hasCell(libText: string, cell: string): boolean {
  return new RegExp(`\\bcell\\s*\\(\\s*"?${escapeRegExp(cell)}"?\\s*\\)`).test(libText);
}

export function checkLiberty(libText: string, cells: readonly string[]): LibCheckFindings {
  return {
    missing_cells: cells.filter((cell) => !hasCell(libText, cell)),
    max_transition_ns: readAttribute(libText, "default_max_transition"),
    max_capacitance_pf: readAttribute(libText, "default_max_capacitance"),
  };
}
