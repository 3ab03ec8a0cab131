/**
 * ECO Helper
 *
 * Adds a first-cut ECO suggestion to each row of an STA summary CSV.
 */

import { parseNumber } from "../cts/timing-log.js";
import { parseCsv, toCsv } from "./csv.js";

export const ECO_ACTIONS = {
  resize: "Consider buffer/gate resize on critical arc",
  none: "No action",
} as const;

export type EcoAction = (typeof ECO_ACTIONS)[keyof typeof ECO_ACTIONS];

export function recommendEcoAction(wns: number | undefined): EcoAction {
  return wns !== undefined && wns < 0 ? ECO_ACTIONS.resize : ECO_ACTIONS.none;
}

/**
 * Append a Recommendation column to STA summary CSV text
 */
export async function suggestEcos(csvText: string): Promise<string> {
  const { headers, rows } = await parseCsv(csvText);
  if (headers.length === 0) {
    throw new Error("STA summary CSV is empty");
  }

  const outHeaders = headers.includes("Recommendation") ? headers : [...headers, "Recommendation"];
  const outRows = rows.map((row) => ({
    ...row,
    Recommendation: recommendEcoAction(parseNumber(row.WNS)),
  }));

  return toCsv(outHeaders, outRows);
}
