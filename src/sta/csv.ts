/**
 * CSV reading/writing for STA summaries
 */

import csvParser from "csv-parser";
import { z } from "zod";

export type CsvCell = string | number | null | undefined;

function escapeCell(cell: CsvCell): string {
  if (cell === null || cell === undefined) return "";
  const text = String(cell);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/**
 * Render rows under a header line. Missing values become empty cells.
 */
export function toCsv(headers: readonly string[], rows: readonly Record<string, CsvCell>[]): string {
  const lines = [headers.map(escapeCell).join(",")];
  for (const row of rows) {
    lines.push(headers.map((header) => escapeCell(row[header])).join(","));
  }
  return `${lines.join("\n")}\n`;
}

export interface ParsedCsv {
  headers: string[];
  rows: Record<string, string>[];
}

const headerRow = z.array(z.string());
const dataRow = z.record(z.string());

/**
 * Parse CSV text with a header row. Quoted cells may span lines.
 */
export function parseCsv(content: string): Promise<ParsedCsv> {
  return new Promise((resolve, reject) => {
    let headers: string[] = [];
    const rows: Record<string, string>[] = [];
    const parser = csvParser({ mapHeaders: ({ header }) => header.trim() });

    parser
      .on("headers", (names: unknown) => {
        const parsed = headerRow.safeParse(names);
        if (parsed.success) {
          headers = parsed.data;
        } else {
          parser.destroy(parsed.error);
        }
      })
      .on("data", (row: unknown) => {
        const parsed = dataRow.safeParse(row);
        if (!parsed.success) {
          parser.destroy(parsed.error);
          return;
        }
        // Blank lines come through as rows without cells
        if (Object.keys(parsed.data).length > 0) rows.push(parsed.data);
      })
      .on("end", () => resolve({ headers, rows }))
      .on("error", (error: Error) => reject(error));

    parser.end(content);
  });
}
