/**
 * Report Utility Tools
 *
 * File-level wrappers for the STA, netlist, liberty, constraint and
 * parasitic utilities. Each reads its inputs, transforms them, and writes
 * the result when an output path is given.
 */

import { parseStaReport, staSummaryToCsv, suggestEcos, type StaSummary } from "../sta/index.js";
import {
  checkLiberty,
  diffNetlists,
  generateSdc,
  parasiticsToCsv,
  probeNets,
  type LibCheckFindings,
  type NetlistDiff,
  type NetParasitics,
} from "../design/index.js";
import { readTextInput, writeJsonOutput, writeOutputFile } from "../files/file-manager.js";

export async function summarizeStaReport(
  reportPath: string,
  outPath?: string
): Promise<{ summary: StaSummary; csv: string }> {
  const summary = parseStaReport(await readTextInput(reportPath, "STA report"));
  const csv = staSummaryToCsv(summary);
  if (outPath !== undefined) {
    await writeOutputFile(outPath, csv);
  }
  return { summary, csv };
}

export async function suggestEcosFromCsv(pathsCsv: string, outPath?: string): Promise<string> {
  const csv = await suggestEcos(await readTextInput(pathsCsv, "STA summary CSV"));
  if (outPath !== undefined) {
    await writeOutputFile(outPath, csv);
  }
  return csv;
}

export async function diffNetlistFiles(
  pathA: string,
  pathB: string,
  outPath?: string
): Promise<NetlistDiff> {
  const textA = await readTextInput(pathA, "netlist A");
  const textB = await readTextInput(pathB, "netlist B");
  const diff = diffNetlists(textA, textB);
  if (outPath !== undefined) {
    await writeJsonOutput(outPath, diff);
  }
  return diff;
}

export async function checkLibertyFile(
  libPath: string,
  cells: readonly string[],
  outPath?: string
): Promise<LibCheckFindings> {
  const findings = checkLiberty(await readTextInput(libPath, "liberty file"), cells);
  if (outPath !== undefined) {
    await writeJsonOutput(outPath, findings);
  }
  return findings;
}

export async function generateSdcFile(specPath: string, outPath?: string): Promise<string> {
  const sdc = generateSdc(await readTextInput(specPath, "constraint spec"));
  if (outPath !== undefined) {
    await writeOutputFile(outPath, sdc);
  }
  return sdc;
}

export async function probeSpefFile(
  spefPath: string,
  nets: readonly string[],
  outPath?: string
): Promise<NetParasitics[]> {
  const rows = probeNets(await readTextInput(spefPath, "SPEF file"), nets);
  if (outPath !== undefined) {
    await writeOutputFile(outPath, parasiticsToCsv(rows));
  }
  return rows;
}
