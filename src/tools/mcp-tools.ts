/**
 * MCP Tools for CTS tuning and report utilities
 */

import { z } from "zod";
import { isAbsolute, relative, resolve, sep } from "path";
import { ErrorCode, McpError, type Tool } from "@modelcontextprotocol/sdk/types.js";
import type { TunerConfig } from "../config.js";
import { runCtsTuning } from "./tuning-tools.js";
import {
  checkLibertyFile,
  diffNetlistFiles,
  generateSdcFile,
  probeSpefFile,
  suggestEcosFromCsv,
  summarizeStaReport,
} from "./report-tools.js";

/**
 * Tool definitions for MCP server registration
 */
export const toolDefinitions: Tool[] = [
  {
    name: "suggest_cts_tuning",
    description:
      "Recommend per-clock-domain CTS insertion delay and skew targets from a timing log (WNS/TNS, hold violations) and an optional ccopt skew report.",
    inputSchema: {
      type: "object",
      properties: {
        log_path: { type: "string", description: "Path to the STA/CTS timing log (use this OR log_text)" },
        log_text: { type: "string", description: "Timing log contents (use this OR log_path)" },
        skew_rpt_path: { type: "string", description: "Optional path to a ccopt.skew.rpt-style report" },
        skew_text: { type: "string", description: "Optional skew report contents" },
        wns: { type: "number", description: "Override WNS in ns (e.g. -0.120)" },
        has_hold: { type: "boolean", description: "Override hold-issue detection" },
        out_path: {
          type: "string",
          description:
            "Optional JSON output file; relative paths resolve inside the configured output directory and may not leave it",
        },
      },
    },
  },
  {
    name: "parse_sta_report",
    description: "Summarize an STA report into WNS, TNS and critical path start/end points (CSV).",
    inputSchema: {
      type: "object",
      properties: {
        report_path: { type: "string", description: "STA report file (Tempus/PrimeTime)" },
        out_path: { type: "string", description: "Optional CSV output file" },
      },
      required: ["report_path"],
    },
  },
  {
    name: "suggest_ecos",
    description: "Add ECO recommendations to an STA summary CSV produced by parse_sta_report.",
    inputSchema: {
      type: "object",
      properties: {
        paths_csv: { type: "string", description: "STA summary CSV file" },
        out_path: { type: "string", description: "Optional CSV output file" },
      },
      required: ["paths_csv"],
    },
  },
  {
    name: "diff_netlists",
    description: "Compare module declarations between two Verilog netlists.",
    inputSchema: {
      type: "object",
      properties: {
        netlist_a: { type: "string", description: "First netlist file" },
        netlist_b: { type: "string", description: "Second netlist file" },
        out_path: { type: "string", description: "Optional JSON output file" },
      },
      required: ["netlist_a", "netlist_b"],
    },
  },
  {
    name: "check_liberty",
    description: "Check a .lib for required cells and default max transition/capacitance.",
    inputSchema: {
      type: "object",
      properties: {
        lib_path: { type: "string", description: "Liberty file" },
        cells: { type: "array", items: { type: "string" }, description: "Cell names that must exist" },
        out_path: { type: "string", description: "Optional JSON output file" },
      },
      required: ["lib_path"],
    },
  },
  {
    name: "generate_sdc",
    description: "Generate SDC constraints from a YAML spec of clocks, IO delays and exceptions.",
    inputSchema: {
      type: "object",
      properties: {
        spec_path: { type: "string", description: "YAML constraint spec" },
        out_path: { type: "string", description: "Optional SDC output file" },
      },
      required: ["spec_path"],
    },
  },
  {
    name: "probe_spef",
    description: "Summarize total capacitance and an RC estimate for selected nets in a SPEF file.",
    inputSchema: {
      type: "object",
      properties: {
        spef_path: { type: "string", description: "SPEF file" },
        nets: { type: "array", items: { type: "string" }, description: "Net names to probe" },
        out_path: { type: "string", description: "Optional CSV output file" },
      },
      required: ["spef_path", "nets"],
    },
  },
];

const outPath = z.string().min(1).optional();

export const toolSchemas = {
  suggest_cts_tuning: z
    .object({
      log_path: z.string().min(1).optional(),
      log_text: z.string().optional(),
      skew_rpt_path: z.string().min(1).optional(),
      skew_text: z.string().optional(),
      wns: z.number().finite().optional(),
      has_hold: z.boolean().optional(),
      out_path: outPath,
    })
    .refine((args) => args.log_path !== undefined || args.log_text !== undefined, {
      message: "Provide log_path or log_text",
    }),
  parse_sta_report: z.object({ report_path: z.string().min(1), out_path: outPath }),
  suggest_ecos: z.object({ paths_csv: z.string().min(1), out_path: outPath }),
  diff_netlists: z.object({
    netlist_a: z.string().min(1),
    netlist_b: z.string().min(1),
    out_path: outPath,
  }),
  check_liberty: z.object({
    lib_path: z.string().min(1),
    cells: z.array(z.string()).default([]),
    out_path: outPath,
  }),
  generate_sdc: z.object({ spec_path: z.string().min(1), out_path: outPath }),
  probe_spef: z.object({
    spef_path: z.string().min(1),
    nets: z.array(z.string().min(1)).nonempty(),
    out_path: outPath,
  }),
};

export type ToolName = keyof typeof toolSchemas;

export function isToolName(name: string): name is ToolName {
  return name in toolSchemas;
}

/**
 * Absolute paths are used as given; relative ones must stay inside the output directory
 */
function resolveOut(path: string | undefined, config: TunerConfig): string | undefined {
  if (path === undefined || isAbsolute(path)) return path;

  const root = resolve(config.outputDir);
  const target = resolve(root, path);
  const rel = relative(root, target);
  if (rel === "" || rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    throw new McpError(
      ErrorCode.InvalidParams,
      `out_path '${path}' must name a file inside the output directory (${config.outputDir})`
    );
  }
  return target;
}

type ToolHandler = (args: unknown, config: TunerConfig) => Promise<unknown>;

/**
 * Tool handlers; arguments are validated with the matching zod schema
 */
export const toolHandlers: Record<ToolName, ToolHandler> = {
  suggest_cts_tuning: async (args, config) => {
    const input = toolSchemas.suggest_cts_tuning.parse(args);
    const result = await runCtsTuning(
      {
        logPath: input.log_path,
        logText: input.log_text,
        skewRptPath: input.skew_rpt_path,
        skewText: input.skew_text,
        wns: input.wns,
        hasHold: input.has_hold,
        outPath: resolveOut(input.out_path, config),
      },
      config
    );
    return { success: true, report: result.report, out_path: result.outPath ?? null };
  },

  parse_sta_report: async (args, config) => {
    const input = toolSchemas.parse_sta_report.parse(args);
    const out = resolveOut(input.out_path, config);
    const { summary, csv } = await summarizeStaReport(input.report_path, out);
    return {
      success: true,
      wns: summary.wns ?? null,
      tns: summary.tns ?? null,
      paths: summary.paths,
      csv,
      out_path: out ?? null,
    };
  },

  suggest_ecos: async (args, config) => {
    const input = toolSchemas.suggest_ecos.parse(args);
    const out = resolveOut(input.out_path, config);
    const csv = await suggestEcosFromCsv(input.paths_csv, out);
    return { success: true, csv, out_path: out ?? null };
  },

  diff_netlists: async (args, config) => {
    const input = toolSchemas.diff_netlists.parse(args);
    const out = resolveOut(input.out_path, config);
    const diff = await diffNetlistFiles(input.netlist_a, input.netlist_b, out);
    return { success: true, ...diff, out_path: out ?? null };
  },

  check_liberty: async (args, config) => {
    const input = toolSchemas.check_liberty.parse(args);
    const out = resolveOut(input.out_path, config);
    const findings = await checkLibertyFile(input.lib_path, input.cells, out);
    return { success: true, ...findings, out_path: out ?? null };
  },

  generate_sdc: async (args, config) => {
    const input = toolSchemas.generate_sdc.parse(args);
    const out = resolveOut(input.out_path, config);
    const sdc = await generateSdcFile(input.spec_path, out);
    return { success: true, sdc, out_path: out ?? null };
  },

  probe_spef: async (args, config) => {
    const input = toolSchemas.probe_spef.parse(args);
    const out = resolveOut(input.out_path, config);
    const nets = await probeSpefFile(input.spef_path, input.nets, out);
    return { success: true, nets, out_path: out ?? null };
  },
};
