/**
 * CLI commands
 *
 * `cts-tuner [command] [options]`; without a command, `tune` runs.
 */

import { join } from "path";
import { z, ZodError } from "zod";
import type { TunerConfig } from "../config.js";
import { ReportIOError } from "../files/file-manager.js";
import { runCtsTuning } from "../tools/tuning-tools.js";
import {
  checkLibertyFile,
  diffNetlistFiles,
  generateSdcFile,
  probeSpefFile,
  suggestEcosFromCsv,
  summarizeStaReport,
} from "../tools/report-tools.js";
import { parseArgv, type FlagValue } from "./args.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const pathFlag = z.string({ invalid_type_error: "expects a single path" }).min(1);

const numberFlag = z
  .string({ invalid_type_error: "expects a single number" })
  .regex(/^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:e[+-]?\d+)?$/i, "must be a number")
  .transform(Number);

const listFlag = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (typeof value === "string" ? [value] : value));

const switchFlag = z.literal(true, {
  errorMap: () => ({ message: "is a switch and takes no value" }),
});

interface Command {
  usage: string;
  run(flags: Record<string, FlagValue>, config: TunerConfig): Promise<string>;
}

const tuneSchema = z
  .object({
    log: pathFlag,
    out: pathFlag,
    "skew-rpt": pathFlag.optional(),
    wns: numberFlag.optional(),
    "has-hold": switchFlag.optional(),
  })
  .strict();

export const COMMANDS: Record<string, Command> = {
  tune: {
    usage: "tune --log <timing.log> --out <reco.json> [--skew-rpt <ccopt.skew.rpt>] [--wns <ns>] [--has-hold]",
    async run(flags, config) {
      const args = tuneSchema.parse(flags);
      const { outPath } = await runCtsTuning(
        {
          logPath: args.log,
          skewRptPath: args["skew-rpt"],
          wns: args.wns,
          // The switch can only force hold issues on; without it detection decides
          hasHold: args["has-hold"],
          outPath: args.out,
        },
        config
      );
      return `Wrote ${outPath ?? args.out}`;
    },
  },

  "sta-report": {
    usage: "sta-report --report <sta.rpt> --out <summary.csv>",
    async run(flags) {
      const args = z.object({ report: pathFlag, out: pathFlag }).strict().parse(flags);
      await summarizeStaReport(args.report, args.out);
      return `Wrote ${args.out}`;
    },
  },

  eco: {
    usage: "eco --paths-csv <summary.csv> --out <eco_suggestions.csv>",
    async run(flags) {
      const args = z.object({ "paths-csv": pathFlag, out: pathFlag }).strict().parse(flags);
      await suggestEcosFromCsv(args["paths-csv"], args.out);
      return `Wrote ${args.out}`;
    },
  },

  "netlist-diff": {
    usage: "netlist-diff --a <a.v> --b <b.v> --out <netdiff.json>",
    async run(flags) {
      const args = z.object({ a: pathFlag, b: pathFlag, out: pathFlag }).strict().parse(flags);
      await diffNetlistFiles(args.a, args.b, args.out);
      return `Wrote ${args.out}`;
    },
  },

  "lib-check": {
    usage: "lib-check --lib <corner.lib> [--cells NAND2_X2 BUF_X4 ...] [--out <lib_check.json>]",
    async run(flags, config) {
      const args = z
        .object({ lib: pathFlag, cells: listFlag.default([]), out: pathFlag.optional() })
        .strict()
        .parse(flags);
      const out = args.out ?? join(config.outputDir, "lib_check.json");
      await checkLibertyFile(args.lib, args.cells, out);
      return `Wrote ${out}`;
    },
  },

  sdc: {
    usage: "sdc --spec <constraints.yaml> --out <top.sdc>",
    async run(flags) {
      const args = z.object({ spec: pathFlag, out: pathFlag }).strict().parse(flags);
      await generateSdcFile(args.spec, args.out);
      return `Wrote ${args.out}`;
    },
  },

  "spef-probe": {
    usage: "spef-probe --spef <design.spef> --nets <net> [<net> ...] --out <spef_summary.csv>",
    async run(flags) {
      const args = z.object({ spef: pathFlag, nets: listFlag, out: pathFlag }).strict().parse(flags);
      await probeSpefFile(args.spef, args.nets, args.out);
      return `Wrote ${args.out}`;
    },
  },
};

export function usage(): string {
  const lines = ["Usage: cts-tuner [command] [options]", "", "Commands:"];
  for (const command of Object.values(COMMANDS)) {
    lines.push(`  ${command.usage}`);
  }
  lines.push("", "Without a command, 'tune' runs.");
  return lines.join("\n");
}

function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const flag = issue.path.length > 0 ? `--${issue.path.join(".")}` : "options";
      if (issue.code === "unrecognized_keys") {
        return `unknown option(s): ${issue.keys.map((key) => `--${key}`).join(", ")}`;
      }
      return `${flag}: ${issue.message}`;
    })
    .join("\n");
}

/**
 * Run the CLI and return the process exit code
 */
export async function runCli(argv: readonly string[], config: TunerConfig): Promise<number> {
  const { positionals, flags } = parseArgv(argv);

  if (flags.help === true || positionals[0] === "help") {
    console.log(usage());
    return EXIT_OK;
  }

  const commandName = positionals[0] ?? "tune";
  const command = COMMANDS[commandName];
  if (!command || positionals.length > 1) {
    console.error(`Unknown command: ${positionals.join(" ")}\n\n${usage()}`);
    return EXIT_USAGE;
  }

  try {
    const message = await command.run(flags, config);
    console.error(message);
    return EXIT_OK;
  } catch (error) {
    if (error instanceof ZodError) {
      console.error(`${formatZodError(error)}\n\nUsage: cts-tuner ${command.usage}`);
      return EXIT_USAGE;
    }
    if (error instanceof ReportIOError) {
      console.error(`Error: ${error.message}`);
      return EXIT_FAILURE;
    }
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return EXIT_FAILURE;
  }
}
