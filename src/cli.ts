#!/usr/bin/env node

/**
 * cts-tuner command-line entry point
 *
 * Usage:
 *   cts-tuner --log samples/tempus_report.txt --out outputs/cts_reco.json \
 *     [--skew-rpt path/to/ccopt.skew.rpt] [--wns -0.120] [--has-hold]
 */

// Load environment variables from .env file
import dotenv from "dotenv";
dotenv.config();

import { loadConfig } from "./config.js";
import { runCli } from "./cli/commands.js";

runCli(process.argv.slice(2), loadConfig())
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error("Fatal:", error);
    process.exit(1);
  });
