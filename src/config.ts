/**
 * Runtime configuration from environment variables (.env is loaded by the entry points)
 */

import { z } from "zod";

const envSchema = z.object({
  CTS_TUNER_VERBOSE: z.string().optional(),
  CTS_TUNER_EXTRA_HOLD_PATTERNS: z.string().optional(),
  CTS_TUNER_OUTPUT_DIR: z.string().optional(),
});

export interface TunerConfig {
  verbose: boolean;
  extraHoldPatterns: string[];
  outputDir: string;
}

function parseFlag(value: string | undefined): boolean {
  if (!value) return false;
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): TunerConfig {
  const vars = envSchema.parse(env);

  return {
    verbose: parseFlag(vars.CTS_TUNER_VERBOSE),
    extraHoldPatterns: (vars.CTS_TUNER_EXTRA_HOLD_PATTERNS || "")
      .split(",")
      .map((pattern) => pattern.trim())
      .filter((pattern) => pattern.length > 0),
    outputDir: vars.CTS_TUNER_OUTPUT_DIR || "outputs",
  };
}
