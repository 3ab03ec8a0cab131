import { describe, expect, it } from "vitest";
import { loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      verbose: false,
      extraHoldPatterns: [],
      outputDir: "outputs",
    });
  });

  it("reads verbose, hold patterns and output directory", () => {
    const config = loadConfig({
      CTS_TUNER_VERBOSE: "true",
      CTS_TUNER_EXTRA_HOLD_PATTERNS: "min delay violation, ,hold check failed",
      CTS_TUNER_OUTPUT_DIR: "/tmp/cts",
    });

    expect(config).toEqual({
      verbose: true,
      extraHoldPatterns: ["min delay violation", "hold check failed"],
      outputDir: "/tmp/cts",
    });
  });

  it("treats unknown verbose values as off", () => {
    expect(loadConfig({ CTS_TUNER_VERBOSE: "maybe" }).verbose).toBe(false);
  });
});
