import { describe, expect, it } from "vitest";
import { parseArgv } from "./args.js";

describe("parseArgv", () => {
  it("reads string flags, negative numbers and switches", () => {
    expect(parseArgv(["--log", "a.log", "--wns", "-0.120", "--has-hold"])).toEqual({
      positionals: [],
      flags: { log: "a.log", wns: "-0.120", "has-hold": true },
    });
  });

  it("collects list values and --flag=value forms", () => {
    expect(parseArgv(["lib-check", "--cells", "NAND2_X2", "BUF_X4", "--lib=corner.lib"])).toEqual({
      positionals: ["lib-check"],
      flags: { cells: ["NAND2_X2", "BUF_X4"], lib: "corner.lib" },
    });
  });
});
