import { describe, expect, it } from "vitest";
import { checkLiberty, hasCell } from "./lib-check.js";

const LIB = [
  "library (demo_tt) {",
  "  default_max_transition : 0.5 ;",
  "  default_max_capacitance : 0.12;",
  '  cell ("NAND2_X2") {',
  "  }",
  "  cell(BUF_X4) {",
  "  }",
  "}",
].join("\n");

describe("hasCell", () => {
  it("matches quoted and bare cell names exactly", () => {
    expect(hasCell(LIB, "NAND2_X2")).toBe(true);
    expect(hasCell(LIB, "BUF_X4")).toBe(true);
    expect(hasCell(LIB, "BUF_X")).toBe(false);
  });
});

describe("checkLiberty", () => {
  it("lists missing cells and reads the library defaults", () => {
    expect(checkLiberty(LIB, ["NAND2_X2", "INV_X1", "BUF_X4"])).toEqual({
      missing_cells: ["INV_X1"],
      max_transition_ns: 0.5,
      max_capacitance_pf: 0.12,
    });
  });

  it("reports null defaults when absent", () => {
    expect(checkLiberty("library (x) { }", [])).toEqual({
      missing_cells: [],
      max_transition_ns: null,
      max_capacitance_pf: null,
    });
  });
});
