import { describe, expect, it } from "vitest";
import { parseCsv, toCsv } from "./csv.js";

describe("toCsv", () => {
  it("quotes cells with separators and leaves missing values empty", () => {
    const csv = toCsv(["Net", "Note"], [
      { Net: "n1", Note: 'says "hi", twice' },
      { Net: "n2", Note: undefined },
    ]);

    expect(csv).toBe('Net,Note\nn1,"says ""hi"", twice"\nn2,\n');
  });
});

describe("parseCsv", () => {
  it("reads quoted cells and skips blank lines", async () => {
    expect(await parseCsv('A,B\r\n"x, y",2\n\n3,\n')).toEqual({
      headers: ["A", "B"],
      rows: [
        { A: "x, y", B: "2" },
        { A: "3", B: "" },
      ],
    });
  });

  it("reads back cells written with embedded newlines and quotes", async () => {
    const csv = toCsv(["Start", "End"], [{ Start: "u_core/reg_a\n(CK)", End: 'pin "D"' }]);

    expect(await parseCsv(csv)).toEqual({
      headers: ["Start", "End"],
      rows: [{ Start: "u_core/reg_a\n(CK)", End: 'pin "D"' }],
    });
  });

  it("returns no headers for empty input", async () => {
    expect(await parseCsv("")).toEqual({ headers: [], rows: [] });
  });
});
