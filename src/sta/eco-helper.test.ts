import { describe, expect, it } from "vitest";
import { ECO_ACTIONS, recommendEcoAction, suggestEcos } from "./eco-helper.js";

describe("recommendEcoAction", () => {
  it("suggests a resize only for negative slack", () => {
    expect(recommendEcoAction(-0.01)).toBe(ECO_ACTIONS.resize);
    expect(recommendEcoAction(0)).toBe(ECO_ACTIONS.none);
    expect(recommendEcoAction(undefined)).toBe(ECO_ACTIONS.none);
  });
});

describe("suggestEcos", () => {
  it("appends a Recommendation column", async () => {
    const csv = "WNS,TNS,Start,End\n-0.25,-12.5,reg_a,reg_b\n0.05,0,reg_c,reg_d\n,,,\n";

    expect(await suggestEcos(csv)).toBe(
      [
        "WNS,TNS,Start,End,Recommendation",
        "-0.25,-12.5,reg_a,reg_b,Consider buffer/gate resize on critical arc",
        "0.05,0,reg_c,reg_d,No action",
        ",,,,No action",
        "",
      ].join("\n")
    );
  });

  it("replaces an existing Recommendation column", async () => {
    expect(await suggestEcos("WNS,Recommendation\n-1,stale\n")).toBe(
      "WNS,Recommendation\n-1,Consider buffer/gate resize on critical arc\n"
    );
  });

  it("rejects an empty CSV", async () => {
    await expect(suggestEcos("")).rejects.toThrow("STA summary CSV is empty");
  });
});
