import { describe, expect, it } from "vitest";
import {
  IMPLEMENTATION_HINTS,
  guardrailRule,
  highSkewRule,
  holdFailureRule,
  formatFixed,
  initialState,
  recommendForDomain,
  roundTo,
  setupFailureRule,
  type PolicyInput,
} from "./policy.js";

describe("recommendForDomain", () => {
  it("compounds setup, hold and high-skew adjustments in order", () => {
    const rec = recommendForDomain({
      domain: "core_clk",
      wns: -0.12,
      holdIssues: true,
      avgInsertionNs: 1.82,
      globalSkewPs: 125,
    });

    expect(rec.recommended_insertion_delay_ns).toBe(1.671);
    expect(rec.recommended_skew_target_ps).toBe(70);
    expect(rec.notes).toEqual([
      "core_clk: Setup failing (WNS=-0.120). Reduce insertion delay ~10–15% and tighten skew target.",
      "core_clk: Hold issues detected. Increase insertion delay ~5–10% and review min-delay fixes.",
      "core_clk: High global skew (125 ps). Target ≤70–80 ps.",
    ]);
    expect(rec.observed).toEqual({
      avg_insertion_ns: 1.82,
      global_skew_ps: 125,
      wns: -0.12,
      hold_issues: true,
    });
  });

  it("uses the 0.9 factor for a mild setup failure from the baseline", () => {
    const rec = recommendForDomain({ domain: "default", wns: -0.05, holdIssues: false });

    expect(rec.recommended_insertion_delay_ns).toBe(1.35);
    expect(rec.recommended_skew_target_ps).toBe(70);
    expect(rec.notes).toHaveLength(1);
  });

  it("does not treat WNS of exactly -0.02 as failing", () => {
    const rec = recommendForDomain({ domain: "default", wns: -0.02, holdIssues: false });

    expect(rec.recommended_insertion_delay_ns).toBe(1.5);
    expect(rec.recommended_skew_target_ps).toBe(80);
    expect(rec.notes).toEqual([]);
  });

  it("floors the setup reduction at 0.7 ns", () => {
    const rec = recommendForDomain({
      domain: "clk",
      wns: -0.5,
      holdIssues: false,
      avgInsertionNs: 0.75,
    });

    expect(rec.recommended_insertion_delay_ns).toBe(0.7);
  });

  it("raises insertion delay and skew target for hold issues", () => {
    const rec = recommendForDomain({ domain: "clk", holdIssues: true });

    expect(rec.recommended_insertion_delay_ns).toBe(1.62);
    expect(rec.recommended_skew_target_ps).toBe(90);
  });

  it("tightens skew only above 120 ps", () => {
    expect(
      recommendForDomain({ domain: "a", holdIssues: false, globalSkewPs: 121 })
        .recommended_skew_target_ps
    ).toBe(70);
    expect(
      recommendForDomain({ domain: "b", holdIssues: false, globalSkewPs: 120 })
        .recommended_skew_target_ps
    ).toBe(80);
  });

  it("clamps insertion delay into the 0.6-2.2 ns band", () => {
    const high = recommendForDomain({ domain: "a", holdIssues: true, avgInsertionNs: 2.1 });
    const low = recommendForDomain({ domain: "b", holdIssues: false, avgInsertionNs: 0.3 });

    expect(high.recommended_insertion_delay_ns).toBe(2.2);
    expect(low.recommended_insertion_delay_ns).toBe(0.6);
  });

  it("keeps every recommendation inside the guardrail bands", () => {
    const wnsValues = [undefined, -1, -0.11, -0.05, 0.1];
    const insertionValues = [undefined, 0.1, 1.0, 3.0];
    const skewValues = [undefined, 50, 150];

    for (const wns of wnsValues) {
      for (const holdIssues of [true, false]) {
        for (const avgInsertionNs of insertionValues) {
          for (const globalSkewPs of skewValues) {
            const rec = recommendForDomain({
              domain: "d",
              wns,
              holdIssues,
              avgInsertionNs,
              globalSkewPs,
            });
            expect(rec.recommended_insertion_delay_ns).toBeGreaterThanOrEqual(0.6);
            expect(rec.recommended_insertion_delay_ns).toBeLessThanOrEqual(2.2);
            expect(rec.recommended_skew_target_ps).toBeGreaterThanOrEqual(60);
            expect(rec.recommended_skew_target_ps).toBeLessThanOrEqual(120);
          }
        }
      }
    }
  });

  it("is deterministic", () => {
    const input: PolicyInput = {
      domain: "core_clk",
      wns: -0.08,
      holdIssues: true,
      avgInsertionNs: 1.3,
      globalSkewPs: 140,
    };

    expect(JSON.stringify(recommendForDomain(input))).toBe(
      JSON.stringify(recommendForDomain(input))
    );
  });

  it("attaches the four implementation hints to every domain", () => {
    const first = recommendForDomain({ domain: "a", holdIssues: false });
    first.implementation_hints.push("mutated");
    const second = recommendForDomain({ domain: "b", holdIssues: true });

    expect(second.implementation_hints).toEqual([...IMPLEMENTATION_HINTS]);
    expect(second.implementation_hints).toHaveLength(4);
  });

  it("reports absent observations as null", () => {
    const rec = recommendForDomain({ domain: "default", holdIssues: false });

    expect(rec.observed).toEqual({
      avg_insertion_ns: null,
      global_skew_ps: null,
      wns: null,
      hold_issues: false,
    });
  });
});

describe("policy rules", () => {
  const base: PolicyInput = { domain: "clk", holdIssues: false };

  it("starts from the observed insertion delay or the 1.5 ns baseline", () => {
    expect(initialState(base)).toEqual({ insertionNs: 1.5, skewPs: 80, notes: [] });
    expect(initialState({ ...base, avgInsertionNs: 1.2 }).insertionNs).toBe(1.2);
  });

  it("returns the state unchanged when a rule does not fire", () => {
    const state = initialState(base);

    expect(setupFailureRule(state, base)).toBe(state);
    expect(holdFailureRule(state, base)).toBe(state);
    expect(highSkewRule(state, base)).toBe(state);
  });

  it("applies hold after setup on the already-reduced value", () => {
    const input: PolicyInput = { ...base, wns: -0.2, holdIssues: true };
    const afterSetup = setupFailureRule(initialState(input), input);
    const afterHold = holdFailureRule(afterSetup, input);

    expect(afterSetup.insertionNs).toBe(1.275);
    expect(afterHold.insertionNs).toBe(1.377);
    expect(afterHold.skewPs).toBe(90);
  });

  it("clamps both targets", () => {
    expect(guardrailRule({ insertionNs: 5, skewPs: 10, notes: [] }, base)).toEqual({
      insertionNs: 2.2,
      skewPs: 60,
      notes: [],
    });
  });
});

describe("roundTo", () => {
  it("rounds to the requested number of places", () => {
    expect(roundTo(1.547 * 1.08, 3)).toBe(1.671);
    expect(roundTo(1.82 * 0.85, 3)).toBe(1.547);
  });
});

describe("tie rounding", () => {
  it("rounds exact ties to the even digit", () => {
    expect(roundTo(1.0625, 3)).toBe(1.062);
    expect(roundTo(1.1875, 3)).toBe(1.188);
    expect(roundTo(-0.0625, 3)).toBe(-0.062);
    expect(roundTo(1.0626, 3)).toBe(1.063);
  });

  it("formats ties to the even digit", () => {
    expect(formatFixed(122.5, 0)).toBe("122");
    expect(formatFixed(123.5, 0)).toBe("124");
    expect(formatFixed(-2.5, 0)).toBe("-2");
    expect(formatFixed(-0.0625, 3)).toBe("-0.062");
    expect(formatFixed(0.12, 3)).toBe("0.120");
  });

  it("keeps a severe setup cut on an exact tie at the even value", () => {
    const rec = recommendForDomain({ domain: "clk", wns: -0.2, holdIssues: false, avgInsertionNs: 1.25 });

    expect(rec.recommended_insertion_delay_ns).toBe(1.062);
  });

  it("writes tie values in notes with the even digit", () => {
    const rec = recommendForDomain({
      domain: "clk",
      wns: -0.0625,
      holdIssues: false,
      globalSkewPs: 122.5,
    });

    expect(rec.notes).toEqual([
      "clk: Setup failing (WNS=-0.062). Reduce insertion delay ~10–15% and tighten skew target.",
      "clk: High global skew (122 ps). Target ≤70–80 ps.",
    ]);
  });
});
