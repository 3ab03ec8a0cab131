/**
 * Netlist Diff
 *
 * Very high-level structural comparison of two Verilog netlists by module name.
 */

export interface NetlistDiff {
  only_in_a: string[];
  only_in_b: string[];
  counts_a: Record<string, number>;
  counts_b: Record<string, number>;
}

/**
 * Count `module <name>` declarations, in first-seen order
 */
export function summarizeModules(text: string): Record<string, number> {
  const counts: Record<string, number> = {};

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line.startsWith("module ")) continue;

    const name = line.split(/\s+/)[1]?.split("(")[0];
    if (!name) continue;
    counts[name] = (counts[name] || 0) + 1;
  }

  return counts;
}

export function diffNetlists(textA: string, textB: string): NetlistDiff {
  const countsA = summarizeModules(textA);
  const countsB = summarizeModules(textB);

  return {
    only_in_a: Object.keys(countsA).filter((name) => !(name in countsB)).sort(),
    only_in_b: Object.keys(countsB).filter((name) => !(name in countsA)).sort(),
    counts_a: countsA,
    counts_b: countsB,
  };
}
