/**
 * Design Module Index
 *
 * Netlist, liberty, constraint and parasitic utilities that sit around the tuner
 */

export { summarizeModules, diffNetlists, type NetlistDiff } from "./netlist-diff.js";

export { checkLiberty, hasCell, type LibCheckFindings } from "./lib-check.js";

export {
  constraintSpecSchema,
  parseConstraintSpec,
  emitSdc,
  generateSdc,
  type ConstraintSpec,
} from "./sdc-generator.js";

export {
  SPEF_CSV_HEADERS,
  parseSpef,
  probeNets,
  parasiticsToCsv,
  type NetParasitics,
} from "./spef-probe.js";
