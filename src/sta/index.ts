/**
 * STA Module Index
 */

export { toCsv, parseCsv, type CsvCell } from "./csv.js";

export {
  STA_CSV_HEADERS,
  parseStaReport,
  staSummaryToCsv,
  type StaSummary,
  type TimingPath,
} from "./report-parser.js";

export { ECO_ACTIONS, recommendEcoAction, suggestEcos, type EcoAction } from "./eco-helper.js";
