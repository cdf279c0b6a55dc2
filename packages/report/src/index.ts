export {
  formatParams,
  formatPercent,
  formatPrice,
  formatSummaryTable,
  type SummaryRow,
} from "./format.js";
export {
  buildReportMarkdown,
  writeReportArtifact,
  type ReportPayload,
  type StrategyReportSection,
} from "./markdown.js";
