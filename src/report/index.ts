export { buildBatchReport, summarizeRecords } from "./json-reporter.js";
export {
  renderAsciiBox,
  renderAsciiTable,
  renderMarkdownReport,
} from "./markdown-reporter.js";
export type { MarkdownRenderOptions } from "./markdown-reporter.js";
export { CSV_COLUMNS, escapeCsv, exportCsv } from "./csv-exporter.js";
export { formatPercent, truncateText } from "./report-utils.js";
export type {
  BatchReport,
  BatchSummary,
  ReportInput,
  SeverityCounts,
  ToolInfo,
} from "./types.js";
