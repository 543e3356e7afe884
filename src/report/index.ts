export { buildJsonReport } from "./json-reporter.js";
export type { ReportInput } from "./json-reporter.js";
export { renderMarkdownReport } from "./markdown-reporter.js";
export type { MarkdownRenderOptions } from "./markdown-reporter.js";
export { renderRulesTable } from "./rules-table.js";
export { formatBand } from "./report-utils.js";
export type {
  ReportMetadata,
  ReviewReport,
  SummaryCounts,
  SummaryInfo,
  ToolInfo,
} from "./types.js";
