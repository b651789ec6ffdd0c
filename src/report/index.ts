export { buildJsonReport, renderJsonReport } from "./json-reporter.js";
export { renderTextReport } from "./text-reporter.js";
export type { TextRenderOptions } from "./text-reporter.js";
export { renderSarifReport } from "./sarif-reporter.js";
export {
  escapeData,
  escapeProperty,
  renderGithubAnnotations,
} from "./github-reporter.js";
export { EXIT_FAIL, EXIT_PASS, exitCodeForVerdict } from "./report-utils.js";
export type {
  ReportFormat,
  ReportInput,
  ScanMetadata,
  ScanReport,
  SummaryCounts,
  SummaryInfo,
  TargetInfo,
  ToolInfo,
} from "./types.js";
