export { buildReportMarkdown, type ReportInput } from "./report.js";
export { writeExports, EXPORT_FILES, type ExportOptions, type ExportResult } from "./exports.js";
