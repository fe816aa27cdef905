export {
  buildReport,
  serializeReport,
  summaryToJson,
  queryInfoToJson,
  analyticsToJson,
  recordToJson,
  snakeCaseKeys,
  toSnakeCase,
} from "./report.js";
export type {
  ReportDocument,
  ReportInput,
  QueryInfo,
  QueryInfoJson,
  SummaryJson,
  UsageAnalyticsJson,
} from "./report.js";
export { writeReport, resolveArchivePath } from "./report-writer.js";
export type { WriteReportOptions, WrittenReport } from "./report-writer.js";
