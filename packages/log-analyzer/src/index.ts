export * from "./types.js";
export { AnalyzerError, AnalyzerErrorCode, isAnalyzerError, isFatalCode } from "./errors.js";
export {
  parseLogTimestamp,
  parseIsoTimestamp,
  parseIsoDateTime,
  formatLogTimestamp,
  toCalendarDate,
  type IsoDateTime,
} from "./parser/timestamp.js";
export { parseTextLine } from "./parser/text-line.js";
export { decodeStructuredEntries, type StructuredEntry } from "./parser/structured.js";
export { loadAndCombine, parseTextSource } from "./services/loader.js";
export { filterRecords } from "./services/filter.js";
export {
  detectBursts,
  BURST_WINDOW_SIZE,
  BURST_MAX_SPAN_SECONDS,
} from "./services/burst-detector.js";
export { detectRecurring } from "./services/recurrence-detector.js";
export {
  partitionByLevel,
  summarizeByDay,
  levelReportFileName,
  writeDailySummary,
  writeLevelReports,
  DAILY_SUMMARY_FILE,
} from "./services/report-writer.js";
export { LogStore, openLogStore, type AnalyzerDatabase, type OpenedLogStore } from "./services/log-store.js";
export { logRecords, type LogRecordRow, type NewLogRecordRow } from "./schema.js";
export { runAnalysis, type AnalysisOptions, type AnalysisResult } from "./analysis.js";
