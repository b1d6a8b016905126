// ---------------------------------------------------------------------------
// Log Analyzer Types
// ---------------------------------------------------------------------------

/** Level that burst and recurrence detection look at (exact, case-sensitive). */
export const ERROR_LEVEL = "ERROR";

/**
 * Canonical log record. Built once per input line or structured entry and
 * frozen; every field is populated.
 */
export interface LogRecord {
  /** The instant. Each read returns a fresh Date. */
  readonly timestamp: Date;
  /**
   * Offset of the source's wall clock, in minutes east of UTC. Zero for text
   * lines and for structured timestamps written without a zone.
   */
  readonly utcOffsetMinutes: number;
  /** Free-form category label, e.g. ERROR, INFO, WARN. */
  readonly level: string;
  readonly service: string;
  readonly host: string;
  readonly message: string;
}

export interface LoadSources {
  /** Structured (JSON array) source. */
  jsonPath?: string;
  /** Free-text source, one record per line. */
  logPath?: string;
}

export interface RecordFilter {
  service?: string;
  host?: string;
}

/** Chronologically sorted ERROR timestamps that fit inside the burst span. */
export type BurstWindow = readonly Date[];

export interface BurstOptions {
  /** Number of consecutive errors per window. Default 5. */
  windowSize?: number;
  /** Maximum span between the first and last error of a window. Default 60. */
  maxSpanSeconds?: number;
}

/** Error message -> distinct calendar dates (YYYY-MM-DD) it occurred on. */
export type RecurringIssues = Map<string, Set<string>>;

/** Calendar date -> level -> record count. */
export type DailySummary = Map<string, Map<string, number>>;

export interface LogRecordFields extends Omit<LogRecord, "utcOffsetMinutes"> {
  utcOffsetMinutes?: number;
}

export function createLogRecord(fields: LogRecordFields): LogRecord {
  const epochMs = fields.timestamp.getTime();

  return Object.freeze({
    get timestamp(): Date {
      return new Date(epochMs);
    },
    utcOffsetMinutes: fields.utcOffsetMinutes ?? 0,
    level: fields.level,
    service: fields.service,
    host: fields.host,
    message: fields.message,
  });
}
