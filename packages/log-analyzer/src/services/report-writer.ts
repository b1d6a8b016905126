import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import { formatLogTimestamp, toCalendarDate } from "../parser/timestamp.js";
import type { DailySummary, LogRecord } from "../types.js";
import { toCsv } from "./csv.js";

export const DAILY_SUMMARY_FILE = "daily_summary.csv";

const DAILY_SUMMARY_HEADER = ["date", "level", "count"];
const LEVEL_REPORT_HEADER = ["timestamp", "service", "host", "message"];

// ---------------------------------------------------------------------------
// Aggregation
// ---------------------------------------------------------------------------

/**
 * Group records by level. Keys follow first occurrence, and each group keeps
 * input order.
 */
export function partitionByLevel(records: readonly LogRecord[]): Map<string, LogRecord[]> {
  const partitions = new Map<string, LogRecord[]>();

  for (const record of records) {
    const group = partitions.get(record.level);
    if (group) {
      group.push(record);
    } else {
      partitions.set(record.level, [record]);
    }
  }

  return partitions;
}

/** Count records per calendar date (source wall clock) and level. */
export function summarizeByDay(records: readonly LogRecord[]): DailySummary {
  const summary: DailySummary = new Map();

  for (const record of records) {
    const day = toCalendarDate(record.timestamp, record.utcOffsetMinutes);
    let levels = summary.get(day);
    if (!levels) {
      levels = new Map();
      summary.set(day, levels);
    }
    levels.set(record.level, (levels.get(record.level) ?? 0) + 1);
  }

  return summary;
}

/**
 * File name for a level's report. Anything outside [A-Za-z0-9_-] becomes "_"
 * so a level can never point outside the output directory.
 */
export function levelReportFileName(level: string): string {
  const safe = level.replace(/[^A-Za-z0-9_-]/g, "_");
  return `${safe.length > 0 ? safe : "_"}.csv`;
}

// ---------------------------------------------------------------------------
// Writers
// ---------------------------------------------------------------------------

/**
 * Write `daily_summary.csv` (date, level, count) into `outDir`, creating the
 * directory when needed.
 *
 * @returns the path of the written file.
 */
export async function writeDailySummary(
  records: readonly LogRecord[],
  outDir: string,
): Promise<string> {
  await mkdir(outDir, { recursive: true });

  const rows: string[][] = [DAILY_SUMMARY_HEADER];
  for (const [day, levels] of summarizeByDay(records)) {
    for (const [level, count] of levels) {
      rows.push([day, level, String(count)]);
    }
  }

  const filePath = path.join(outDir, DAILY_SUMMARY_FILE);
  await writeFile(filePath, toCsv(rows), "utf-8");
  return filePath;
}

/**
 * Write one `<LEVEL>.csv` per level into `outDir`. Rows are buffered per file
 * and each file is written once. No records means no files, though the
 * directory is still created.
 *
 * @returns the paths of the written files, in first-occurrence order.
 */
export async function writeLevelReports(
  records: readonly LogRecord[],
  outDir: string,
): Promise<string[]> {
  await mkdir(outDir, { recursive: true });

  if (records.length === 0) return [];

  // Levels that sanitize to the same name share one file.
  const files = new Map<string, string[][]>();
  for (const [level, group] of partitionByLevel(records)) {
    const fileName = levelReportFileName(level);
    let rows = files.get(fileName);
    if (!rows) {
      rows = [LEVEL_REPORT_HEADER];
      files.set(fileName, rows);
    }
    for (const record of group) {
      rows.push([
        formatLogTimestamp(record.timestamp, record.utcOffsetMinutes),
        record.service,
        record.host,
        record.message,
      ]);
    }
  }

  const written: string[] = [];
  for (const [fileName, rows] of files) {
    const filePath = path.join(outDir, fileName);
    await writeFile(filePath, toCsv(rows), "utf-8");
    written.push(filePath);
  }
  return written;
}
