import { createLogger } from "@logscope/shared/utils";

import { detectBursts } from "./services/burst-detector.js";
import { filterRecords } from "./services/filter.js";
import { loadAndCombine } from "./services/loader.js";
import { openLogStore, type OpenedLogStore } from "./services/log-store.js";
import { detectRecurring } from "./services/recurrence-detector.js";
import { writeDailySummary, writeLevelReports } from "./services/report-writer.js";
import type { BurstWindow, LogRecord, RecurringIssues } from "./types.js";

const logger = createLogger("logscope");

export interface AnalysisOptions {
  jsonPath?: string;
  logPath?: string;
  outDir: string;
  service?: string;
  host?: string;
  /** Persist the filtered records when set. */
  databaseUrl?: string;
  /** Store factory, replaced in tests. Defaults to a PostgreSQL connection. */
  openStore?: (databaseUrl: string) => OpenedLogStore;
}

export interface AnalysisResult {
  loaded: number;
  records: LogRecord[];
  bursts: BurstWindow[];
  recurring: RecurringIssues;
  reportFiles: string[];
  outDir: string;
  /** Rows written to the database, null when persistence was off. */
  persisted: number | null;
}

async function persist(
  records: readonly LogRecord[],
  databaseUrl: string,
  openStore: (databaseUrl: string) => OpenedLogStore,
): Promise<number> {
  const { store, close } = openStore(databaseUrl);
  try {
    await store.ensureSchema();
    return await store.saveAll(records);
  } finally {
    await close();
  }
}

/**
 * Run the whole pipeline: load, filter, write the reports, detect bursts and
 * recurring issues, and optionally persist the filtered records.
 */
export async function runAnalysis(options: AnalysisOptions): Promise<AnalysisResult> {
  logger.info("Analysis started");

  const loaded = await loadAndCombine({
    jsonPath: options.jsonPath,
    logPath: options.logPath,
  });
  logger.info({ count: loaded.length }, "Logs loaded");

  const records = filterRecords(loaded, {
    service: options.service,
    host: options.host,
  });
  logger.info(
    { count: records.length, service: options.service, host: options.host },
    "Logs after filter",
  );

  const summaryFile = await writeDailySummary(records, options.outDir);
  const levelFiles = await writeLevelReports(records, options.outDir);

  const bursts = detectBursts(records);
  const recurring = detectRecurring(records);
  logger.info(
    { bursts: bursts.length, recurring: recurring.size },
    "Anomaly detection finished",
  );

  const persisted = options.databaseUrl
    ? await persist(records, options.databaseUrl, options.openStore ?? openLogStore)
    : null;

  logger.info({ outDir: options.outDir }, "Analysis finished");

  return {
    loaded: loaded.length,
    records,
    bursts,
    recurring,
    reportFiles: [summaryFile, ...levelFiles],
    outDir: options.outDir,
    persisted,
  };
}
