import { sql } from "drizzle-orm";
import { createDb, type Database } from "@logscope/shared/db";
import { createLogger } from "@logscope/shared/utils";

import * as analyzerSchema from "../schema.js";
import { logRecords, type NewLogRecordRow } from "../schema.js";
import type { LogRecord } from "../types.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const logger = createLogger("log-store");

const INSERT_BATCH_SIZE = 500;

export type AnalyzerDatabase = Database<typeof analyzerSchema>;

// ---------------------------------------------------------------------------
// LogStore
// ---------------------------------------------------------------------------

/** Persists canonical records into the `log_records` table. */
export class LogStore {
  private db: AnalyzerDatabase;

  constructor(db: AnalyzerDatabase) {
    this.db = db;
  }

  /** Create the table and its indexes when they do not exist yet. */
  async ensureSchema(): Promise<void> {
    await this.db.execute(sql`
      CREATE TABLE IF NOT EXISTS log_records (
        id uuid PRIMARY KEY DEFAULT gen_random_uuid(),
        timestamp timestamptz NOT NULL,
        utc_offset_minutes integer NOT NULL DEFAULT 0,
        level text NOT NULL,
        service text NOT NULL,
        host text NOT NULL,
        message text NOT NULL
      )
    `);
    await this.db.execute(
      sql`CREATE INDEX IF NOT EXISTS idx_log_records_service ON log_records (service)`,
    );
    await this.db.execute(
      sql`CREATE INDEX IF NOT EXISTS idx_log_records_timestamp ON log_records (timestamp)`,
    );
  }

  /**
   * Insert records in batches.
   *
   * @returns the number of rows inserted.
   */
  async saveAll(records: readonly LogRecord[]): Promise<number> {
    let inserted = 0;

    for (let start = 0; start < records.length; start += INSERT_BATCH_SIZE) {
      const values: NewLogRecordRow[] = records
        .slice(start, start + INSERT_BATCH_SIZE)
        .map((record) => ({
          timestamp: record.timestamp,
          utcOffsetMinutes: record.utcOffsetMinutes,
          level: record.level,
          service: record.service,
          host: record.host,
          message: record.message,
        }));

      await this.db.insert(logRecords).values(values);
      inserted += values.length;
    }

    logger.info({ count: inserted }, "Log records persisted");
    return inserted;
  }

  /** Total number of stored records. */
  async count(): Promise<number> {
    const result = await this.db
      .select({ count: sql<number>`count(*)::int` })
      .from(logRecords);
    return result[0]?.count ?? 0;
  }
}

export interface OpenedLogStore {
  store: LogStore;
  close: () => Promise<void>;
}

/** Connect to PostgreSQL and wrap the connection in a LogStore. */
export function openLogStore(connectionString: string): OpenedLogStore {
  const { db, pool } = createDb(connectionString, analyzerSchema);
  return {
    store: new LogStore(db),
    close: () => pool.end(),
  };
}
