import { pgTable, uuid, text, timestamp, integer, index } from "drizzle-orm/pg-core";

// ---------------------------------------------------------------------------
// Tables
// ---------------------------------------------------------------------------

export const logRecords = pgTable(
  "log_records",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    timestamp: timestamp("timestamp", { withTimezone: true }).notNull(),
    utcOffsetMinutes: integer("utc_offset_minutes").notNull().default(0),
    level: text("level").notNull(),
    service: text("service").notNull(),
    host: text("host").notNull(),
    message: text("message").notNull(),
  },
  (table) => [
    index("idx_log_records_service").on(table.service),
    index("idx_log_records_timestamp").on(table.timestamp),
  ],
);

export type LogRecordRow = typeof logRecords.$inferSelect;
export type NewLogRecordRow = typeof logRecords.$inferInsert;
