import { toCalendarDate } from "../parser/timestamp.js";
import { ERROR_LEVEL, type LogRecord, type RecurringIssues } from "../types.js";

/**
 * Find ERROR messages seen on more than one calendar day. A record's day is
 * the date on its source's wall clock.
 *
 * Messages are compared verbatim (no case folding, no templating of ids).
 * A message repeated any number of times on a single day is not recurring.
 * Keys keep the order in which messages were first seen.
 */
export function detectRecurring(records: readonly LogRecord[]): RecurringIssues {
  const errorDays: RecurringIssues = new Map();

  for (const record of records) {
    if (record.level !== ERROR_LEVEL) continue;

    let days = errorDays.get(record.message);
    if (!days) {
      days = new Set();
      errorDays.set(record.message, days);
    }
    days.add(toCalendarDate(record.timestamp, record.utcOffsetMinutes));
  }

  const recurring: RecurringIssues = new Map();
  for (const [message, days] of errorDays) {
    if (days.size > 1) recurring.set(message, days);
  }
  return recurring;
}
