import { createLogRecord, type LogRecord } from "../types.js";
import { parseLogTimestamp } from "./timestamp.js";

// <date> <time> <level> <service> <host> <message...>
// dotAll so U+2028/U+2029 inside a message do not end the match.
const TEXT_LINE_REGEX = /^(\S+ \S+) (\S+) (\S+) (\S+) (.+)$/s;

/**
 * Parse one free-text log line into a canonical record.
 *
 * The message is everything after the host, kept verbatim. Lines with the
 * wrong shape or an invalid timestamp yield null; this function never throws.
 *
 * @example
 *   parseTextLine("2025-01-01 10:00:00 ERROR payment host1 Payment failed");
 *   // { timestamp: 2025-01-01T10:00:00.000Z, level: "ERROR", service: "payment",
 *   //   host: "host1", message: "Payment failed", utcOffsetMinutes: 0 }
 */
export function parseTextLine(line: string): LogRecord | null {
  const match = TEXT_LINE_REGEX.exec(line);
  if (!match) return null;

  const [, rawTimestamp, level, service, host, message] = match;
  if (
    rawTimestamp === undefined ||
    level === undefined ||
    service === undefined ||
    host === undefined ||
    message === undefined
  ) {
    return null;
  }

  const timestamp = parseLogTimestamp(rawTimestamp);
  if (!timestamp) return null;

  return createLogRecord({ timestamp, level, service, host, message });
}
