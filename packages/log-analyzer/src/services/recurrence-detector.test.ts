import { describe, it, expect } from "vitest";
import { decodeStructuredEntries } from "../parser/structured.js";
import { createLogRecord, type LogRecord } from "../types.js";
import { detectRecurring } from "./recurrence-detector.js";

function error(iso: string, message: string, level = "ERROR"): LogRecord {
  return createLogRecord({
    timestamp: new Date(iso),
    level,
    service: "payment",
    host: "host1",
    message,
  });
}

describe("detectRecurring", () => {
  it("excludes a message seen on a single day, however often", () => {
    const records = Array.from({ length: 10 }, (_, i) =>
      error(`2025-01-01T0${i}:00:00Z`, "Payment failed"),
    );
    expect(detectRecurring(records).size).toBe(0);
  });

  it("includes a message seen on two distinct days", () => {
    const result = detectRecurring([
      error("2025-01-01T10:00:00Z", "Payment failed"),
      error("2025-01-02T10:00:00Z", "Payment failed"),
    ]);

    expect(result).toEqual(new Map([["Payment failed", new Set(["2025-01-01", "2025-01-02"])]]));
  });

  it("counts distinct dates, not occurrences", () => {
    const result = detectRecurring([
      error("2025-01-01T10:00:00Z", "Timeout"),
      error("2025-01-01T11:00:00Z", "Timeout"),
      error("2025-01-03T10:00:00Z", "Timeout"),
      error("2025-01-05T23:59:59Z", "Timeout"),
    ]);

    expect(result.get("Timeout")?.size).toBe(3);
  });

  it("compares messages exactly", () => {
    const result = detectRecurring([
      error("2025-01-01T10:00:00Z", "Payment failed: id=1"),
      error("2025-01-02T10:00:00Z", "Payment failed: id=2"),
      error("2025-01-03T10:00:00Z", "payment failed: id=1"),
      error("2025-01-04T10:00:00Z", "Payment failed: id=1 "),
    ]);
    expect(result.size).toBe(0);
  });

  it("ignores non-ERROR levels", () => {
    const result = detectRecurring([
      error("2025-01-01T10:00:00Z", "Slow query", "WARN"),
      error("2025-01-02T10:00:00Z", "Slow query", "WARN"),
      error("2025-01-03T10:00:00Z", "Slow query"),
    ]);
    expect(result.size).toBe(0);
  });

  it("takes the day from the timestamp's own offset", () => {
    const records = decodeStructuredEntries(
      JSON.stringify([
        { timestamp: "2025-01-01T10:00:00", level: "ERROR", service: "api", host: "h1", message: "X" },
        { timestamp: "2025-01-02T01:00:00+05:00", level: "ERROR", service: "api", host: "h1", message: "X" },
      ]),
    );

    expect(detectRecurring(records)).toEqual(
      new Map([["X", new Set(["2025-01-01", "2025-01-02"])]]),
    );
  });

  it("keeps first-seen order of messages", () => {
    const result = detectRecurring([
      error("2025-01-01T10:00:00Z", "B"),
      error("2025-01-01T10:00:00Z", "A"),
      error("2025-01-02T10:00:00Z", "A"),
      error("2025-01-02T10:00:00Z", "B"),
    ]);
    expect([...result.keys()]).toEqual(["B", "A"]);
  });
});
