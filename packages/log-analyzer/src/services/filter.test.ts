import { describe, it, expect } from "vitest";
import { createLogRecord, type LogRecord } from "../types.js";
import { filterRecords } from "./filter.js";

function record(overrides: Partial<LogRecord>): LogRecord {
  return createLogRecord({
    timestamp: new Date("2025-01-01T10:00:00Z"),
    level: "INFO",
    service: "payment",
    host: "host1",
    message: "ok",
    ...overrides,
  });
}

const records = [
  record({ service: "payment", host: "host1", message: "a" }),
  record({ service: "payment", host: "host2", message: "b" }),
  record({ service: "auth", host: "host2", message: "c" }),
  record({ service: "payment", host: "host2", message: "d" }),
];

describe("filterRecords", () => {
  it("returns every record, in order, when no criteria are given", () => {
    const result = filterRecords(records);
    expect(result).toEqual(records);
    expect(result).not.toBe(records);
  });

  it("treats empty-string criteria as absent", () => {
    expect(filterRecords(records, { service: "", host: "" })).toEqual(records);
  });

  it("filters by service only", () => {
    expect(filterRecords(records, { service: "payment" }).map((r) => r.message)).toEqual([
      "a",
      "b",
      "d",
    ]);
  });

  it("filters by host only", () => {
    expect(filterRecords(records, { host: "host2" }).map((r) => r.message)).toEqual([
      "b",
      "c",
      "d",
    ]);
  });

  it("requires both criteria to match when both are given", () => {
    expect(
      filterRecords(records, { service: "payment", host: "host2" }).map((r) => r.message),
    ).toEqual(["b", "d"]);
  });

  it("returns an empty list when nothing matches", () => {
    expect(filterRecords(records, { service: "unknown", host: "unknown" })).toEqual([]);
  });

  it("is idempotent", () => {
    const criteria = { service: "payment", host: "host2" };
    const once = filterRecords(records, criteria);
    expect(filterRecords(once, criteria)).toEqual(once);
  });

  it("does not mutate its input", () => {
    const input = [...records];
    filterRecords(input, { service: "auth" });
    expect(input).toEqual(records);
  });
});
