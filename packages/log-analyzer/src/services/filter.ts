import type { LogRecord, RecordFilter } from "../types.js";

/**
 * Keep the records matching every supplied criterion.
 *
 * An absent or empty criterion matches everything. Order is preserved and the
 * input array is left untouched.
 */
export function filterRecords(
  records: readonly LogRecord[],
  criteria: RecordFilter = {},
): LogRecord[] {
  const { service, host } = criteria;

  return records.filter(
    (record) =>
      (!service || record.service === service) &&
      (!host || record.host === host),
  );
}
