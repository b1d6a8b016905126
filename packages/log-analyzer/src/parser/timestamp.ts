// Timestamps without a zone designator are read as UTC. Calendar dates and
// rendered times use the wall clock the source wrote (the instant shifted by
// its offset), never the machine's time zone.

// Text logs: exactly "YYYY-MM-DD HH:MM:SS"
const LOG_TIMESTAMP_REGEX = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

// Structured logs: ISO 8601 date, optionally followed by a time and an offset
const ISO_TIMESTAMP_REGEX =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,6}))?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

const OFFSET_REGEX = /^([+-])(\d{2}):?(\d{2})$/;

interface DateTimeParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
}

/**
 * Build a UTC instant from calendar parts, or null when the parts do not name
 * a real instant (month 13, February 30th, hour 24 and the like).
 */
function buildUtcDate(parts: DateTimeParts): Date | null {
  if (parts.year < 1) return null;

  const date = new Date(0);
  date.setUTCFullYear(parts.year, parts.month - 1, parts.day);
  date.setUTCHours(parts.hour, parts.minute, parts.second, parts.millisecond);

  const roundTrips =
    date.getUTCFullYear() === parts.year &&
    date.getUTCMonth() === parts.month - 1 &&
    date.getUTCDate() === parts.day &&
    date.getUTCHours() === parts.hour &&
    date.getUTCMinutes() === parts.minute &&
    date.getUTCSeconds() === parts.second;

  return roundTrips ? date : null;
}

function toInt(value: string | undefined): number {
  return value === undefined ? 0 : parseInt(value, 10);
}

/** Offset in minutes east of UTC, or null for an out-of-range offset. */
function parseOffsetMinutes(designator: string): number | null {
  if (designator === "Z") return 0;

  const match = OFFSET_REGEX.exec(designator);
  if (!match) return null;

  const hours = toInt(match[2]);
  const minutes = toInt(match[3]);
  if (hours > 23 || minutes > 59) return null;

  const total = hours * 60 + minutes;
  return match[1] === "-" ? -total : total;
}

/**
 * Parse the fixed text-log layout `YYYY-MM-DD HH:MM:SS`.
 *
 * @returns the instant, or null when the layout or any component is invalid.
 */
export function parseLogTimestamp(value: string): Date | null {
  const match = LOG_TIMESTAMP_REGEX.exec(value);
  if (!match) return null;

  return buildUtcDate({
    year: toInt(match[1]),
    month: toInt(match[2]),
    day: toInt(match[3]),
    hour: toInt(match[4]),
    minute: toInt(match[5]),
    second: toInt(match[6]),
    millisecond: 0,
  });
}

export interface IsoDateTime {
  instant: Date;
  /** Minutes east of UTC; 0 for `Z` and for values without an offset. */
  utcOffsetMinutes: number;
}

/**
 * Parse an ISO 8601 date-time as found in structured logs, keeping the offset
 * it was written with.
 *
 * Accepts `YYYY-MM-DD`, `YYYY-MM-DDTHH:MM`, `YYYY-MM-DDTHH:MM:SS`, an optional
 * fraction of up to six digits (kept to millisecond precision), a space in
 * place of `T`, and an optional `Z` or `±HH:MM` offset.
 *
 * @returns null when the value is not a valid date-time.
 */
export function parseIsoDateTime(value: string): IsoDateTime | null {
  const match = ISO_TIMESTAMP_REGEX.exec(value);
  if (!match) return null;

  const fraction = match[7] ?? "";
  const local = buildUtcDate({
    year: toInt(match[1]),
    month: toInt(match[2]),
    day: toInt(match[3]),
    hour: toInt(match[4]),
    minute: toInt(match[5]),
    second: toInt(match[6]),
    millisecond: toInt(fraction.padEnd(3, "0").slice(0, 3)),
  });
  if (!local) return null;

  const designator = match[8];
  if (designator === undefined) return { instant: local, utcOffsetMinutes: 0 };

  const offsetMinutes = parseOffsetMinutes(designator);
  if (offsetMinutes === null) return null;

  return {
    instant: new Date(local.getTime() - offsetMinutes * 60_000),
    utcOffsetMinutes: offsetMinutes,
  };
}

/** Like {@link parseIsoDateTime}, returning only the instant. */
export function parseIsoTimestamp(value: string): Date | null {
  return parseIsoDateTime(value)?.instant ?? null;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

// The UTC fields of the shifted Date are the wall-clock fields at that offset.
function wallClock(date: Date, utcOffsetMinutes: number): Date {
  return new Date(date.getTime() + utcOffsetMinutes * 60_000);
}

function formatDate(wall: Date): string {
  return `${pad(wall.getUTCFullYear(), 4)}-${pad(wall.getUTCMonth() + 1)}-${pad(wall.getUTCDate())}`;
}

/** Calendar date, `YYYY-MM-DD`, of the instant at the given offset (UTC by default). */
export function toCalendarDate(date: Date, utcOffsetMinutes = 0): string {
  return formatDate(wallClock(date, utcOffsetMinutes));
}

/**
 * Render an instant in the text-log layout, `YYYY-MM-DD HH:MM:SS`, at the
 * given offset (UTC by default).
 */
export function formatLogTimestamp(date: Date, utcOffsetMinutes = 0): string {
  const wall = wallClock(date, utcOffsetMinutes);
  return (
    `${formatDate(wall)} ` +
    `${pad(wall.getUTCHours())}:${pad(wall.getUTCMinutes())}:${pad(wall.getUTCSeconds())}`
  );
}
