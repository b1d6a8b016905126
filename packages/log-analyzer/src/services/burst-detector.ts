import { AnalyzerError, AnalyzerErrorCode } from "../errors.js";
import { ERROR_LEVEL, type BurstOptions, type BurstWindow, type LogRecord } from "../types.js";

export const BURST_WINDOW_SIZE = 5;
export const BURST_MAX_SPAN_SECONDS = 60;

/**
 * Find dense clusters of ERROR records.
 *
 * ERROR timestamps are sorted ascending and a window of `windowSize`
 * consecutive timestamps slides across them one step at a time; every window
 * whose first and last timestamps are at most `maxSpanSeconds` apart is
 * reported. Overlapping windows are all reported, unmerged, so nine errors
 * inside one minute yield five windows.
 *
 * Detection is global: callers wanting per-service bursts filter first.
 */
export function detectBursts(
  records: readonly LogRecord[],
  options: BurstOptions = {},
): BurstWindow[] {
  const windowSize = options.windowSize ?? BURST_WINDOW_SIZE;
  const maxSpanSeconds = options.maxSpanSeconds ?? BURST_MAX_SPAN_SECONDS;

  if (!Number.isInteger(windowSize) || windowSize < 1) {
    throw new AnalyzerError(
      AnalyzerErrorCode.INVALID_INPUT,
      `Burst window size must be a positive integer, got ${windowSize}`,
    );
  }
  if (!Number.isFinite(maxSpanSeconds) || maxSpanSeconds < 0) {
    throw new AnalyzerError(
      AnalyzerErrorCode.INVALID_INPUT,
      `Burst span must be a non-negative number of seconds, got ${maxSpanSeconds}`,
    );
  }

  const errorTimes = records
    .filter((record) => record.level === ERROR_LEVEL)
    .map((record) => record.timestamp)
    .sort((a, b) => a.getTime() - b.getTime());

  const maxSpanMs = maxSpanSeconds * 1000;
  const bursts: BurstWindow[] = [];

  for (let start = 0; start + windowSize <= errorTimes.length; start++) {
    const first = errorTimes[start];
    const last = errorTimes[start + windowSize - 1];
    if (first && last && last.getTime() - first.getTime() <= maxSpanMs) {
      bursts.push(errorTimes.slice(start, start + windowSize));
    }
  }

  return bursts;
}
