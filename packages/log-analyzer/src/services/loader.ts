import { readFile } from "node:fs/promises";
import { createLogger } from "@logscope/shared/utils";

import { AnalyzerError, AnalyzerErrorCode } from "../errors.js";
import { decodeStructuredEntries } from "../parser/structured.js";
import { parseTextLine } from "../parser/text-line.js";
import type { LoadSources, LogRecord } from "../types.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const logger = createLogger("log-loader");

const LINE_SPLIT_REGEX = /\r?\n/;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** Read a source, or null (with a warning) when it does not exist. */
async function readSource(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf-8");
  } catch (err) {
    if (isNotFound(err)) {
      logger.warn({ path, code: AnalyzerErrorCode.SOURCE_MISSING }, "Log source not found, skipping");
      return null;
    }
    throw err;
  }
}

/** Parse every line of a text source, dropping the ones that do not parse. */
export function parseTextSource(content: string): LogRecord[] {
  const records: LogRecord[] = [];
  for (const line of content.split(LINE_SPLIT_REGEX)) {
    const record = parseTextLine(line.trim());
    if (record) records.push(record);
  }
  return records;
}

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

/**
 * Load the structured and text sources into one record sequence.
 *
 * Structured records come first in entry order, followed by text records in
 * line order; nothing is re-sorted. A missing source is skipped with a
 * warning, malformed text lines are dropped, and a structured source that
 * fails to decode aborts the load.
 *
 * @throws AnalyzerError INVALID_INPUT when neither source is given.
 * @throws AnalyzerError STRUCTURED_DECODE_FAILURE for a bad structured source.
 */
export async function loadAndCombine(sources: LoadSources): Promise<LogRecord[]> {
  const { jsonPath, logPath } = sources;

  if (!jsonPath && !logPath) {
    throw new AnalyzerError(
      AnalyzerErrorCode.INVALID_INPUT,
      "At least one input file must be provided",
    );
  }

  const records: LogRecord[] = [];

  if (jsonPath) {
    const content = await readSource(jsonPath);
    if (content !== null) {
      for (const record of decodeStructuredEntries(content, jsonPath)) {
        records.push(record);
      }
    }
  }

  if (logPath) {
    const content = await readSource(logPath);
    if (content !== null) {
      for (const record of parseTextSource(content)) {
        records.push(record);
      }
    }
  }

  logger.debug({ count: records.length }, "Log sources loaded");
  return records;
}
