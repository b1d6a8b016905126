import { z } from "zod";
import { AnalyzerError, AnalyzerErrorCode } from "../errors.js";
import { createLogRecord, type LogRecord } from "../types.js";
import { parseIsoDateTime } from "./timestamp.js";

// Unknown keys are stripped by z.object, so extra fields are ignored.
const StructuredEntrySchema = z.object({
  timestamp: z.string(),
  level: z.string(),
  service: z.string(),
  host: z.string(),
  message: z.string(),
});

const StructuredSourceSchema = z.array(StructuredEntrySchema);

export type StructuredEntry = z.infer<typeof StructuredEntrySchema>;

function decodeFailure(
  message: string,
  details: Record<string, unknown>,
  cause?: unknown,
): AnalyzerError {
  return new AnalyzerError(
    AnalyzerErrorCode.STRUCTURED_DECODE_FAILURE,
    message,
    details,
    cause === undefined ? undefined : { cause },
  );
}

/**
 * Decode a structured (JSON array) log source into canonical records, keeping
 * entry order.
 *
 * Structured input is trusted to be well-formed: invalid JSON, a wrong shape
 * or an unparsable timestamp throws `STRUCTURED_DECODE_FAILURE` for the whole
 * source instead of dropping the entry.
 *
 * @param content - Raw file contents.
 * @param source - Name used in error messages, usually the file path.
 */
export function decodeStructuredEntries(
  content: string,
  source = "structured source",
): LogRecord[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw decodeFailure(`${source} is not valid JSON`, { source }, err);
  }

  const result = StructuredSourceSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw decodeFailure(
      `${source} has an invalid log entry${where}: ${issue?.message ?? "unknown error"}`,
      { source, issues: result.error.issues },
    );
  }

  return result.data.map((entry, index) => {
    const parsed = parseIsoDateTime(entry.timestamp);
    if (!parsed) {
      throw decodeFailure(
        `${source} entry ${index} has an invalid timestamp "${entry.timestamp}"`,
        { source, index, timestamp: entry.timestamp },
      );
    }

    return createLogRecord({
      timestamp: parsed.instant,
      utcOffsetMinutes: parsed.utcOffsetMinutes,
      level: entry.level,
      service: entry.service,
      host: entry.host,
      message: entry.message,
    });
  });
}
