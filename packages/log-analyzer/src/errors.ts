// ---------------------------------------------------------------------------
// Analyzer Error Taxonomy
// ---------------------------------------------------------------------------
// Fatal:     INVALID_INPUT, STRUCTURED_DECODE_FAILURE (abort the run)
// Non-fatal: SOURCE_MISSING (warned, source skipped)
//            MALFORMED_LINE (line dropped silently, never thrown)
// ---------------------------------------------------------------------------

export enum AnalyzerErrorCode {
  INVALID_INPUT = "INVALID_INPUT",
  SOURCE_MISSING = "SOURCE_MISSING",
  MALFORMED_LINE = "MALFORMED_LINE",
  STRUCTURED_DECODE_FAILURE = "STRUCTURED_DECODE_FAILURE",
}

const FATAL_CODES = new Set<AnalyzerErrorCode>([
  AnalyzerErrorCode.INVALID_INPUT,
  AnalyzerErrorCode.STRUCTURED_DECODE_FAILURE,
]);

export class AnalyzerError extends Error {
  readonly code: AnalyzerErrorCode;
  readonly details: Record<string, unknown>;

  constructor(
    code: AnalyzerErrorCode,
    message: string,
    details: Record<string, unknown> = {},
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "AnalyzerError";
    this.code = code;
    this.details = details;
  }

  get fatal(): boolean {
    return isFatalCode(this.code);
  }
}

export function isFatalCode(code: AnalyzerErrorCode): boolean {
  return FATAL_CODES.has(code);
}

export function isAnalyzerError(err: unknown): err is AnalyzerError {
  return err instanceof AnalyzerError;
}
