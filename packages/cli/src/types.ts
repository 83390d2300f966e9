/**
 * @ledger-replay/cli — I/O types.
 */

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes raised while reading records from a source. */
export type RecordSourceErrorCode =
  | "MISSING_HEADER"
  | "MALFORMED_RECORD";

/**
 * A record source could not produce a well-typed record.
 * Fatal to the run, like a ProcessingError.
 */
export class RecordSourceError extends Error {
  public readonly code: RecordSourceErrorCode;
  /** 1-based line number in the input. */
  public readonly line: number;

  constructor(code: RecordSourceErrorCode, message: string, line: number) {
    super(message);
    this.name = "RecordSourceError";
    this.code = code;
    this.line = line;
  }
}

// ─── Stream Types ────────────────────────────────────────────────────────

/**
 * Anything text can be written to (process.stdout, a test buffer).
 */
export interface TextSink {
  write(chunk: string): unknown;
}
