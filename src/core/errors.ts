/**
 * Error type for report reading and parsing.
 *
 * `code` tells callers which stage failed; `line` is the 1-based input
 * line for parse errors.
 */

export type ReportErrorCode =
  | "io"          // opening or reading the report failed
  | "structure"   // a line needs context that does not exist yet
  | "format";     // a line matched a rule but a number did not parse

export class ReportError extends Error {
  readonly code: ReportErrorCode;
  readonly line?: number;

  constructor(message: string, code: ReportErrorCode, line?: number) {
    super(line !== undefined ? `Line ${line}: ${message}` : message);
    this.name = "ReportError";
    this.code = code;
    this.line = line;
  }
}
