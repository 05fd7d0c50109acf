/**
 * Structured error type for report processing.
 *
 * Carries a machine-readable code, category, and optional
 * remediation hint so the run loop can decide whether to skip a file,
 * count an error, or stop with a usage message.
 */

export type ErrorCategory =
  | "input"
  | "post_process"
  | "invocation";

export type ErrorCode =
  | "FILE_NOT_READABLE"
  | "HTML_REPORT"
  | "FOREIGN_REPORT"
  | "NOT_A_REPORT"
  | "UNKNOWN_FORMAT"
  | "MISSING_CRITICAL_FIELD"
  | "INVALID_OPTIONS"
  | "NO_FILES";

export class ReportError extends Error {
  readonly code: ErrorCode;
  readonly category: ErrorCategory;
  readonly remediation?: string;

  constructor(
    message: string,
    code: ErrorCode,
    category: ErrorCategory,
    remediation?: string,
  ) {
    super(message);
    this.name = "ReportError";
    this.code = code;
    this.category = category;
    this.remediation = remediation;
  }
}
