/**
 * Maps raw/unknown errors into structured ReportError instances.
 *
 * Catch blocks around file access call `toReportError(err, path)` to get a
 * typed error with code, category, and remediation hint.
 */

import { ReportError } from "./report-error.js";

function errnoCode(raw: unknown): string | undefined {
  if (raw instanceof Error && "code" in raw && typeof raw.code === "string") {
    return raw.code;
  }
  return undefined;
}

export function toReportError(raw: unknown, path: string): ReportError {
  if (raw instanceof ReportError) {
    return raw;
  }

  const message = `Cannot read file ${path} - ignoring...`;

  switch (errnoCode(raw)) {
    case "ENOENT":
      return new ReportError(message, "FILE_NOT_READABLE", "input", "Check that the path exists");
    case "EACCES":
    case "EPERM":
      return new ReportError(message, "FILE_NOT_READABLE", "input", "Check the file permissions");
    case "EISDIR":
      return new ReportError(message, "FILE_NOT_READABLE", "input", "Pass report files, not directories");
    default:
      return new ReportError(message, "FILE_NOT_READABLE", "input");
  }
}
