/**
 * Decide from its first lines whether a file is a plain-text workload
 * repository report worth scanning.
 */

import { ReportError } from "../errors/report-error.js";

export type ReportKind = "HTML" | "FOREIGN" | "TEXT_REPORT" | "UNRECOGNIZED";

const CLASSIFY_LINES = 5;

/** Classify from the already-split first lines of a file. */
export function classifyReportText(lines: string[]): ReportKind {
  const head = lines.slice(0, CLASSIFY_LINES);
  if (head.some((line) => /<HTML>/i.test(line))) return "HTML";
  if (head.some((line) => line.includes("STATSPACK"))) return "FOREIGN";
  if (head.some((line) => line.includes("WORKLOAD REPOSITORY"))) return "TEXT_REPORT";
  return "UNRECOGNIZED";
}

/** The error logged for a file that will not be scanned. */
export function rejectionFor(kind: ReportKind, path: string): ReportError | null {
  switch (kind) {
    case "HTML":
      return new ReportError(
        `${path} is in HTML format - ignoring...`,
        "HTML_REPORT",
        "input",
        "Generate the report in text format",
      );
    case "FOREIGN":
      return new ReportError(`${path} is a STATSPACK file - ignoring...`, "FOREIGN_REPORT", "input");
    case "UNRECOGNIZED":
      return new ReportError(`${path} is not an AWR file`, "NOT_A_REPORT", "input");
    case "TEXT_REPORT":
      return null;
  }
}
