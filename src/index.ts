import { readFileSync } from "node:fs";
import { basename } from "node:path";
import { postProcess } from "./analysis/post-process.js";
import { formatHeaderRow, formatRecordRow } from "./csv-writer.js";
import { toReportError } from "./errors/error-mapper.js";
import { parseReportText } from "./parsers/awr-text.js";
import { classifyReportText, rejectionFor } from "./parsers/classifier.js";
import { printReportInfo } from "./report-info.js";
import type { RunOptions } from "./schemas/options.js";
import type { Logger } from "./utils/logger.js";

export { parseArgs, USAGE, USAGE_DETAIL } from "./cli-args.js";
export { CSV_COLUMNS, formatHeaderRow, formatRecordRow } from "./csv-writer.js";
export { parseReportText } from "./parsers/awr-text.js";
export { postProcess } from "./analysis/post-process.js";
export { ReportError } from "./errors/report-error.js";
export { Logger } from "./utils/logger.js";
export type { ReportRecord } from "./parsers/types.js";
export type { RunOptions } from "./schemas/options.js";

export const EXIT_SUCCESS = 0;
export const EXIT_PARTIAL_SUCCESS = 1;
export const EXIT_FAILURE = 2;

export interface RunIO {
  /** Receives one CSV line per call. */
  stdout: (line: string) => void;
  log: Logger;
}

export interface RunSummary {
  filesFound: number;
  rowsWritten: number;
  errors: number;
  exitCode: number;
}

function readReport(path: string): string {
  try {
    return readFileSync(path, "utf8");
  } catch (err) {
    throw toReportError(err, path);
  }
}

/**
 * Returns the CSV row for one report. Throws a ReportError when the file
 * cannot be read or is not a text report.
 */
export function processReportFile(path: string, options: RunOptions, log: Logger): string {
  const text = readReport(path);
  log.info(`Analyzing file ${path}`);

  const rejection = rejectionFor(classifyReportText(text.split("\n", 5)), path);
  if (rejection) throw rejection;

  const { record, state } = parseReportText(basename(path), text, log);
  const problem = postProcess(record, state, log);
  if (problem) log.failure(problem);

  if (options.printInfo) printReportInfo(record, log);
  return formatRecordRow(record);
}

/** Process every file in order, then print the summary. */
export function runParser(options: RunOptions, files: string[], io: RunIO): RunSummary {
  const { log } = io;

  if (options.headerOnly) {
    log.info("Printing header row and then exiting (found -H flag)");
    io.stdout(formatHeaderRow());
    return { filesFound: 0, rowsWritten: 0, errors: 0, exitCode: EXIT_SUCCESS };
  }

  if (options.noHeader) {
    log.info("Printing of header row disabled with -n flag");
  } else {
    log.verbose("Printing header row");
    io.stdout(formatHeaderRow());
  }

  let rowsWritten = 0;
  for (const path of files) {
    try {
      io.stdout(processReportFile(path, options, log));
      rowsWritten++;
    } catch (err) {
      log.failure(toReportError(err, path));
    }
  }

  const errors = log.errorCount;
  log.info("No more files found");
  log.info("");
  log.info("______SUMMARY______");
  log.info(`Files found       : ${files.length}`);
  log.info(`Files processed   : ${files.length - errors}`);
  log.info(`Processing errors : ${errors}`);
  log.info("");

  let exitCode: number;
  if (rowsWritten === 0) {
    log.info("Completed with no files processed");
    exitCode = EXIT_FAILURE;
  } else if (errors > 0) {
    log.info(`Completed with ${errors} errors`);
    exitCode = EXIT_PARTIAL_SUCCESS;
  } else {
    log.info("Completed successfully");
    exitCode = EXIT_SUCCESS;
  }
  return { filesFound: files.length, rowsWritten, errors, exitCode };
}
