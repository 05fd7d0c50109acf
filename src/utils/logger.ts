/**
 * Leveled diagnostics on stderr.
 *
 * Every line carries a fixed prefix (`Info : `, `Debug: `, `Error: `) so the
 * output can be grepped apart from the CSV on stdout. Errors are always shown
 * and counted; the run loop reads `errorCount` to decide the exit code.
 */

import type { ReportError } from "../errors/report-error.js";

export type LogSink = (line: string) => void;

export interface LoggerOptions {
  silent?: boolean;
  verbose?: boolean;
  debug?: boolean;
  sink?: LogSink;
}

export class Logger {
  readonly silent: boolean;
  readonly verboseEnabled: boolean;
  readonly debugEnabled: boolean;
  private readonly sink: LogSink;
  private errors = 0;

  constructor(options: LoggerOptions = {}) {
    this.silent = options.silent ?? false;
    this.verboseEnabled = options.verbose ?? false;
    this.debugEnabled = options.debug ?? false;
    this.sink = options.sink ?? ((line) => console.error(line));
  }

  get errorCount(): number {
    return this.errors;
  }

  /** Progress information, suppressed by -s. */
  info(message: string): void {
    if (!this.silent) this.sink(`Info : ${message}`);
  }

  /** Extracted report values, shown regardless of -s. */
  print(message: string): void {
    this.sink(`Info : ${message}`);
  }

  verbose(message: string): void {
    if (this.verboseEnabled) this.sink(`Info : ${message}`);
  }

  debug(message: string): void {
    if (this.debugEnabled) this.sink(`Debug: ${message}`);
  }

  error(message: string): void {
    this.errors++;
    this.sink(`Error: ${message}`);
  }

  /** Report a structured error; the remediation hint only shows in verbose mode. */
  failure(err: ReportError): void {
    this.error(err.message);
    if (err.remediation) this.verbose(`  ${err.remediation}`);
  }
}
