#!/usr/bin/env node

import { parseArgs, USAGE_DETAIL, type Invocation } from "./cli-args.js";
import { ReportError } from "./errors/report-error.js";
import { EXIT_FAILURE, runParser } from "./index.js";
import { Logger } from "./utils/logger.js";

function printUsage(error?: ReportError): void {
  if (error) console.error(`Error: ${error.message}`);
  for (const line of USAGE_DETAIL) console.error(line);
  console.error("");
  console.error("  Example usage:");
  console.error("    awr-csv awr*.txt > awr.csv");
  console.error("");
}

export function main(argv: string[]): number {
  if (argv.length === 0) {
    printUsage();
    return EXIT_FAILURE;
  }

  let invocation: Invocation;
  try {
    invocation = parseArgs(argv);
  } catch (err) {
    if (!(err instanceof ReportError)) throw err;
    printUsage(err);
    return EXIT_FAILURE;
  }
  if (invocation.help) {
    printUsage();
    return EXIT_FAILURE;
  }

  const { options, files } = invocation;
  const log = new Logger({ silent: options.silent, verbose: options.verbose, debug: options.debug });
  log.verbose("Running in verbose mode");
  log.debug(`Called with parameters: ${argv.join(" ")}`);

  return runParser(options, files, {
    stdout: (line) => process.stdout.write(`${line}\n`),
    log,
  }).exitCode;
}

process.exitCode = main(process.argv.slice(2));
