/**
 * Short-flag command line parsing: flags may be clustered (`-nv`) and
 * parsing stops at `--` or the first argument that is not a flag.
 */

import { ReportError } from "./errors/report-error.js";
import { runOptionsSchema, type RunOptions, type RunOptionsInput } from "./schemas/options.js";

export interface Invocation {
  options: RunOptions;
  files: string[];
  help: boolean;
}

const FLAGS: Record<string, keyof RunOptionsInput> = {
  H: "headerOnly",
  n: "noHeader",
  p: "printInfo",
  s: "silent",
  v: "verbose",
  X: "debug",
};

export const USAGE = "Usage: awr-csv [ -n | -H ] [ -s | -p | -v ] <awr-filename.txt> (wildcards are accepted)";

export const USAGE_DETAIL = [
  USAGE,
  "",
  "  Extracts metrics from text-format AWR reports and prints them as CSV on stdout.",
  "  Diagnostics go to stderr. Errors are always printed.",
  "",
  "    -h   Help (print usage and exit)",
  "    -H   Header row only (print the CSV header and exit)",
  "    -n   No header (do not print the CSV header row)",
  "    -p   Print AWR report info to stderr",
  "    -s   Silent mode (suppress info messages)",
  "    -v   Verbose mode (implies -p)",
  "    -X   Debug mode (implies -v)",
];

function invalid(message: string): ReportError {
  return new ReportError(message, "INVALID_OPTIONS", "invocation", "Run with -h for usage");
}

/** Throws a ReportError of category "invocation" on bad usage. */
export function parseArgs(argv: string[]): Invocation {
  const flags: RunOptionsInput = {};
  let help = false;
  let index = 0;

  for (; index < argv.length; index++) {
    const arg = argv[index];
    if (arg === "--") {
      index++;
      break;
    }
    if (!arg.startsWith("-") || arg === "-") break;

    for (const letter of arg.slice(1)) {
      if (letter === "h") {
        help = true;
        continue;
      }
      const option = FLAGS[letter];
      if (option === undefined) throw invalid(`Invalid option -${letter}`);
      flags[option] = true;
    }
  }

  const parsed = runOptionsSchema.safeParse(flags);
  if (!parsed.success) {
    throw invalid(parsed.error.issues.map((issue) => issue.message).join("; "));
  }

  const files = argv.slice(index);
  if (!help && !parsed.data.headerOnly && files.length === 0) {
    throw new ReportError("Filename(s) required", "NO_FILES", "invocation", "Pass one or more report files");
  }
  return { options: parsed.data, files, help };
}
