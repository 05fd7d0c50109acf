import { z } from "zod";

export const runOptionsSchema = z
  .object({
    headerOnly: z.boolean().default(false).describe("Print the CSV header row and exit (-H)"),
    noHeader: z.boolean().default(false).describe("Suppress the CSV header row (-n)"),
    printInfo: z.boolean().default(false).describe("Print extracted values to stderr (-p)"),
    silent: z.boolean().default(false).describe("Suppress informational messages (-s)"),
    verbose: z.boolean().default(false).describe("Verbose diagnostics, implies -p (-v)"),
    debug: z.boolean().default(false).describe("Debug diagnostics, implies -v (-X)"),
  })
  .transform((opts) => {
    const verbose = opts.verbose || opts.debug;
    return {
      ...opts,
      verbose,
      printInfo: opts.printInfo || verbose,
      silent: opts.debug ? false : opts.silent,
    };
  })
  .superRefine((opts, ctx) => {
    if (opts.headerOnly && opts.noHeader) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Header and NoHeader are conflicting options" });
    }
    if (opts.silent && opts.verbose) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Silent and Verbose are conflicting options" });
    } else if (opts.silent && opts.printInfo) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Silent and Print Report Info are conflicting options" });
    }
  });

export type RunOptionsInput = z.input<typeof runOptionsSchema>;
export type RunOptions = z.output<typeof runOptionsSchema>;
