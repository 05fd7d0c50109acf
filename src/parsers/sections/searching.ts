/**
 * Recognizes the title line that opens each section of interest.
 */

import type { ReportFormat } from "../types.js";
import type { SectionHandler, SectionContext, Transition } from "./context.js";

interface SectionOpener {
  /** Compared against the start of the line (at most 40 characters). */
  prefix: string;
  title: string;
  open: (format: ReportFormat, ctx: SectionContext) => Transition | undefined;
}

const table = (section: Transition["section"], lineSkip: number): Transition => ({
  section,
  mode: "line",
  lineSkip,
  resetTable: true,
});

const OPENERS: SectionOpener[] = [
  {
    prefix: "Top 5 Timed Events  ",
    title: "FORMAT-10 Top 5",
    open: () => table("Top5Foreground", 2),
  },
  {
    prefix: "Top 5 Timed Foreground Events",
    title: "FORMAT-11 Top 5",
    open: () => table("Top5Foreground", 4),
  },
  {
    prefix: "Top 10 Foreground Events by Total Wait T",
    title: "Top 10",
    open: () => table("Top5Foreground", 3),
  },
  {
    prefix: "Cache Sizes",
    title: "Cache Sizes",
    open: () => ({ section: "CacheSizes", mode: "word", lineSkip: 1 }),
  },
  {
    prefix: "Time Model Statistics  ",
    title: "Time Model Statistics",
    open: (format, ctx) => {
      if (format !== "10") {
        ctx.log.verbose(`Ignoring Time Model Statistics because report format ${format} is not 10`);
        return { skipSections: 1 };
      }
      return { section: "TimeModelStatistics", mode: "word", lineSkip: 6 };
    },
  },
  {
    prefix: "Operating System Statistics  ",
    title: "Operating System Stats",
    open: (format) => ({
      section: "OperatingSystemStats",
      mode: "word",
      lineSkip: format === "10" ? 2 : 5,
    }),
  },
  {
    prefix: "Wait Class  ",
    title: "Foreground Wait Class",
    open: (format, ctx) => {
      if (format !== "10") {
        ctx.log.verbose(`Ignoring Wait Class header because report format ${format} is not 10`);
        return undefined;
      }
      return table("ForegroundWaitClass", 7);
    },
  },
  {
    prefix: "Foreground Wait Class  ",
    title: "Foreground Wait Class",
    open: () => table("ForegroundWaitClass", 7),
  },
  {
    prefix: "Wait Events  ",
    title: "Foreground Wait Events",
    open: () => table("ForegroundWaitEvents", 3),
  },
  {
    prefix: "Foreground Wait Events  ",
    title: "Foreground Wait Events",
    open: () => table("ForegroundWaitEvents", 3),
  },
  {
    prefix: "Background Wait Events  ",
    title: "Background Wait Events",
    open: () => table("BackgroundWaitEvents", 3),
  },
  {
    prefix: "Instance Activity Stats  ",
    title: "Instance Activity Stats",
    open: (format) => ({
      section: "InstanceActivityStats",
      mode: "line",
      lineSkip: format === "10" ? 2 : 3,
    }),
  },
  {
    prefix: "SQL ordered by",
    title: "SQL ordered by",
    open: () => ({ skipSections: 1 }),
  },
  {
    prefix: "Other Instance Activity Stats  ",
    title: "Other Instance Activity Stats",
    open: () => ({ section: "InstanceActivityStats", mode: "line", lineSkip: 3 }),
  },
  {
    prefix: "Instance Activity Stats - Thread Activit",
    title: "Instance Activity Stats - Thread Activity",
    open: () => ({ section: "ThreadActivity", mode: "word", lineSkip: 3 }),
  },
];

export const searchForNextSection: SectionHandler = (line, ctx) => {
  const head = line.raw.slice(0, 40);
  const opener = OPENERS.find((candidate) => head.startsWith(candidate.prefix));
  if (!opener) return undefined;

  const transition = opener.open(ctx.record.format, ctx);
  if (transition?.section) {
    ctx.log.verbose(`Start of ${opener.title} section found at line ${line.number}`);
    if (transition.section === "ForegroundWaitClass") ctx.state.waitClassSeen = true;
  } else if (transition?.skipSections) {
    ctx.log.debug(`Found start of ${opener.title} section at line ${line.number} - skipping it`);
  }
  return transition;
};
