/**
 * Instance activity statistics (I/O request and byte rates) and the
 * thread-activity log switch row. Both sections sit near the end of the
 * report, so reading either one to its end finishes the scan.
 */

import { bytesToMiB, cleanNumber, toDecimal } from "../../utils/decimal.js";
import type { ReportRecord } from "../types.js";
import { leadingKey, wordAt, type SectionContext, type SectionHandler } from "./context.js";

type IoField = "readIops" | "allWriteIops" | "redoWriteIops" | "readThroughput" | "allWriteThroughput";

interface ActivityStatistic {
  field: IoField;
  /** Per-second bytes are converted to MiB/s. */
  bytes: boolean;
}

const STATISTICS = new Map<string, ActivityStatistic>([
  ["physical read total IO requests", { field: "readIops", bytes: false }],
  ["physical read total bytes", { field: "readThroughput", bytes: true }],
  ["physical write total IO requests", { field: "allWriteIops", bytes: false }],
  ["physical write total bytes", { field: "allWriteThroughput", bytes: true }],
  ["redo writes", { field: "redoWriteIops", bytes: false }],
]);

const NAME_WIDTH = 32;
/** Characters 52-66 hold the per-second column. */
const PER_SECOND_START = 51;
const PER_SECOND_END = 66;
const TABLE_FOOTER = " ".repeat(10) + "-".repeat(22);

function store(record: ReportRecord, stat: ActivityStatistic, text: string, ctx: SectionContext): void {
  if (!stat.bytes) {
    record[stat.field] = text === "" ? null : text;
    return;
  }
  const value = toDecimal(text);
  if (value === null) {
    ctx.log.verbose(`WARNING: Unable to calculate value for ${stat.field}: ${text}`);
    record[stat.field] = null;
    return;
  }
  record[stat.field] = bytesToMiB(value);
}

export const handleInstanceActivity: SectionHandler = (line, ctx) => {
  const { record, log } = ctx;
  const head = line.raw.slice(0, NAME_WIDTH);

  if (head === TABLE_FOOTER) {
    log.verbose(`End of Instance Activity Stats section found at line ${line.number}`);
    log.verbose("No further sections to search for - jump to post-processing");
    return { section: "EndOfReport", stop: true };
  }

  const stat = STATISTICS.get(head.trim());
  if (!stat) return undefined;
  const text = cleanNumber(line.raw.slice(PER_SECOND_START, PER_SECOND_END));
  store(record, stat, text, ctx);
  log.debug(`${stat.field} = ${record[stat.field] ?? ""}`);
  return undefined;
};

export const handleThreadActivity: SectionHandler = (line, { record, log }) => {
  if (leadingKey(line.words) !== "log switches") return undefined;
  record.logSwitchesTotal = wordAt(line.words, 3);
  record.logSwitchesPerHour = wordAt(line.words, 4);
  log.verbose(`Finished scanning file at line ${line.number}`);
  return { section: "EndOfReport", stop: true };
};
