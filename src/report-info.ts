/**
 * Human-readable dump of an extracted record (-p / -v), one aligned
 * `label = value` line per CSV column.
 */

import { CSV_COLUMNS } from "./csv-writer.js";
import type { ReportRecord } from "./parsers/types.js";
import type { Logger } from "./utils/logger.js";

const LABEL_WIDTH = Math.max("AWR Format".length, ...CSV_COLUMNS.map((c) => c.title.length));

export function formatReportInfo(record: ReportRecord): string[] {
  const line = (label: string, value: string | null): string =>
    `${label.padStart(LABEL_WIDTH)} = ${value ?? ""}`;
  const [first, ...rest] = CSV_COLUMNS;
  return [
    line(first.title, first.value(record)),
    line("AWR Format", record.format),
    ...rest.map((c) => line(c.title, c.value(record))),
  ];
}

export function printReportInfo(record: ReportRecord, log: Logger): void {
  for (const line of formatReportInfo(record)) log.print(line);
}
