/**
 * Foreground and background wait-event tables. Only a short allow-list of
 * I/O and commit events is kept; a few event names are read as evidence of
 * Exadata storage or Data Guard.
 */

import { averageWaitMs, percentOfDbTime, toDecimal } from "../../utils/decimal.js";
import { sliceNumber, type ColumnLayout } from "../column-layout.js";
import type {
  BackgroundEventCode,
  ForegroundEventCode,
  ReportRecord,
  WaitEventCode,
  WaitStats,
} from "../types.js";
import { SEARCH_NEXT, abandonSkip, orNull, type SectionContext, type SectionHandler } from "./context.js";
import { locateTableHeader } from "./table-header.js";

/** Longer names first where one is a prefix of another. */
const FOREGROUND_EVENTS: ReadonlyArray<readonly [string, ForegroundEventCode]> = [
  ["db file sequential read", "DFSR"],
  ["db file scattered read", "DFXR"],
  ["direct path read temp", "DPRT"],
  ["direct path read", "DPRD"],
  ["direct path write temp", "DPWT"],
  ["direct path write", "DPWR"],
  ["log file sync", "LFSY"],
];

const BACKGROUND_EVENTS: ReadonlyArray<readonly [string, BackgroundEventCode]> = [
  ["db file parallel write", "DFPW"],
  ["log file parallel write", "LFPW"],
  ["log file sequential read", "LFSR"],
];

const EXADATA_MARKERS = ["cell multiblock physical r", "cell single block physical"];
const DATA_GUARD_MARKER = "LNS wait on SENDREQ";

/** Returns true when the row was a feature marker rather than an event. */
function noteFeatureEvidence(head: string, ctx: SectionContext): boolean {
  const { record, log } = ctx;
  if (EXADATA_MARKERS.some((marker) => head.startsWith(marker))) {
    if (record.exadata === "N") log.verbose("Found evidence of Exadata system");
    record.exadata = "Y";
    return true;
  }
  if (head.startsWith(DATA_GUARD_MARKER)) {
    if (record.dataGuard === "N") log.verbose("Found evidence of Data Guard in use on this system");
    record.dataGuard = "Y";
    return true;
  }
  return false;
}

function readEvent(raw: string, layout: ColumnLayout, record: ReportRecord, foreground: boolean): WaitStats {
  const waits = sliceNumber(raw, layout, 2);
  const time = sliceNumber(raw, layout, 4);
  const timeValue = toDecimal(time);

  let pctDbTime: string | null = null;
  if (record.format === "11" || record.format === "12") {
    pctDbTime = orNull(sliceNumber(raw, layout, 7));
  } else if (record.format === "10" && foreground) {
    // FORMAT-10 prints no %DB time for events.
    const dbTime = toDecimal(record.dbTimeMinutes);
    if (dbTime !== null && !dbTime.isZero() && timeValue !== null) {
      pctDbTime = percentOfDbTime(timeValue, dbTime);
    }
  }

  const waitsValue = toDecimal(waits);
  const average =
    waitsValue !== null && !waitsValue.isZero() && timeValue !== null
      ? averageWaitMs(timeValue, waitsValue)
      : null;

  return { waits: orNull(waits), time: orNull(time), average, pctDbTime };
}

function waitEventHandler(
  title: string,
  events: ReadonlyArray<readonly [string, WaitEventCode]>,
  foreground: boolean,
): SectionHandler {
  return (line, ctx) => {
    const { record, log } = ctx;
    const search = locateTableHeader(line, ctx, {
      marker: "------",
      title,
      abandon: () => ({ ...SEARCH_NEXT, lineSkip: abandonSkip(record.format) }),
    });
    if (!search.ready) return search.transition;

    const head = line.raw.slice(0, 26);
    if (noteFeatureEvidence(head, ctx)) return undefined;

    const code = events.find(([name]) => head.startsWith(name))?.[1];
    if (!code) return undefined;

    const stats = readEvent(line.raw, search.layout, record, foreground);
    record.waitEvents[code] = stats;
    log.debug(
      `${title} ${code}: Waits=${stats.waits ?? ""}, Time=${stats.time ?? ""}, ` +
        `PctDBTime=${stats.pctDbTime ?? ""}, Ave=${stats.average ?? ""}`,
    );
    return undefined;
  };
}

export const handleForegroundWaitEvents = waitEventHandler("Foreground Wait Events", FOREGROUND_EVENTS, true);
export const handleBackgroundWaitEvents = waitEventHandler("Background Wait Events", BACKGROUND_EVENTS, false);
