/**
 * Foreground wait-class table. FORMAT-10 has no %DB time column; there the
 * class times are summed and turned into percentages after the scan.
 */

import { averageWaitMs, sumScaled, toDecimal } from "../../utils/decimal.js";
import { sliceNumber } from "../column-layout.js";
import { WAIT_CLASS_PREFIXES, type WaitClassCode, type WaitStats } from "../types.js";
import { SEARCH_NEXT, orNull, type SectionHandler } from "./context.js";
import { locateTableHeader } from "./table-header.js";

function classCodeFor(raw: string): WaitClassCode | undefined {
  const head = raw.slice(0, 20);
  return WAIT_CLASS_PREFIXES.find(([prefix]) => head.startsWith(prefix))?.[1];
}

/** Average wait in ms; "0" for a class with no waits, null when unknown. */
function classAverage(waits: string, time: string): string | null {
  if (waits === "") return null;
  const waitsValue = toDecimal(waits);
  if (waitsValue === null) return null;
  if (waitsValue.isZero()) return "0";
  const timeValue = toDecimal(time);
  return timeValue === null ? null : averageWaitMs(timeValue, waitsValue);
}

export const handleWaitClass: SectionHandler = (line, ctx) => {
  const { state, record, log } = ctx;
  const { raw } = line;

  // Column caption rows repeat the section name.
  if (raw.startsWith("Wait Class")) return undefined;

  const search = locateTableHeader(line, ctx, {
    marker: "--------",
    title: "Foreground Wait Class",
    abandon: () => ({ ...SEARCH_NEXT, skipSections: 1 }),
  });
  if (!search.ready) return search.transition;
  const { layout } = search;

  if (raw.startsWith("DB CPU")) {
    record.dbCpuTime = orNull(sliceNumber(raw, layout, 4));
    record.dbCpuPctDbTime = orNull(sliceNumber(raw, layout, 6));
    log.verbose("Processing Foreground Wait Class DB CPU");
    return undefined;
  }

  const code = classCodeFor(raw);
  if (!code) {
    log.verbose(`Ignoring wait class: ${raw.slice(0, 20)}`);
    return undefined;
  }
  log.verbose(`Processing Foreground Wait Class ${code}`);

  const waits = sliceNumber(raw, layout, 2);
  const time = sliceNumber(raw, layout, 4);
  let pctDbTime: string | null = null;
  if (record.format === "10") {
    if (toDecimal(time) !== null) {
      state.totalWaitTime = sumScaled(state.totalWaitTime, time) ?? state.totalWaitTime;
      log.debug(`Total wait time = ${state.totalWaitTime}`);
    }
  } else if (record.format === "11" || record.format === "12") {
    pctDbTime = orNull(sliceNumber(raw, layout, 6));
  }

  const stats: WaitStats = {
    waits: orNull(waits),
    time: orNull(time),
    average: classAverage(waits, time),
    pctDbTime,
  };
  record.waitClasses[code] = stats;
  log.debug(
    `Foreground Wait Class ${code}: Waits=${stats.waits ?? ""}, Time=${stats.time ?? ""}, ` +
      `PctDBTime=${stats.pctDbTime ?? ""}, Ave=${stats.average ?? ""}`,
  );
  return undefined;
};
