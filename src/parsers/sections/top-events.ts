/**
 * Top timed events table ("Top 5 Timed Events", "Top 10 Foreground
 * Events by Total Wait Time"). Only the first five rows are kept, by rank.
 */

import { averageWaitMs, toDecimal } from "../../utils/decimal.js";
import { sliceColumn, sliceNumber, type ColumnLayout } from "../column-layout.js";
import type { TopEvent } from "../types.js";
import { SEARCH_NEXT, abandonSkip, orNull, type SectionHandler } from "./context.js";
import { locateTableHeader } from "./table-header.js";

export const TOP_EVENT_LIMIT = 5;

const UNSIGNED_DECIMAL = /^(\d+\.?\d*|\.\d+)$/;

function isCpuRow(raw: string): boolean {
  return raw.startsWith("DB CPU") || raw.startsWith("CPU time");
}

/** CPU rows carry only a time and a share of DB time. */
function readCpuRow(raw: string, layout: ColumnLayout): TopEvent {
  return {
    name: "DB CPU",
    waitClass: null,
    waits: null,
    time: orNull(sliceNumber(raw, layout, 3)),
    average: null,
    pctDbTime: orNull(sliceNumber(raw, layout, 5)),
  };
}

function readEventRow(raw: string, layout: ColumnLayout): TopEvent {
  const waits = sliceNumber(raw, layout, 2);
  const time = sliceNumber(raw, layout, 3);
  let average = orNull(sliceNumber(raw, layout, 4));

  // Re-derived at three decimals whenever both operands are plain numbers.
  const waitsValue = /^\d+$/.test(waits) ? toDecimal(waits) : null;
  const timeValue = UNSIGNED_DECIMAL.test(time) ? toDecimal(time) : null;
  if (waitsValue !== null && timeValue !== null && !waitsValue.isZero()) {
    average = averageWaitMs(timeValue, waitsValue);
  }

  return {
    name: sliceColumn(raw, layout, 1),
    waitClass: orNull(sliceColumn(raw, layout, 6)),
    waits: orNull(waits),
    time: orNull(time),
    average,
    pctDbTime: orNull(sliceNumber(raw, layout, 5)),
  };
}

export const handleTopEvents: SectionHandler = (line, ctx) => {
  const { state, record, log } = ctx;
  const search = locateTableHeader(line, ctx, {
    marker: "------",
    title: "Top 5 / Top 10 Foreground Events",
    abandon: () => ({ ...SEARCH_NEXT, lineSkip: abandonSkip(record.format) }),
  });
  if (!search.ready) return search.transition;
  const { layout } = search;

  state.topRow++;
  if (state.topRow > TOP_EVENT_LIMIT) {
    log.verbose(`End of Top 5 section found at line ${line.number}`);
    return SEARCH_NEXT;
  }

  const event = isCpuRow(line.raw) ? readCpuRow(line.raw, layout) : readEventRow(line.raw, layout);
  // Stored by rank: a later top-events table replaces the earlier one's rows.
  record.topEvents[state.topRow - 1] = event;
  log.debug(
    `Top 5 line ${state.topRow}: Name=${event.name}, Waits=${event.waits ?? ""}, Time=${event.time ?? ""}, ` +
      `Ave=${event.average ?? ""}, PctDBTime=${event.pctDbTime ?? ""}, Class=${event.waitClass ?? ""}`,
  );
  return undefined;
};
