/**
 * Locating the dashed underline of a fixed-width table.
 *
 * A table section may start with a few lines of title and column captions.
 * The first line beginning with the marker is resolved into a column layout;
 * if no such line turns up within the bailout window, or it cannot be
 * resolved, the section is abandoned and its fields stay empty.
 */

import { resolveColumnLayout, type ColumnLayout } from "../column-layout.js";
import type { ScanLine, SectionContext, Transition } from "./context.js";

export const BAILOUT_LIMIT = 10;

export interface HeaderSearchOptions {
  /** Leading characters that identify the underline. */
  marker: string;
  /** Section title used in diagnostics. */
  title: string;
  /** Transition applied when the section is given up. */
  abandon: (ctx: SectionContext) => Transition;
}

export type HeaderSearch =
  | { ready: true; layout: ColumnLayout }
  | { ready: false; transition?: Transition };

/**
 * Returns the layout when the table layout is known and the line is a
 * data row. Otherwise the line was consumed by the search.
 */
export function locateTableHeader(
  line: ScanLine,
  ctx: SectionContext,
  options: HeaderSearchOptions,
): HeaderSearch {
  const { state, log } = ctx;
  if (state.layout) return { ready: true, layout: state.layout };

  if (line.raw.startsWith(options.marker)) {
    log.debug("Searching for header row... found");
    const result = resolveColumnLayout(line.raw);
    if (result.ok) {
      state.layout = result.layout;
      log.debug(
        `Computed column ranges: ${result.layout.columns.map((c) => `${c.start}-${c.end}`).join(", ")}`,
      );
      return { ready: false };
    }
    log.verbose(`Failed to resolve header row because ${result.reason}`);
    log.verbose(`Unable to determine width of rows in ${options.title} section`);
    return { ready: false, transition: options.abandon(ctx) };
  }

  state.bailout++;
  if (state.bailout >= BAILOUT_LIMIT) {
    log.debug(`Failed to find header row (bailout counter hit threshold = ${state.bailout})`);
    log.verbose(`Unable to determine width of rows in ${options.title} section`);
    return { ready: false, transition: options.abandon(ctx) };
  }
  log.debug(`Searching for header row... not found (bailout counter = ${state.bailout})`);
  return { ready: false };
}
