/**
 * Column layout of fixed-width report tables.
 *
 * Tables are underlined by one run of dashes per column. The run lengths
 * give the character range of each column in the rows that follow, which is
 * more reliable than splitting on whitespace because event names contain
 * spaces.
 */

/** Inclusive, 1-based character range. */
export interface ColumnRange {
  start: number;
  end: number;
}

export interface ColumnLayout {
  columns: ColumnRange[];
}

export type LayoutResult =
  | { ok: true; layout: ColumnLayout }
  | { ok: false; reason: string };

const MIN_COLUMNS = 6;
const MAX_COLUMNS = 7;

export function resolveColumnLayout(separatorLine: string): LayoutResult {
  const runs = separatorLine.trim().split(/\s+/).filter((run) => run.length > 0);

  if (runs.length < MIN_COLUMNS) {
    return { ok: false, reason: `header did not have enough columns (${runs.length})` };
  }
  if (runs.length > MAX_COLUMNS) {
    return { ok: false, reason: `header had too many columns (${runs.length})` };
  }

  const columns: ColumnRange[] = [];
  let start = 1;
  for (const run of runs) {
    columns.push({ start, end: start + run.length - 1 });
    start += run.length + 1;
  }
  return { ok: true, layout: { columns } };
}

/**
 * Text of column `n` (1-based) in a data row, trimmed and empty when the
 * row is shorter than the column or the layout has no such column.
 */
export function sliceColumn(line: string, layout: ColumnLayout, n: number): string {
  const range = layout.columns[n - 1];
  if (!range) return "";
  return line.slice(range.start - 1, range.end).trim();
}

/** Like sliceColumn, with thousands separators removed. */
export function sliceNumber(line: string, layout: ColumnLayout, n: number): string {
  return sliceColumn(line, layout, n).replace(/,/g, "");
}
