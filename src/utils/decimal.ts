/**
 * Fixed-scale decimal helpers for derived report metrics.
 *
 * Every derived value follows the same two-step recipe: the quotient is
 * truncated to an intermediate scale, then half a unit of the target scale
 * is added and the result truncated again. Values travel as strings so the
 * CSV carries exactly the digits that were read or computed.
 */

import { Decimal } from "decimal.js";

/** Truncating arithmetic with enough headroom that no step rounds. */
const Dec = Decimal.clone({ precision: 60, rounding: Decimal.ROUND_DOWN });

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Strip surrounding whitespace and thousands separators. */
export function cleanNumber(text: string | undefined): string {
  return (text ?? "").trim().replace(/,/g, "");
}

/**
 * Parse report text into a decimal. Accepts thousands separators and the
 * scientific notation the report falls back to for very large values.
 */
export function toDecimal(text: string | null | undefined): Decimal | null {
  if (text === null || text === undefined) return null;
  const cleaned = cleanNumber(text);
  if (!DECIMAL_PATTERN.test(cleaned)) return null;
  return new Dec(cleaned);
}

/** Number of digits after the decimal point in `text` (0 for integers). */
export function scaleOf(text: string): number {
  const cleaned = cleanNumber(text);
  if (/[eE]/.test(cleaned)) return 0;
  const dot = cleaned.indexOf(".");
  return dot === -1 ? 0 : cleaned.length - dot - 1;
}

/** a / b truncated (toward zero) to `scale` decimal places. */
export function truncDiv(a: Decimal, b: Decimal, scale: number): Decimal {
  return a.div(b).toDecimalPlaces(scale, Decimal.ROUND_DOWN);
}

/**
 * Round to `places` decimals by adding half a unit at that scale and
 * truncating. Always renders exactly `places` decimals.
 */
export function roundHalfUp(value: Decimal, places: number): string {
  const half = new Dec(5).times(new Dec(10).pow(-(places + 1)));
  return value.plus(half).toDecimalPlaces(places, Decimal.ROUND_DOWN).toFixed(places);
}

/** (time / waits) x 1000 in milliseconds, 3 decimals. */
export function averageWaitMs(time: Decimal, waits: Decimal): string {
  return roundHalfUp(truncDiv(time, waits, 7).times(1000), 3);
}

/** Share of DB time in percent, 1 decimal. `dbTimeMinutes` must be non-zero. */
export function percentOfDbTime(timeSeconds: Decimal, dbTimeMinutes: Decimal): string {
  return roundHalfUp(truncDiv(timeSeconds, dbTimeMinutes.times(60), 5).times(100), 1);
}

/** Bytes per second to MiB per second, 2 decimals. */
export function bytesToMiB(bytes: Decimal): string {
  return roundHalfUp(truncDiv(bytes, new Dec(1048576), 6), 2);
}

/** Bytes to GiB, 3 decimals. */
export function bytesToGiB(bytes: Decimal): string {
  return roundHalfUp(truncDiv(bytes, new Dec(1073741824), 4), 3);
}

/** DB time over elapsed time, 1 decimal. `elapsed` must be non-zero. */
export function averageActiveSessions(dbTime: Decimal, elapsed: Decimal): string {
  return roundHalfUp(truncDiv(dbTime, elapsed, 2), 1);
}

/**
 * Sum of the present operands, rendered at the larger scale of the two.
 * Returns null when neither operand is a number.
 */
export function sumScaled(a: string | null, b: string | null): string | null {
  const operands = [a, b].filter((v): v is string => v !== null && toDecimal(v) !== null);
  if (operands.length === 0) return null;
  let total = new Dec(0);
  let scale = 0;
  for (const operand of operands) {
    const value = toDecimal(operand);
    if (value === null) continue;
    total = total.plus(value);
    scale = Math.max(scale, scaleOf(operand));
  }
  return total.toFixed(scale);
}

/** a - b rendered at the larger scale, or null when either is not a number. */
export function differenceScaled(a: string | null, b: string | null): string | null {
  const left = toDecimal(a);
  const right = toDecimal(b);
  if (left === null || right === null || a === null || b === null) return null;
  return left.minus(right).toFixed(Math.max(scaleOf(a), scaleOf(b)));
}

/** True when `text` parses to a number equal to zero. */
export function isZero(text: string | null): boolean {
  const value = toDecimal(text);
  return value !== null && value.isZero();
}

/** a > b for two numeric strings; null when either is not a number. */
export function isGreater(a: string | null, b: string | null): boolean | null {
  const left = toDecimal(a);
  const right = toDecimal(b);
  if (left === null || right === null) return null;
  return left.greaterThan(right);
}
