import { describe, it, expect } from "vitest";
import { Decimal } from "decimal.js";
import {
  averageActiveSessions,
  averageWaitMs,
  bytesToGiB,
  bytesToMiB,
  cleanNumber,
  differenceScaled,
  isGreater,
  isZero,
  percentOfDbTime,
  roundHalfUp,
  scaleOf,
  sumScaled,
  toDecimal,
} from "../decimal.js";

const d = (text: string) => new Decimal(text);

describe("toDecimal", () => {
  it("accepts thousands separators", () => {
    expect(toDecimal("1,048,576.0")?.toString()).toBe("1048576");
  });

  it("accepts scientific notation", () => {
    expect(toDecimal("1.5E+10")?.toFixed()).toBe("15000000000");
  });

  it("accepts a bare fraction", () => {
    expect(toDecimal(".6")?.toString()).toBe("0.6");
  });

  it("returns null for text, empty strings and null", () => {
    expect(toDecimal("n/a")).toBeNull();
    expect(toDecimal("")).toBeNull();
    expect(toDecimal(null)).toBeNull();
  });
});

describe("cleanNumber / scaleOf", () => {
  it("strips whitespace and commas", () => {
    expect(cleanNumber("  1,234.5 ")).toBe("1234.5");
  });

  it("counts decimals", () => {
    expect(scaleOf("12.340")).toBe(3);
    expect(scaleOf("100")).toBe(0);
    expect(scaleOf("1.5E+10")).toBe(0);
  });
});

describe("roundHalfUp", () => {
  it("adds half a unit and truncates", () => {
    expect(roundHalfUp(d("2.345"), 2)).toBe("2.35");
    expect(roundHalfUp(d("2.344"), 2)).toBe("2.34");
  });

  it("always renders the requested decimals", () => {
    expect(roundHalfUp(d("3"), 3)).toBe("3.000");
  });
});

describe("derived metrics", () => {
  it("averageWaitMs truncates the quotient to 7 places before rounding", () => {
    expect(averageWaitMs(d("20300"), d("1030000"))).toBe("19.709");
    expect(averageWaitMs(d("10"), d("400000"))).toBe("0.025");
  });

  it("percentOfDbTime converts DB time from minutes", () => {
    expect(percentOfDbTime(d("650"), d("45.00"))).toBe("24.1");
    expect(percentOfDbTime(d("5"), d("45.00"))).toBe("0.2");
  });

  it("bytesToMiB rounds at the second decimal after truncating at the sixth", () => {
    expect(bytesToMiB(d("2097152"))).toBe("2.00");
    expect(bytesToMiB(d("5242"))).toBe("0.00");
    expect(bytesToMiB(d("5243"))).toBe("0.01");
  });

  it("bytesToGiB renders three decimals", () => {
    expect(bytesToGiB(d("8589934592"))).toBe("8.000");
  });

  it("averageActiveSessions rounds to one decimal", () => {
    expect(averageActiveSessions(d("120"), d("60"))).toBe("2.0");
    expect(averageActiveSessions(d("100"), d("30"))).toBe("3.3");
    expect(averageActiveSessions(d("47"), d("30"))).toBe("1.6");
  });
});

describe("sumScaled / differenceScaled", () => {
  it("keeps the larger scale", () => {
    expect(sumScaled("1000.0", "200.0")).toBe("1200.0");
    expect(sumScaled("1", "2.50")).toBe("3.50");
    expect(differenceScaled("4.00", "2.5")).toBe("1.50");
  });

  it("sums whichever operands are numeric", () => {
    expect(sumScaled(null, "5.25")).toBe("5.25");
    expect(sumScaled("abc", "2")).toBe("2");
    expect(sumScaled(null, null)).toBeNull();
  });

  it("needs both operands for a difference", () => {
    expect(differenceScaled(null, "1.0")).toBeNull();
    expect(differenceScaled("1.0", "x")).toBeNull();
  });
});

describe("isZero / isGreater", () => {
  it("compares numerically", () => {
    expect(isZero("0.00")).toBe(true);
    expect(isZero("0.01")).toBe(false);
    expect(isZero(null)).toBe(false);
    expect(isGreater("10.0", "8")).toBe(true);
    expect(isGreater("1.5", "2")).toBe(false);
    expect(isGreater(null, "2")).toBeNull();
  });
});
