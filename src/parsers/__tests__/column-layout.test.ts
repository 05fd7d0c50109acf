import { describe, it, expect } from "vitest";
import { resolveColumnLayout, sliceColumn, sliceNumber } from "../column-layout.js";

describe("resolveColumnLayout", () => {
  it("maps dash runs to 1-based inclusive ranges", () => {
    const result = resolveColumnLayout("------ --- ---- -- ----- ---");
    expect(result).toEqual({
      ok: true,
      layout: {
        columns: [
          { start: 1, end: 6 },
          { start: 8, end: 10 },
          { start: 12, end: 15 },
          { start: 17, end: 18 },
          { start: 20, end: 24 },
          { start: 26, end: 28 },
        ],
      },
    });
  });

  it("rejects fewer than six columns", () => {
    expect(resolveColumnLayout("---- ---- ----")).toEqual({
      ok: false,
      reason: "header did not have enough columns (3)",
    });
  });

  it("rejects more than seven columns", () => {
    expect(resolveColumnLayout("- - - - - - - -")).toEqual({
      ok: false,
      reason: "header had too many columns (8)",
    });
  });
});

describe("sliceColumn", () => {
  const result = resolveColumnLayout("---------- ------ ----- -- -- --");
  if (!result.ok) throw new Error("layout expected");
  const { layout } = result;
  const line = "log file   12,345  6.50";

  it("returns the trimmed column text", () => {
    expect(sliceColumn(line, layout, 1)).toBe("log file");
    expect(sliceColumn(line, layout, 2)).toBe("12,345");
    expect(sliceNumber(line, layout, 2)).toBe("12345");
    expect(sliceColumn(line, layout, 3)).toBe("6.50");
  });

  it("returns an empty string past the end of the line or the layout", () => {
    expect(sliceColumn(line, layout, 5)).toBe("");
    expect(sliceColumn(line, layout, 9)).toBe("");
  });
});
