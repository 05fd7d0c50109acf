import { describe, it, expect } from "vitest";
import { classifyReportText, rejectionFor } from "../classifier.js";

describe("classifyReportText", () => {
  it("recognizes a text report", () => {
    expect(classifyReportText(["", "WORKLOAD REPOSITORY report for", ""])).toBe("TEXT_REPORT");
  });

  it("detects HTML regardless of case", () => {
    expect(classifyReportText(["<html><head><title>WORKLOAD REPOSITORY</title>"])).toBe("HTML");
  });

  it("detects a STATSPACK report", () => {
    expect(classifyReportText(["STATSPACK report for"])).toBe("FOREIGN");
  });

  it("only looks at the first five lines", () => {
    expect(classifyReportText(["a", "b", "c", "d", "e", "WORKLOAD REPOSITORY report for"])).toBe("UNRECOGNIZED");
  });
});

describe("rejectionFor", () => {
  it("builds the skip message for each rejected kind", () => {
    expect(rejectionFor("HTML", "r.html")?.message).toBe("r.html is in HTML format - ignoring...");
    expect(rejectionFor("FOREIGN", "sp.txt")?.code).toBe("FOREIGN_REPORT");
    expect(rejectionFor("UNRECOGNIZED", "notes.txt")?.message).toBe("notes.txt is not an AWR file");
  });

  it("accepts text reports", () => {
    expect(rejectionFor("TEXT_REPORT", "awr.txt")).toBeNull();
  });
});
