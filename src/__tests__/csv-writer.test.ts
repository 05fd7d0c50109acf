import { describe, it, expect } from "vitest";
import { CSV_COLUMNS, formatHeaderRow, formatRecordRow } from "../csv-writer.js";
import { createEmptyRecord } from "../parsers/types.js";

function column(row: string, title: string): string | undefined {
  return row.split(",")[CSV_COLUMNS.findIndex((c) => c.title === title)];
}

describe("formatHeaderRow", () => {
  const header = formatHeaderRow().split(",");

  it("has one title per column", () => {
    expect(header).toHaveLength(166);
    expect(header.slice(0, 3)).toEqual(["Filename", "Database Name", "Instance Number"]);
  });

  it("appends the scheduler class as the last column", () => {
    expect(header.slice(-4)).toEqual([
      "Wait Class Scheduler Waits",
      "Wait Class Scheduler Time (s)",
      "Wait Class Scheduler Latency (ms)",
      "Wait Class Scheduler %DBTime",
    ]);
    expect(header[161]).toBe("Wait Class System I/O %DBTime");
  });

  it("names the top events and wait events by rank and event", () => {
    expect(header).toContain("Top5 Event5 Average Time (ms)");
    expect(header).toContain("db file sequential read Latency (ms)");
    expect(header).toContain("log file sequential read %DBTime");
  });
});

describe("formatRecordRow", () => {
  it("renders absent values as empty fields", () => {
    const row = formatRecordRow(createEmptyRecord("empty.txt"));
    const fields = row.split(",");
    expect(fields).toHaveLength(166);
    expect(fields[0]).toBe("empty.txt");
    expect(fields.slice(1, 10).every((field) => field === "")).toBe(true);
    expect(column(row, "Data Guard Flag")).toBe("N");
    expect(column(row, "Exadata Flag")).toBe("N");
  });

  it("places record values under their titles", () => {
    const record = createEmptyRecord("r.txt");
    record.dbName = "TESTDB";
    record.totalIops = "1200.0";
    record.os.cpuWait = "50000";
    record.topEvents.push({
      name: "log file sync",
      waitClass: "Commit",
      waits: "50000",
      time: "500",
      average: "10.000",
      pctDbTime: "1.4",
    });
    record.waitEvents.LFPW = { waits: "60000", time: "300", average: "5.000", pctDbTime: "30.0" };
    record.waitClasses.SCHED = { waits: "1000", time: "20", average: "20.000", pctDbTime: "0.3" };

    const row = formatRecordRow(record);
    expect(column(row, "Database Name")).toBe("TESTDB");
    expect(column(row, "Total IOPS")).toBe("1200.0");
    expect(column(row, "OS cpu wait time")).toBe("50000");
    expect(column(row, "Top5 Event1 Name")).toBe("log file sync");
    expect(column(row, "Top5 Event1 Class")).toBe("Commit");
    expect(column(row, "Top5 Event2 Name")).toBe("");
    expect(column(row, "log file parallel write Waits")).toBe("60000");
    expect(column(row, "Wait Class Scheduler Latency (ms)")).toBe("20.000");
  });
});
