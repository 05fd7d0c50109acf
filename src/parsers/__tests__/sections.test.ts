import { describe, it, expect } from "vitest";
import { captureLogger, readFixture } from "../../__tests__/helpers.js";
import { parseReportText } from "../awr-text.js";

const TERMINATOR = " ".repeat(10) + "-".repeat(61);

const HEADER = [
  "WORKLOAD REPOSITORY report for",
  "DB Name         DB Id    Instance     Inst Num Startup Time    Release     RAC",
  "------------ ----------- ------------ -------- --------------- ----------- ---",
  "TESTDB          12345678 testdb1             1 01-Jan-24 08:00 11.2.0.4.0  NO",
];

const EFFICIENCY = [
  "Instance Efficiency Percentages (Target 100%)",
  "~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~",
  "            Buffer  Hit   %:   99.50    In-memory Sort %:  100.00",
];

function parse(lines: string[], debug = false) {
  const captured = captureLogger({ verbose: true, debug });
  const result = parseReportText("test.txt", lines.join("\n"), captured.log);
  return { ...result, lines: captured.lines };
}

describe("profile edge cases", () => {
  it("cannot compute average active sessions from a zero elapsed time", () => {
    const { record, lines } = parse([...HEADER, "   Elapsed:                0.00 (mins)", "   DB Time:               10.00 (mins)"]);
    expect(record.averageActiveSessions).toBeNull();
    expect(lines).toContain("Info : Found zero value for Elapsed Time");
    expect(lines).toContain("Info : Cannot calculate Average Active Sessions due to zero Elapsed Time value");
  });

  it("needs the elapsed time before DB time", () => {
    const { record, lines } = parse([...HEADER, "   DB Time:               10.00 (mins)"]);
    expect(record.dbTimeMinutes).toBe("10.00");
    expect(record.averageActiveSessions).toBeNull();
    expect(lines).toContain("Info : Found DB Time but not Elapsed Time - unable to calculate Average Active Sessions");
  });

  it("keeps a zero redo size as printed", () => {
    const { record } = parse([...HEADER, "       Redo size:                0.0                0.0"]);
    expect(record.redoWriteThroughput).toBe("0.0");
  });

  it("converts a redo size printed in scientific notation", () => {
    const { record } = parse([...HEADER, "       Redo size:          3.1457E+06"]);
    expect(record.redoWriteThroughput).toBe("3.00");
  });

  it("skips query headings and the line under them", () => {
    const { record, lines } = parse(
      [...HEADER, "OUTPUT", "-".repeat(80), "Begin Snap:       100 01-Jan-24 09:00:00        50       1.5"],
      true,
    );
    expect(record.beginSnap).toBe("100");
    expect(lines).toContain("Debug: Query heading at line 5 - ignoring this plus next line");
  });

  it("reads the same record from a report with CRLF line endings", () => {
    const text = readFixture("format11.txt");
    const { log } = captureLogger();
    const unix = parseReportText("r.txt", text, log).record;
    const dos = parseReportText("r.txt", text.replace(/\n/g, "\r\n"), log).record;
    expect(dos).toEqual(unix);
  });
});

describe("table header search", () => {
  it("abandons a table whose underline has too many columns", () => {
    const { record, lines } = parse([
      ...HEADER,
      ...EFFICIENCY,
      "Top 5 Timed Foreground Events",
      "~~~~~~~~~~~~~~~~~~~~~~~~~~~~~",
      "                                                           Avg",
      "                                                          wait   % DB",
      "Event                                 Waits     Time(s)   (ms)   time Wait Class",
      "------ ------ ------ ------ ------ ------ ------ ------",
      "db file sequential read           1,000,000      20,000     20   55.6 User I/O",
    ]);
    expect(record.topEvents).toEqual([]);
    expect(lines).toContain("Info : Failed to resolve header row because header had too many columns (8)");
    expect(lines).toContain("Info : Unable to determine width of rows in Top 5 / Top 10 Foreground Events section");
  });

  it("gives up after ten lines without an underline", () => {
    const notes = Array.from({ length: 10 }, (_, i) => `note ${i + 1}`);
    const { record, state, lines } = parse([
      ...HEADER,
      ...EFFICIENCY,
      "Foreground Wait Events              DB/Inst: TESTDB/testdb1  Snaps: 100-101",
      "-> one",
      "-> two",
      "-> three",
      ...notes,
      "-------------------------- ------------ ----- ---------- ------- -------- ------",
      "db file sequential read       1,000,000     0     20,000      20     55.6   55.6",
    ]);
    expect(record.waitEvents).toEqual({});
    expect(state.bailout).toBe(10);
    expect(lines).toContain("Info : Unable to determine width of rows in Foreground Wait Events section");
  });

  it("skips the rest of an abandoned wait-class table", () => {
    const { record } = parse([
      ...HEADER,
      ...EFFICIENCY,
      "Foreground Wait Class                DB/Inst: TESTDB/testdb1  Snaps: 100-101",
      "-> 1",
      "-> 2",
      "-> 3",
      "-> 4",
      "-> 5",
      "-> 6",
      "-> 7",
      "-------- -------- -------- --------",
      "User I/O                    1,030,000     0           20,300       20      56.4",
      "Operating System Statistics  inside the skipped table",
      TERMINATOR,
      "Operating System Statistics         DB/Inst: TESTDB/testdb1  Snaps: 100-101",
      "-> 1",
      "-> 2",
      "-> 3",
      "Statistic                                  Value        End Value",
      "------------------------- ---------------------- ----------------",
      "NUM_CPUS                                       4",
    ]);
    expect(record.waitClasses).toEqual({});
    expect(record.numCpus).toBe("4");
  });
});

describe("section openers", () => {
  it("ignores the FORMAT-10 wait class title in later formats", () => {
    const { state, lines } = parse([...HEADER, ...EFFICIENCY, "Wait Class                          DB/Inst: TESTDB/testdb1"]);
    expect(state.section).toBe("SearchingForNextSection");
    expect(state.waitClassSeen).toBe(false);
    expect(lines).toContain("Info : Ignoring Wait Class header because report format 11 is not 10");
  });

  it("reads the buffer cache block size from the cache sizes section", () => {
    const { record } = parse([
      ...HEADER,
      ...EFFICIENCY,
      "Cache Sizes                       Begin        End",
      "~~~~~~~~~~~                  ---------- ----------",
      "               Buffer Cache:     2,048M     2,048M  Std Block Size:        16K",
      "           Shared Pool Size:       512M       512M      Log Buffer:    10,000K",
    ]);
    expect(record.blockSize).toBe("16K");
  });
});

describe("top events", () => {
  const UNDERLINE = "------------------------------ ------------ ----------- ------ ------ ----------";

  function eventRows(prefix: string, count: number): string[] {
    return Array.from(
      { length: count },
      (_, i) =>
        `${prefix} event ${i + 1}`.padEnd(30) +
        " " +
        "100".padStart(12) +
        " " +
        "10".padStart(11) +
        " " +
        "100".padStart(6) +
        " " +
        "1.0".padStart(6) +
        " Other",
    );
  }

  it("lets a later top-events table replace the earlier rows by rank", () => {
    const { record } = parse([
      ...HEADER,
      ...EFFICIENCY,
      "Top 5 Timed Foreground Events",
      "~~~~~~~~~~~~~~~~~~~~~~~~~~~~~",
      "                                                           Avg",
      "                                                          wait   % DB",
      "Event                                 Waits     Time(s)   (ms)   time Wait Class",
      UNDERLINE,
      ...eventRows("A", 5),
      TERMINATOR,
      "Top 10 Foreground Events by Total Wait Time",
      "~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~",
      "                                           Total Wait       Wait   % DB Wait",
      "Event                                Waits Time (sec)    Avg(ms)   time Class",
      UNDERLINE,
      ...eventRows("B", 6),
    ]);
    expect(record.topEvents.map((e) => e.name)).toEqual([
      "B event 1",
      "B event 2",
      "B event 3",
      "B event 4",
      "B event 5",
    ]);
    expect(record.topEvents[0]?.waits).toBe("100");
    expect(record.topEvents[0]?.waitClass).toBe("Other");
  });
});
