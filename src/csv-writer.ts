/**
 * CSV serialization of report records. The column order is fixed; new
 * columns are only ever appended so existing spreadsheets keep working.
 */

import {
  WAIT_EVENT_NAMES,
  type ReportRecord,
  type TopEvent,
  type WaitClassCode,
  type WaitEventCode,
  type WaitStats,
} from "./parsers/types.js";
import { TOP_EVENT_LIMIT } from "./parsers/sections/top-events.js";

export interface CsvColumn {
  title: string;
  value: (record: ReportRecord) => string | null;
}

const column = (title: string, value: CsvColumn["value"]): CsvColumn => ({ title, value });

function waitStatsColumns(
  label: string,
  select: (record: ReportRecord) => WaitStats | undefined,
  latencyTitle = "Latency (ms)",
): CsvColumn[] {
  return [
    column(`${label} Waits`, (r) => select(r)?.waits ?? null),
    column(`${label} Time (s)`, (r) => select(r)?.time ?? null),
    column(`${label} ${latencyTitle}`, (r) => select(r)?.average ?? null),
    column(`${label} %DBTime`, (r) => select(r)?.pctDbTime ?? null),
  ];
}

function waitClassColumns(label: string, code: WaitClassCode): CsvColumn[] {
  return waitStatsColumns(`Wait Class ${label}`, (r) => r.waitClasses[code]);
}

function topEventColumns(rank: number): CsvColumn[] {
  const label = `Top5 Event${rank}`;
  const event = (r: ReportRecord): TopEvent | undefined => r.topEvents[rank - 1];
  return [
    column(`${label} Name`, (r) => event(r)?.name ?? null),
    column(`${label} Class`, (r) => event(r)?.waitClass ?? null),
    column(`${label} Waits`, (r) => event(r)?.waits ?? null),
    column(`${label} Time (s)`, (r) => event(r)?.time ?? null),
    column(`${label} Average Time (ms)`, (r) => event(r)?.average ?? null),
    column(`${label} %DBTime`, (r) => event(r)?.pctDbTime ?? null),
  ];
}

function waitEventColumns(code: WaitEventCode): CsvColumn[] {
  return waitStatsColumns(WAIT_EVENT_NAMES[code], (r) => r.waitEvents[code]);
}

const WAIT_EVENT_ORDER: WaitEventCode[] = [
  "DFSR", "DFXR", "DPRD", "DPWR", "DPRT", "DPWT", "LFSY", "DFPW", "LFPW", "LFSR",
];

export const CSV_COLUMNS: readonly CsvColumn[] = [
  column("Filename", (r) => r.filename),
  column("Database Name", (r) => r.dbName),
  column("Instance Number", (r) => r.instanceNumber),
  column("Instance Name", (r) => r.instanceName),
  column("Database Version", (r) => r.dbVersion),
  column("Cluster", (r) => r.cluster),
  column("Hostname", (r) => r.hostname),
  column("Host OS", (r) => r.hostOs),
  column("Num CPUs", (r) => r.numCpus),
  column("Server Memory (GB)", (r) => r.hostMemory),
  column("DB Block Size", (r) => r.blockSize),
  column("Begin Snap", (r) => r.beginSnap),
  column("Begin Time", (r) => r.beginTime),
  column("End Snap", (r) => r.endSnap),
  column("End Time", (r) => r.endTime),
  column("Elapsed Time (mins)", (r) => r.elapsedMinutes),
  column("DB Time (mins)", (r) => r.dbTimeMinutes),
  column("Average Active Sessions", (r) => r.averageActiveSessions),
  column("Busy Flag", (r) => r.busy),
  column("Logical Reads/sec", (r) => r.logicalReads),
  column("Block Changes/sec", (r) => r.blockChanges),
  column("Read IOPS", (r) => r.readIops),
  column("Write IOPS", (r) => r.dataWriteIops),
  column("Redo IOPS", (r) => r.redoWriteIops),
  column("All Write IOPS", (r) => r.allWriteIops),
  column("Total IOPS", (r) => r.totalIops),
  column("Read Throughput (MiB/sec)", (r) => r.readThroughput),
  column("Write Throughput (MiB/sec)", (r) => r.dataWriteThroughput),
  column("Redo Throughput (MiB/sec)", (r) => r.redoWriteThroughput),
  column("All Write Throughput (MiB/sec)", (r) => r.allWriteThroughput),
  column("Total Throughput (MiB/sec)", (r) => r.totalThroughput),
  column("DB CPU Time (s)", (r) => r.dbCpuTime),
  column("DB CPU %DBTime", (r) => r.dbCpuPctDbTime),
  ...waitClassColumns("User I/O", "USRIO"),
  column("User Calls/sec", (r) => r.userCalls),
  column("Parses/sec", (r) => r.parses),
  column("Hard Parses/sec", (r) => r.hardParses),
  column("Logons/sec", (r) => r.logons),
  column("Executes/sec", (r) => r.executes),
  column("Transactions/sec", (r) => r.transactions),
  column("Buffer Hit Ratio (%)", (r) => r.bufferHitRatio),
  column("In-Memory Sort Ratio (%)", (r) => r.inMemorySortRatio),
  column("Log Switches (Total)", (r) => r.logSwitchesTotal),
  column("Log Switches (Per Hour)", (r) => r.logSwitchesPerHour),
  ...Array.from({ length: TOP_EVENT_LIMIT }, (_, i) => topEventColumns(i + 1)).flat(),
  ...WAIT_EVENT_ORDER.flatMap(waitEventColumns),
  column("OS busy time", (r) => r.os.busy),
  column("OS idle time", (r) => r.os.idle),
  column("OS iowait time", (r) => r.os.iowait),
  column("OS sys time", (r) => r.os.sys),
  column("OS user time", (r) => r.os.user),
  column("OS cpu wait time", (r) => r.os.cpuWait),
  column("OS resource mgr wait time", (r) => r.os.rsrcMgrWait),
  column("Data Guard Flag", (r) => r.dataGuard),
  column("Exadata Flag", (r) => r.exadata),
  ...waitClassColumns("Admin", "ADMIN"),
  ...waitClassColumns("Application", "APPLN"),
  ...waitClassColumns("Cluster", "CLSTR"),
  ...waitClassColumns("Commit", "COMMT"),
  ...waitClassColumns("Concurrency", "CNCUR"),
  ...waitClassColumns("Configuration", "CONFG"),
  ...waitClassColumns("Network", "NETWK"),
  ...waitClassColumns("Other", "OTHER"),
  ...waitClassColumns("System I/O", "SYSIO"),
  ...waitClassColumns("Scheduler", "SCHED"),
];

export function formatHeaderRow(): string {
  return CSV_COLUMNS.map((c) => c.title).join(",");
}

export function formatRecordRow(record: ReportRecord): string {
  return CSV_COLUMNS.map((c) => c.value(record) ?? "").join(",");
}
