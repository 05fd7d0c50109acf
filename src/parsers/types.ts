/**
 * Types for the record extracted from one workload-repository text report.
 *
 * Values are kept as the decimal text read from the report (thousands
 * separators removed) or produced by the decimal helpers; `null` means the
 * report did not provide the value or it could not be derived.
 */

/** Report layout generation, detected while scanning. */
export type ReportFormat = "10" | "11" | "12" | "unknown";

export type Flag = "Y" | "N";

export const WAIT_CLASS_CODES = [
  "ADMIN",
  "APPLN",
  "CLSTR",
  "COMMT",
  "CNCUR",
  "CONFG",
  "NETWK",
  "OTHER",
  "SCHED",
  "USRIO",
  "SYSIO",
] as const;
export type WaitClassCode = (typeof WAIT_CLASS_CODES)[number];

/** Row prefix in the wait-class section for each class. */
export const WAIT_CLASS_PREFIXES: ReadonlyArray<readonly [string, WaitClassCode]> = [
  ["Administrative", "ADMIN"],
  ["Application", "APPLN"],
  ["Cluster", "CLSTR"],
  ["Commit", "COMMT"],
  ["Concurrency", "CNCUR"],
  ["Configuration", "CONFG"],
  ["Network", "NETWK"],
  ["Other", "OTHER"],
  ["Scheduler", "SCHED"],
  ["User I/O", "USRIO"],
  ["System I/O", "SYSIO"],
];

export const FOREGROUND_EVENT_CODES = ["DFSR", "DFXR", "DPRD", "DPWR", "DPRT", "DPWT", "LFSY"] as const;
export const BACKGROUND_EVENT_CODES = ["DFPW", "LFPW", "LFSR"] as const;
export type ForegroundEventCode = (typeof FOREGROUND_EVENT_CODES)[number];
export type BackgroundEventCode = (typeof BACKGROUND_EVENT_CODES)[number];
export type WaitEventCode = ForegroundEventCode | BackgroundEventCode;

/** Full event name as printed in the report. */
export const WAIT_EVENT_NAMES: Record<WaitEventCode, string> = {
  DFSR: "db file sequential read",
  DFXR: "db file scattered read",
  DPRD: "direct path read",
  DPWR: "direct path write",
  DPRT: "direct path read temp",
  DPWT: "direct path write temp",
  LFSY: "log file sync",
  DFPW: "db file parallel write",
  LFPW: "log file parallel write",
  LFSR: "log file sequential read",
};

export interface WaitStats {
  waits: string | null;
  /** Seconds */
  time: string | null;
  /** Milliseconds per wait */
  average: string | null;
  pctDbTime: string | null;
}

export interface TopEvent {
  name: string;
  waitClass: string | null;
  waits: string | null;
  time: string | null;
  average: string | null;
  pctDbTime: string | null;
}

/** OS counters in hundredths of a second, as printed. */
export interface OsStats {
  busy: string | null;
  idle: string | null;
  iowait: string | null;
  sys: string | null;
  user: string | null;
  cpuWait: string | null;
  rsrcMgrWait: string | null;
}

export interface ReportRecord {
  filename: string;
  format: ReportFormat;

  dbName: string | null;
  instanceNumber: string | null;
  instanceName: string | null;
  dbVersion: string | null;
  cluster: string | null;

  hostname: string | null;
  hostOs: string | null;
  numCpus: string | null;
  hostMemory: string | null;
  blockSize: string | null;

  beginSnap: string | null;
  beginTime: string | null;
  endSnap: string | null;
  endTime: string | null;
  elapsedMinutes: string | null;
  dbTimeMinutes: string | null;
  averageActiveSessions: string | null;
  busy: Flag | null;

  logicalReads: string | null;
  blockChanges: string | null;
  userCalls: string | null;
  parses: string | null;
  hardParses: string | null;
  logons: string | null;
  executes: string | null;
  transactions: string | null;
  bufferHitRatio: string | null;
  inMemorySortRatio: string | null;
  logSwitchesTotal: string | null;
  logSwitchesPerHour: string | null;

  readIops: string | null;
  allWriteIops: string | null;
  redoWriteIops: string | null;
  dataWriteIops: string | null;
  totalIops: string | null;
  readThroughput: string | null;
  allWriteThroughput: string | null;
  redoWriteThroughput: string | null;
  dataWriteThroughput: string | null;
  totalThroughput: string | null;

  dbCpuTime: string | null;
  dbCpuPctDbTime: string | null;

  waitClasses: Partial<Record<WaitClassCode, WaitStats>>;
  waitEvents: Partial<Record<WaitEventCode, WaitStats>>;
  /** Report order, at most five entries. */
  topEvents: TopEvent[];
  os: OsStats;

  exadata: Flag;
  dataGuard: Flag;
}

export function createEmptyRecord(filename: string): ReportRecord {
  return {
    filename,
    format: "unknown",
    dbName: null,
    instanceNumber: null,
    instanceName: null,
    dbVersion: null,
    cluster: null,
    hostname: null,
    hostOs: null,
    numCpus: null,
    hostMemory: null,
    blockSize: null,
    beginSnap: null,
    beginTime: null,
    endSnap: null,
    endTime: null,
    elapsedMinutes: null,
    dbTimeMinutes: null,
    averageActiveSessions: null,
    busy: null,
    logicalReads: null,
    blockChanges: null,
    userCalls: null,
    parses: null,
    hardParses: null,
    logons: null,
    executes: null,
    transactions: null,
    bufferHitRatio: null,
    inMemorySortRatio: null,
    logSwitchesTotal: null,
    logSwitchesPerHour: null,
    readIops: null,
    allWriteIops: null,
    redoWriteIops: null,
    dataWriteIops: null,
    totalIops: null,
    readThroughput: null,
    allWriteThroughput: null,
    redoWriteThroughput: null,
    dataWriteThroughput: null,
    totalThroughput: null,
    dbCpuTime: null,
    dbCpuPctDbTime: null,
    waitClasses: {},
    waitEvents: {},
    topEvents: [],
    os: {
      busy: null,
      idle: null,
      iowait: null,
      sys: null,
      user: null,
      cpuWait: null,
      rsrcMgrWait: null,
    },
    exadata: "N",
    dataGuard: "N",
  };
}
