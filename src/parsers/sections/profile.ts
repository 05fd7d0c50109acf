/**
 * The report header and load profile: database and host identity, the
 * snapshot window, and per-second load figures.
 *
 * Rows are recognized by their first two words. Labels moved between
 * generations, so several rows come in a FORMAT-10/11 spelling and a
 * FORMAT-12 spelling with the value one word further right.
 */

import { averageActiveSessions, bytesToMiB, isZero, toDecimal } from "../../utils/decimal.js";
import type { ReportRecord } from "../types.js";
import {
  SEARCH_NEXT,
  leadingKey,
  wordAt,
  type ScanLine,
  type SectionContext,
  type SectionHandler,
  type Transition,
} from "./context.js";

type ProfileRule = (line: ScanLine, ctx: SectionContext) => Transition | undefined;

type LoadField =
  | "logicalReads"
  | "blockChanges"
  | "userCalls"
  | "parses"
  | "hardParses"
  | "logons"
  | "executes"
  | "transactions";

function load(field: LoadField, index: number): ProfileRule {
  return (line, { record, log }) => {
    record[field] = wordAt(line.words, index);
    log.debug(`${field} = ${record[field] ?? ""}`);
    return undefined;
  };
}

function readRedoSize(text: string | null, ctx: SectionContext): void {
  const value = toDecimal(text);
  if (text === null || value === null) {
    ctx.record.redoWriteThroughput = null;
    ctx.log.debug(`Unable to read redo size from ${JSON.stringify(text)}`);
    return;
  }
  ctx.record.redoWriteThroughput = value.isZero() ? text : bytesToMiB(value);
  ctx.log.debug(`redoWriteThroughput = ${ctx.record.redoWriteThroughput}`);
}

function readBufferRatios(words: string[], record: ReportRecord): void {
  record.bufferHitRatio = words[3] ?? null;
  record.inMemorySortRatio = words[7] ?? null;
}

/** Rows matched on the whole two-word key. */
const EXACT_RULES = new Map<string, ProfileRule>([
  ["DB Name", (line, { record, state, log }) => {
    if (state.systemDetails === "found") return undefined;
    log.verbose(`Start of Database System details at line ${line.number}`);
    // From FORMAT-11 on the header carries a "Startup Time" column.
    record.format = line.words[7] === "Startup" ? "11" : "10";
    log.verbose(`Using report format ${record.format}`);
    state.systemDetails = "pending";
    return { lineSkip: 1 };
  }],
  ["Host Name", (line, { state, log }) => {
    if (state.hostDetails === "found") return undefined;
    log.verbose(`Start of Host System details at line ${line.number}`);
    state.hostDetails = "pending";
    return { lineSkip: 1, mode: "line" };
  }],
  ["Begin Snap:", (line, { record }) => {
    record.beginSnap = line.words[2] ?? null;
    record.beginTime = `${line.words[3] ?? ""} ${line.words[4] ?? ""}`;
    return undefined;
  }],
  ["End Snap:", (line, { record }) => {
    record.endSnap = line.words[2] ?? null;
    record.endTime = `${line.words[3] ?? ""} ${line.words[4] ?? ""}`;
    return undefined;
  }],
  ["DB Time:", (line, { record, log }) => {
    record.dbTimeMinutes = wordAt(line.words, 2);
    const elapsed = toDecimal(record.elapsedMinutes);
    const dbTime = toDecimal(record.dbTimeMinutes);
    if (elapsed === null) {
      log.info("Found DB Time but not Elapsed Time - unable to calculate Average Active Sessions");
    } else if (elapsed.isZero()) {
      log.info("Cannot calculate Average Active Sessions due to zero Elapsed Time value");
    } else if (dbTime !== null) {
      record.averageActiveSessions = averageActiveSessions(dbTime, elapsed);
      log.debug(`averageActiveSessions = ${record.averageActiveSessions}`);
    }
    return undefined;
  }],
  ["Buffer Cache:", (line, { record }) => {
    record.blockSize = line.words[line.words.length - 1] ?? null;
    return undefined;
  }],
  ["Redo size:", (line, ctx) => {
    readRedoSize(wordAt(line.words, 2), ctx);
    return undefined;
  }],
  ["Redo size", (line, ctx) => {
    readRedoSize(wordAt(line.words, 3), ctx);
    // Only FORMAT-12 spells the label "Redo size (bytes):".
    ctx.record.format = "12";
    ctx.log.verbose(`Amending report format to ${ctx.record.format}`);
    return undefined;
  }],
  ["Logical reads:", load("logicalReads", 2)],
  ["Logical read", load("logicalReads", 3)],
  ["Block changes:", load("blockChanges", 2)],
  ["User calls:", load("userCalls", 2)],
  ["Hard parses:", load("hardParses", 2)],
  ["Hard parses", load("hardParses", 3)],
  ["Buffer Hit", (line, { record }) => {
    readBufferRatios(line.words, record);
    return undefined;
  }],
  ["Instance Efficiency", (line, { log }) => {
    log.verbose(`End of Profile section found at line ${line.number}`);
    return { section: "InstanceEfficiency", mode: "word", lineSkip: 1 };
  }],
]);

/** Rows matched on a key prefix, tried in order. */
const PREFIX_RULES: ReadonlyArray<readonly [string, ProfileRule]> = [
  [
    "Elapsed:",
    (line, { record, log }) => {
      record.elapsedMinutes = wordAt(line.words, 1);
      if (isZero(record.elapsedMinutes)) log.verbose("Found zero value for Elapsed Time");
      return undefined;
    },
  ],
  ["Parses:", load("parses", 1)],
  ["Parses", load("parses", 2)],
  ["Logons:", load("logons", 1)],
  ["Executes:", load("executes", 1)],
  ["Executes", load("executes", 2)],
  ["Transactions:", load("transactions", 1)],
];

function readSystemDetails(words: string[], ctx: SectionContext): void {
  const { record, log } = ctx;
  record.dbName = words[0] ?? null;
  record.instanceName = words[2] ?? null;
  record.instanceNumber = words[3] ?? null;
  if (record.format === "10") {
    record.dbVersion = words[4] ?? null;
    record.cluster = words[5]?.charAt(0) ?? null;
    const host = words[6];
    if (host !== undefined) {
      record.hostname = host;
      record.hostOs = "Unknown";
    } else {
      log.verbose("Unable to find Hostname at end of System Details section");
    }
  } else {
    record.dbVersion = words[6] ?? null;
    record.cluster = words[7]?.charAt(0) ?? null;
  }
  log.debug(
    `Sys Details: DBName=${record.dbName ?? ""}, InstName=${record.instanceName ?? ""}, ` +
      `InstNum=${record.instanceNumber ?? ""}, Ver=${record.dbVersion ?? ""}, Cluster=${record.cluster ?? ""}`,
  );
}

function readHostDetails(raw: string, record: ReportRecord): void {
  // Host names and OS names may contain spaces, so this row is cut by position.
  record.hostname = raw.slice(0, 16).trim();
  record.hostOs = raw.slice(16, 49).trim();
  record.hostMemory = raw.slice(68, 79).trim();
}

export const handleProfile: SectionHandler = (line, ctx) => {
  const { state } = ctx;

  if (state.systemDetails === "pending") {
    state.systemDetails = "found";
    readSystemDetails(line.words, ctx);
    return undefined;
  }
  if (state.hostDetails === "pending") {
    state.hostDetails = "found";
    readHostDetails(line.raw, ctx.record);
    ctx.log.debug(
      `Host Details: Hostname=${ctx.record.hostname ?? ""}, OS=${ctx.record.hostOs ?? ""}, ` +
        `HostMem=${ctx.record.hostMemory ?? ""}`,
    );
    return { mode: "word" };
  }

  const key = leadingKey(line.words);
  const exact = EXACT_RULES.get(key);
  if (exact) return exact(line, ctx);
  const prefixed = PREFIX_RULES.find(([prefix]) => key.startsWith(prefix));
  return prefixed ? prefixed[1](line, ctx) : undefined;
};

export const handleInstanceEfficiency: SectionHandler = (line, ctx) => {
  if (leadingKey(line.words) !== "Buffer Hit") return undefined;
  readBufferRatios(line.words, ctx.record);
  ctx.log.verbose(`End of Instance Efficiency section found at line ${line.number}`);
  return SEARCH_NEXT;
};
