/**
 * Word-mode sections that each contribute a handful of scalar values.
 */

import { bytesToGiB, toDecimal } from "../../utils/decimal.js";
import type { OsStats } from "../types.js";
import { SEARCH_NEXT, leadingKey, wordAt, type SectionHandler } from "./context.js";

export const handleCacheSizes: SectionHandler = (line, { record, log }) => {
  const key = leadingKey(line.words);
  if (key === "Buffer Cache:") {
    record.blockSize = line.words[line.words.length - 1] ?? null;
    log.debug(`blockSize = ${record.blockSize ?? ""}`);
    return undefined;
  }
  if (key.startsWith("Shared Pool")) {
    log.verbose(`End of Cache Sizes section found at line ${line.number}`);
    return SEARCH_NEXT;
  }
  return undefined;
};

/** FORMAT-10 only; later formats carry DB CPU in the wait-class table. */
export const handleTimeModel: SectionHandler = (line, { record, log }) => {
  if (leadingKey(line.words) !== "DB CPU") return undefined;
  record.dbCpuTime = wordAt(line.words, 2);
  record.dbCpuPctDbTime = wordAt(line.words, 3);
  log.debug(`dbCpuTime = ${record.dbCpuTime ?? ""}, dbCpuPctDbTime = ${record.dbCpuPctDbTime ?? ""}`);
  return undefined;
};

const OS_COUNTERS = new Map<string, keyof OsStats>([
  ["BUSY_TIME", "busy"],
  ["IDLE_TIME", "idle"],
  ["IOWAIT_TIME", "iowait"],
  ["SYS_TIME", "sys"],
  ["USER_TIME", "user"],
  ["OS_CPU_WAIT_TIME", "cpuWait"],
  ["RSRC_MGR_CPU_WAIT_TIME", "rsrcMgrWait"],
]);

export const handleOsStats: SectionHandler = (line, { record, log }) => {
  const name = line.words[0];
  if (name === undefined) return undefined;

  const counter = OS_COUNTERS.get(name);
  if (counter) {
    record.os[counter] = wordAt(line.words, 1);
    log.debug(`OS ${name} = ${record.os[counter] ?? ""}`);
    return undefined;
  }
  if (name === "NUM_CPUS") {
    record.numCpus = wordAt(line.words, 1);
    return undefined;
  }
  // Only FORMAT-10 lacks host memory in the report header.
  if (name === "PHYSICAL_MEMORY_BYTES" && record.format === "10") {
    const bytes = toDecimal(line.words[1]);
    if (bytes !== null) record.hostMemory = bytesToGiB(bytes);
    log.debug(`hostMemory = ${record.hostMemory ?? ""}`);
  }
  return undefined;
};
