/**
 * Derived metrics computed once the scan has finished: busy flag, I/O
 * totals and data-write rates, and FORMAT-10 wait-class shares of DB time.
 * Also reports what the scan failed to find.
 */

import { ReportError } from "../errors/report-error.js";
import type { ParseState } from "../parsers/sections/context.js";
import { WAIT_CLASS_PREFIXES, type ReportRecord } from "../parsers/types.js";
import {
  differenceScaled,
  isGreater,
  isZero,
  percentOfDbTime,
  sumScaled,
  toDecimal,
} from "../utils/decimal.js";
import type { Logger } from "../utils/logger.js";

type RateField = "Iops" | "Throughput";

/**
 * total = read + all-write; data-write = all-write - redo-write. Values that
 * come out as zero are treated as absent.
 */
function deriveRates(record: ReportRecord, kind: RateField): void {
  const read = `read${kind}` as const;
  const allWrite = `allWrite${kind}` as const;
  const redoWrite = `redoWrite${kind}` as const;
  const dataWrite = `dataWrite${kind}` as const;
  const total = `total${kind}` as const;

  record[total] = sumScaled(record[read], record[allWrite]);
  record[dataWrite] = differenceScaled(record[allWrite], record[redoWrite]);

  for (const field of [total, read, allWrite, dataWrite]) {
    if (isZero(record[field])) record[field] = null;
  }
}

function deriveBusyFlag(record: ReportRecord, log: Logger): void {
  const busy = isGreater(record.averageActiveSessions, record.numCpus);
  if (busy === null) return;
  record.busy = busy ? "Y" : "N";
  log.debug(`Busy flag = ${record.busy}`);
}

/** FORMAT-10 has no %DB time column in the wait-class table. */
function deriveWaitClassShares(record: ReportRecord, state: ParseState, log: Logger): void {
  if (!state.waitClassSeen) {
    log.verbose("No Wait Class section found - skipping Wait Class %DBTime calculation");
    return;
  }
  log.verbose("Calculating Wait Class data: note that %DBTime in FORMAT-10 reports can total to >100%");
  log.verbose(`Summed Wait Class time is ${state.totalWaitTime} s`);

  const dbTime = toDecimal(record.dbTimeMinutes);
  if (dbTime === null || dbTime.isZero()) {
    log.verbose(`WARNING: Unable to calculate Wait Class %DBTime values due to unknown value for DB Time: ${record.dbTimeMinutes ?? ""}`);
    return;
  }

  for (const [name, code] of WAIT_CLASS_PREFIXES) {
    const stats = record.waitClasses[code];
    const time = toDecimal(stats?.time);
    if (!stats || time === null) {
      log.verbose(`No values found for ${name} Wait Class`);
      continue;
    }
    stats.pctDbTime = percentOfDbTime(time, dbTime);
    log.verbose(`Calculated ${name} Wait Class %DBTime as ${stats.pctDbTime} %`);
  }
}

const CRITICAL_FIELDS = [
  ["dbName", "Database name"],
  ["readIops", "read IOPS values"],
  ["allWriteIops", "write IOPS values"],
  ["readThroughput", "read throughput values"],
  ["allWriteThroughput", "write throughput values"],
] as const;

/**
 * Finalize a scanned record in place. Returns the error to count against
 * the file, if any; the record is emitted either way.
 */
export function postProcess(record: ReportRecord, state: ParseState, log: Logger): ReportError | null {
  if (record.format === "unknown") {
    return new ReportError(
      `${record.filename}: unable to determine report format`,
      "UNKNOWN_FORMAT",
      "post_process",
      "Check that the report header with the DB Name line is present",
    );
  }

  log.verbose("Start post-processing section");
  deriveBusyFlag(record, log);
  deriveRates(record, "Iops");
  deriveRates(record, "Throughput");
  if (record.format === "10") deriveWaitClassShares(record, state, log);

  if (state.systemDetails !== "found") log.info("Unable to find database system details");
  if (record.format !== "10") {
    if (state.hostDetails !== "found") log.info("Unable to find host system details");
    if (record.averageActiveSessions === null) log.info("Unable to calculate Average Active Sessions");
    if (record.busy === null) log.info("Unable to determine value for BUSY flag");
  }

  const missing = CRITICAL_FIELDS.find(([field]) => record[field] === null);
  if (missing) {
    return new ReportError(
      `Post-process complete: unable to determine ${missing[1]}`,
      "MISSING_CRITICAL_FIELD",
      "post_process",
    );
  }
  log.verbose("Post-processing complete");
  return null;
}
