/**
 * Single-pass section scanner for plain-text workload repository reports.
 *
 * Every line is first screened (blank lines, re-printed query headings,
 * pending skips, section terminators) and then handed to the handler of the
 * current section. Handlers fill the record and return a Transition that
 * moves the scan to another section or ends it.
 */

import type { Logger } from "../utils/logger.js";
import { createEmptyRecord, type ReportFormat, type ReportRecord } from "./types.js";
import {
  createParseState,
  type DelimitingMode,
  type ParseState,
  type ScanLine,
  type SectionContext,
  type SectionHandler,
  type SectionState,
  type Transition,
} from "./sections/context.js";
import { searchForNextSection } from "./sections/searching.js";
import { handleInstanceEfficiency, handleProfile } from "./sections/profile.js";
import { handleTopEvents } from "./sections/top-events.js";
import { handleWaitClass } from "./sections/wait-class.js";
import { handleBackgroundWaitEvents, handleForegroundWaitEvents } from "./sections/wait-events.js";
import { handleInstanceActivity, handleThreadActivity } from "./sections/activity-stats.js";
import { handleCacheSizes, handleOsStats, handleTimeModel } from "./sections/scalar-sections.js";

export interface ParseResult {
  record: ReportRecord;
  state: ParseState;
}

const HANDLERS: Record<Exclude<SectionState, "EndOfReport">, SectionHandler> = {
  SearchingForNextSection: searchForNextSection,
  Profile: handleProfile,
  InstanceEfficiency: handleInstanceEfficiency,
  Top5Foreground: handleTopEvents,
  CacheSizes: handleCacheSizes,
  TimeModelStatistics: handleTimeModel,
  OperatingSystemStats: handleOsStats,
  ForegroundWaitClass: handleWaitClass,
  ForegroundWaitEvents: handleForegroundWaitEvents,
  BackgroundWaitEvents: handleBackgroundWaitEvents,
  InstanceActivityStats: handleInstanceActivity,
  ThreadActivity: handleThreadActivity,
};

interface Terminators {
  word: string;
  line: string;
}

/** FORMAT-12 closes sections with shorter dash runs. */
export function sectionTerminators(format: ReportFormat): Terminators {
  return format === "12"
    ? { word: "-".repeat(54), line: " ".repeat(26) + "-".repeat(45) }
    : { word: "-".repeat(61), line: " ".repeat(10) + "-".repeat(61) };
}

function isBlank(line: ScanLine, mode: DelimitingMode): boolean {
  return mode === "word" ? line.words.length === 0 : line.raw === "";
}

/** A query heading re-printed because heading suppression was off. */
function isOutputHeading(line: ScanLine, mode: DelimitingMode): boolean {
  if (mode === "line") return line.raw.startsWith("OUTPUT");
  return line.words.length <= 2 && (line.words[0]?.startsWith("OUTPUT") ?? false);
}

function isTerminator(line: ScanLine, mode: DelimitingMode, format: ReportFormat): boolean {
  const terminators = sectionTerminators(format);
  return mode === "word"
    ? line.words[0] === terminators.word
    : line.raw.slice(0, terminators.line.length) === terminators.line;
}

/** Returns true when the line is consumed before reaching a handler. */
function screenLine(line: ScanLine, ctx: SectionContext): boolean {
  const { state, record, log } = ctx;

  if (isBlank(line, state.mode)) return true;

  if (isOutputHeading(line, state.mode)) {
    log.debug(`Query heading at line ${line.number} - ignoring this plus next line`);
    state.lineSkip++;
    return true;
  }

  if (state.lineSkip > 0) {
    state.lineSkip--;
    return true;
  }

  if (isTerminator(line, state.mode, record.format)) {
    if (state.sectionSkip > 0) {
      state.sectionSkip--;
      log.debug(`Found section terminator at line ${line.number} - ${state.sectionSkip} section(s) left to skip`);
    } else if (state.section !== "SearchingForNextSection") {
      log.verbose(`Found section terminator at line ${line.number} - marking end of section ${state.section}`);
      applyTransition(ctx, { section: "SearchingForNextSection", mode: "line" });
    }
    return true;
  }

  return state.sectionSkip > 0;
}

function applyTransition(ctx: SectionContext, transition: Transition): void {
  const { state, log } = ctx;
  if (transition.section && transition.section !== state.section) {
    log.debug(`State change: ${state.section} -> ${transition.section}`);
    state.section = transition.section;
  }
  if (transition.mode) state.mode = transition.mode;
  if (transition.lineSkip !== undefined) state.lineSkip = transition.lineSkip;
  if (transition.skipSections) state.sectionSkip += transition.skipSections;
  if (transition.resetTable) {
    state.layout = null;
    state.bailout = 0;
    state.topRow = 0;
  }
}

function toScanLine(text: string, index: number): ScanLine {
  const raw = text.replace(/[\r\f]/g, "");
  return { raw, words: raw.split(/\s+/).filter((word) => word !== ""), number: index + 1 };
}

/** Scan report text into a record. `filename` is stored as given. */
export function parseReportText(filename: string, text: string, log: Logger): ParseResult {
  const record = createEmptyRecord(filename);
  const state = createParseState();
  const ctx: SectionContext = { record, state, log };
  const lines = text.split("\n");

  for (let i = 0; i < lines.length; i++) {
    const line = toScanLine(lines[i], i);
    if (screenLine(line, ctx)) continue;
    if (state.section === "EndOfReport") break;

    const transition = HANDLERS[state.section](line, ctx);
    if (!transition) continue;
    applyTransition(ctx, transition);
    if (transition.stop) break;
  }

  return { record, state };
}
