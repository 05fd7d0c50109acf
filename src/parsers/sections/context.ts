/**
 * Shared scan state and handler contract for the section handlers.
 */

import type { Logger } from "../../utils/logger.js";
import type { ColumnLayout } from "../column-layout.js";
import type { ReportFormat, ReportRecord } from "../types.js";

export type SectionState =
  | "Profile"
  | "InstanceEfficiency"
  | "Top5Foreground"
  | "CacheSizes"
  | "TimeModelStatistics"
  | "OperatingSystemStats"
  | "ForegroundWaitClass"
  | "ForegroundWaitEvents"
  | "BackgroundWaitEvents"
  | "InstanceActivityStats"
  | "ThreadActivity"
  | "SearchingForNextSection"
  | "EndOfReport";

/**
 * `word`: values are picked by word position.
 * `line`: the whole line is kept for fixed-width slicing.
 */
export type DelimitingMode = "word" | "line";

export type Discovery = "notFound" | "pending" | "found";

export interface ParseState {
  section: SectionState;
  mode: DelimitingMode;
  /** Non-blank lines still to be skipped. */
  lineSkip: number;
  /** Whole sections still to be skipped, counted down at each terminator. */
  sectionSkip: number;
  /** Lines seen while looking for the current table's dashed header. */
  bailout: number;
  /** Column layout of the current table, null until its header is found. */
  layout: ColumnLayout | null;
  /** Data rows seen in the current top-events table. */
  topRow: number;
  systemDetails: Discovery;
  hostDetails: Discovery;
  /** Sum of wait-class times in seconds (FORMAT-10 only). */
  totalWaitTime: string;
  waitClassSeen: boolean;
}

export function createParseState(): ParseState {
  return {
    section: "Profile",
    mode: "word",
    lineSkip: 0,
    sectionSkip: 0,
    bailout: 0,
    layout: null,
    topRow: 0,
    systemDetails: "notFound",
    hostDetails: "notFound",
    totalWaitTime: "0",
    waitClassSeen: false,
  };
}

/** One input line in both of its forms. */
export interface ScanLine {
  /** Line with carriage returns and form feeds removed. */
  raw: string;
  words: string[];
  /** 1-based line number in the file. */
  number: number;
}

export interface SectionContext {
  record: ReportRecord;
  state: ParseState;
  log: Logger;
}

/**
 * What a handler asks the scan loop to change after a line. Omitted fields
 * stay as they are.
 */
export interface Transition {
  section?: SectionState;
  mode?: DelimitingMode;
  /** Replaces the line-skip counter. */
  lineSkip?: number;
  /** Added to the section-skip counter. */
  skipSections?: number;
  /** Entering a table: clear the header search and row counters. */
  resetTable?: boolean;
  /** Stop reading the file. */
  stop?: boolean;
}

export type SectionHandler = (line: ScanLine, ctx: SectionContext) => Transition | undefined;

/** Leave the current section and look for the next opener. */
export const SEARCH_NEXT: Transition = { section: "SearchingForNextSection", mode: "line" };

/** Line-skip applied after abandoning a table whose header was not found. */
export function abandonSkip(format: ReportFormat): number {
  return format === "12" ? 10 : 5;
}

/** First two words joined by one space, the key most word-mode rows use. */
export function leadingKey(words: string[]): string {
  return words.slice(0, 2).join(" ");
}

/** Word `index` with thousands separators removed, or null when absent. */
export function wordAt(words: string[], index: number): string | null {
  const word = words[index];
  return word === undefined ? null : word.replace(/,/g, "");
}

/** Empty strings become null. */
export function orNull(text: string): string | null {
  return text === "" ? null : text;
}
