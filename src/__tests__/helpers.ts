import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { Logger, type LoggerOptions } from "../utils/logger.js";

export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

export function readFixture(name: string): string {
  return readFileSync(fixturePath(name), "utf8");
}

/** Logger writing into an array instead of stderr. */
export function captureLogger(options: Omit<LoggerOptions, "sink"> = {}): { log: Logger; lines: string[] } {
  const lines: string[] = [];
  const log = new Logger({ ...options, sink: (line) => lines.push(line) });
  return { log, lines };
}
