/**
 * `salesgen logs [n]`: show the tail of the run log.
 */

import type { LogManager } from "../lib/logger.js";
import { die, jsonMode, output, parsePositiveInt } from "../lib/output.js";

export async function logsCommand(rest: string[], log: LogManager): Promise<void> {
  let lines = 50;
  if (rest[0] !== undefined) {
    const parsed = parsePositiveInt(rest[0]);
    if (parsed === null) die("Usage: salesgen logs [n]");
    lines = parsed;
  }

  const entries = await log.tail(lines);
  if (jsonMode) {
    output(entries);
  } else if (!entries.length) {
    console.log(`No log entries in ${log.logPath}`);
  } else {
    entries.forEach((e) => console.log(`${e.timestamp} ${e.message}`.trim()));
  }
}
