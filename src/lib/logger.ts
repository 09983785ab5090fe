/**
 * Run log: timestamped record of generation and demo lifecycle events.
 */

import * as fs from "fs/promises";
import * as path from "path";

export interface LogEntry {
  timestamp: string;
  message: string;
}

const LINE_RE = /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?Z?) (.*)$/;

export class LogManager {
  constructor(readonly logPath: string) {}

  /** Append one line; creates the log directory on first use. */
  async log(message: string): Promise<void> {
    await fs.mkdir(path.dirname(this.logPath), { recursive: true });
    const ts = new Date().toISOString();
    const oneLine = message.replace(/\s*\n\s*/g, " ").trim();
    await fs.appendFile(this.logPath, `${ts} ${oneLine}\n`, "utf-8");
  }

  /**
   * Read the last N entries.
   * Returns an empty array if nothing has been logged yet.
   */
  async tail(lines: number = 50): Promise<LogEntry[]> {
    let content: string;
    try {
      content = await fs.readFile(this.logPath, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
      throw err;
    }
    return content
      .split("\n")
      .filter((l) => l.trim().length > 0)
      .slice(-lines)
      .map((line) => {
        const m = line.match(LINE_RE);
        return m ? { timestamp: m[1], message: m[2] } : { timestamp: "", message: line };
      });
  }
}
