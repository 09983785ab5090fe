import { openSync, writeSync, closeSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

export type CsvValue = string | number;

/** Quote a field only when it contains a delimiter, quote or newline. */
export function escapeCsvField(value: CsvValue): string {
  const val = String(value);
  return val.includes(",") || val.includes('"') || val.includes("\n")
    ? `"${val.replace(/"/g, '""')}"`
    : val;
}

export function formatCsvRow(values: readonly CsvValue[]): string {
  return values.map(escapeCsvField).join(",") + "\n";
}

/**
 * Append-only CSV file handle.
 *
 * The file is truncated on open. Each `append` goes straight to the
 * descriptor, so nothing accumulates in memory between batches.
 * Always pair with `close()` in a `finally`.
 */
export class CsvAppendWriter {
  private fd: number | null;
  private written = 0;

  constructor(readonly path: string) {
    mkdirSync(dirname(path), { recursive: true });
    this.fd = openSync(path, "w");
  }

  writeHeader(columns: readonly string[]): void {
    this.write(formatCsvRow(columns));
  }

  /** Append a batch of rows in a single write. */
  append(rows: readonly (readonly CsvValue[])[]): void {
    if (!rows.length) return;
    this.write(rows.map(formatCsvRow).join(""));
  }

  /** Bytes written so far. */
  get bytes(): number {
    return this.written;
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    closeSync(fd);
  }

  private write(chunk: string): void {
    if (this.fd === null) throw new Error(`CSV writer for ${this.path} is closed`);
    const buf = Buffer.from(chunk, "utf-8");
    let offset = 0;
    while (offset < buf.length) {
      offset += writeSync(this.fd, buf, offset, buf.length - offset);
    }
    this.written += buf.length;
  }
}
