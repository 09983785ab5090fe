/**
 * Shared CLI output helpers: JSON mode, verbose diagnostics, error exits.
 */

export const jsonMode = process.argv.includes("--json");
export const verboseMode = process.argv.includes("--verbose") || process.argv.includes("-V");

/** Flags handled here; commands never see them as positional args. */
export const GLOBAL_FLAGS = ["--json", "--verbose", "-V"];

export function die(msg: string): never {
  if (jsonMode) {
    console.log(JSON.stringify({ error: msg }));
  } else {
    console.error(`Error: ${msg}`);
  }
  process.exit(1);
}

export function output(data: unknown): void {
  if (typeof data === "string" && !jsonMode) {
    console.log(data);
  } else {
    console.log(JSON.stringify(data, null, 2));
  }
}

export function verbose(msg: string): void {
  if (verboseMode) {
    console.error(`[verbose] ${msg}`);
  }
}

/** Print a progress line unless the caller asked for JSON. */
export function say(msg: string): void {
  if (!jsonMode) console.log(msg);
}

export function formatMegabytes(bytes: number): string {
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/**
 * Read `--name value` from an argument list.
 * Returns the remaining positional arguments alongside.
 */
export function takeFlag(args: string[], name: string): { value: string | undefined; rest: string[] } {
  const idx = args.indexOf(name);
  if (idx === -1) return { value: undefined, rest: args };
  const value = args[idx + 1];
  return { value, rest: [...args.slice(0, idx), ...args.slice(idx + 2)] };
}

/** Parse a strictly positive integer, accepting `_` or `,` digit separators. */
export function parsePositiveInt(raw: string): number | null {
  const cleaned = raw.replace(/[_,]/g, "");
  if (!/^\d+$/.test(cleaned)) return null;
  const num = parseInt(cleaned, 10);
  return num >= 1 && Number.isSafeInteger(num) ? num : null;
}
