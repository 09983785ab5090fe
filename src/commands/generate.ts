/**
 * `salesgen create_small | create_large | generate`: write a synthetic
 * sales CSV.
 */

import * as path from "path";
import { statSync } from "fs";
import {
  generateSalesDataset,
  type GenerateOptions,
  type GenerateResult,
} from "../lib/generator.js";
import type { Settings } from "../lib/config.js";
import type { LogManager } from "../lib/logger.js";
import { die, formatMegabytes, jsonMode, output, parsePositiveInt, say, takeFlag, verbose } from "../lib/output.js";

export interface DatasetPreset {
  rows: number;
  file: string;
}

export const DATASET_PRESETS: Record<string, DatasetPreset> = {
  create_small: { rows: 1_000_000, file: "sales_data_1m.csv" },
  create_large: { rows: 5_000_000, file: "sales_data_5m.csv" },
};

export function formatCount(n: number): string {
  return n.toLocaleString("en-US");
}

/** Run the generator, printing the same progress lines for every caller. */
export function generateWithProgress(options: GenerateOptions): GenerateResult {
  say(`Creating sample dataset with ${formatCount(options.rows)} rows...`);
  say("Generating data in batches...");
  const result = generateSalesDataset({
    ...options,
    onProgress: (p) => {
      say(`  Generated ${formatCount(p.rowsWritten)} rows...`);
      options.onProgress?.(p);
    },
  });
  say(`Sample dataset created: ${result.path}`);
  say(`File size: ${formatMegabytes(statSync(result.path).size)}`);
  return result;
}

export async function generateCommand(
  cmd: string,
  rest: string[],
  settings: Settings,
  log: LogManager
): Promise<void> {
  let rows: number;
  let file: string;
  let batchSize = settings.batchSize;
  let seed = settings.seed;

  const preset = DATASET_PRESETS[cmd];
  if (preset) {
    rows = preset.rows;
    file = preset.file;
  } else {
    const batchFlag = takeFlag(rest, "--batch-size");
    const seedFlag = takeFlag(batchFlag.rest, "--seed");
    const [rowsArg, fileArg] = seedFlag.rest;

    const parsedRows = rowsArg === undefined ? null : parsePositiveInt(rowsArg);
    if (parsedRows === null) {
      die("Usage: salesgen generate <rows> [file] [--batch-size n] [--seed n]");
    }
    rows = parsedRows;
    file = fileArg || `sales_data_${rows}.csv`;

    if (batchFlag.value !== undefined) {
      const parsed = parsePositiveInt(batchFlag.value);
      if (parsed === null) die("--batch-size must be a positive integer.");
      batchSize = parsed;
    }
    if (seedFlag.value !== undefined) {
      const parsed = /^-?\d+$/.test(seedFlag.value) ? parseInt(seedFlag.value, 10) : NaN;
      if (Number.isNaN(parsed)) die("--seed must be an integer.");
      seed = parsed;
    }
  }

  const outputPath = path.resolve(settings.dataFolder, file);
  verbose(`rows=${rows} batchSize=${batchSize} seed=${seed} output=${outputPath}`);

  const started = Date.now();
  const result = generateWithProgress({ rows, outputPath, batchSize, seed });
  const durationMs = Date.now() - started;
  await log.log(`generate ${result.path} rows=${result.rows} batches=${result.batches} bytes=${result.bytes} (${durationMs}ms)`);

  if (jsonMode) {
    output({ ...result, batchSize, seed, durationMs });
  }
}
