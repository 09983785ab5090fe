/**
 * `salesgen revenue [csv_file]`: total of Price * Quantity over a sales CSV.
 */

import * as path from "path";
import { existsSync } from "fs";
import { DatabaseManager, type RevenueSummary } from "../lib/database.js";
import type { Settings } from "../lib/config.js";
import { die, jsonMode, output } from "../lib/output.js";
import { DATASET_PRESETS } from "./generate.js";

export async function revenueCommand(rest: string[], settings: Settings): Promise<RevenueSummary> {
  const csvFile = path.resolve(settings.dataFolder, rest[0] || DATASET_PRESETS.create_large.file);
  if (!existsSync(csvFile)) die(`File not found: ${csvFile}`);

  const db = new DatabaseManager();
  let summary: RevenueSummary;
  try {
    summary = await db.revenueSummary(csvFile);
  } finally {
    await db.close();
  }

  if (jsonMode) {
    output(summary);
  } else {
    console.log(`Columns: ${summary.columns.join(", ")}`);
    console.log(`Shape: (${summary.shape[0]}, ${summary.shape[1]})`);
    console.log(`Total revenue: ${summary.totalRevenue.toFixed(2)}`);
  }
  return summary;
}
