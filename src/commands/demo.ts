/**
 * `salesgen demo [csv_file]`: start the external server and workers
 * against a dataset, then clean up.
 */

import * as path from "path";
import { existsSync } from "fs";
import { runDemo, DEMO_DATASET_ROWS, type DemoOptions, type DemoResult } from "../lib/orchestrator.js";
import type { Settings } from "../lib/config.js";
import type { LogManager } from "../lib/logger.js";
import { jsonMode, output, say } from "../lib/output.js";
import { DATASET_PRESETS, generateWithProgress } from "./generate.js";

export const DEFAULT_DEMO_DATASET = DATASET_PRESETS.create_small.file;

export async function demoCommand(
  rest: string[],
  settings: Settings,
  log: LogManager,
  overrides: Partial<DemoOptions> = {}
): Promise<DemoResult> {
  const csvFile = path.resolve(settings.dataFolder, rest[0] || DEFAULT_DEMO_DATASET);

  say("=".repeat(80));
  say("DISTRIBUTED SALES PROCESSING SYSTEM DEMO");
  say("=".repeat(80));

  const events: string[] = [];
  const report = (message: string) => {
    say(message);
    events.push(message);
  };

  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  let generated = false;
  let result: DemoResult;
  try {
    // Ctrl-C during generation keeps Node's default exit.
    if (!existsSync(csvFile)) {
      report(`Creating sample dataset: ${csvFile}`);
      const generate = overrides.generate ?? generateWithProgress;
      generate({
        rows: overrides.datasetRows ?? DEMO_DATASET_ROWS,
        outputPath: csvFile,
        batchSize: overrides.batchSize ?? settings.batchSize,
        seed: overrides.seed ?? settings.seed,
      });
      generated = true;
    }
    process.once("SIGINT", onInterrupt);

    result = await runDemo({
      csvFile,
      command: settings.externalCommand,
      workers: settings.workers,
      serverDelayMs: settings.serverDelayMs,
      workerStaggerMs: settings.workerStaggerMs,
      batchSize: settings.batchSize,
      seed: settings.seed,
      signal: controller.signal,
      generate: generateWithProgress,
      report,
      ...overrides,
    });
  } finally {
    process.removeListener("SIGINT", onInterrupt);
    for (const event of events) await log.log(`demo ${event}`);
  }
  if (generated) result = { ...result, generated };

  if (jsonMode) {
    output(result);
  } else {
    say("\nProcesses:");
    for (const p of result.processes) {
      const icon = p.status === "completed" ? "✓" : p.status === "failed" ? "✗" : "…";
      say(`  ${icon} ${p.name.padEnd(10)} pid=${p.pid ?? "-"} ${p.error ?? p.message ?? p.status}`);
    }
  }
  return result;
}
