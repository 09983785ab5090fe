/**
 * Programmatic API: re-exports the core modules.
 *
 * The CLI (cli.ts) is the usual way in; this file is kept for anyone
 * importing the library directly.
 */

export {
  generateSalesDataset,
  buildBatch,
  SALES_COLUMNS,
  type GenerateOptions,
  type GenerateResult,
  type GenerateProgress,
} from "./lib/generator.js";
export { SeededRandom, type RandomSource } from "./lib/random.js";
export { CsvAppendWriter } from "./lib/csv.js";
export { runDemo, spawnProcess, type DemoOptions, type DemoResult } from "./lib/orchestrator.js";
export { DatabaseManager, type RevenueSummary } from "./lib/database.js";
export { TaskTracker } from "./lib/tasks.js";
export { loadSettings, type Settings } from "./lib/config.js";
export { writeLaunchScripts } from "./lib/launch-scripts.js";
export { checkPackages } from "./lib/environment.js";
