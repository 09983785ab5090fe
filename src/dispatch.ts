/**
 * Command dispatch for the salesgen CLI.
 * Each command lives in commands/; this file only routes.
 */

import { loadSettings } from "./lib/config.js";
import { LogManager } from "./lib/logger.js";
import { GLOBAL_FLAGS, jsonMode, output } from "./lib/output.js";
import { generateCommand, DATASET_PRESETS } from "./commands/generate.js";
import { demoCommand } from "./commands/demo.js";
import { checkCommand } from "./commands/check.js";
import { scriptsCommand } from "./commands/scripts.js";
import { revenueCommand } from "./commands/revenue.js";
import { logsCommand } from "./commands/logs.js";

export const VERSION = "1.0.0";

export async function main(argv: string[]): Promise<void> {
  const args = argv.filter((a) => !GLOBAL_FLAGS.includes(a));
  const [rawCmd, ...rest] = args;

  if (rawCmd === undefined) {
    printUsage();
    return;
  }

  const cmd = rawCmd.toLowerCase();

  switch (cmd) {
    case "create_small":
    case "create_large":
    case "generate": {
      const settings = await loadSettings();
      return generateCommand(cmd, rest, settings, new LogManager(settings.logFile));
    }

    case "demo": {
      const settings = await loadSettings();
      await demoCommand(rest, settings, new LogManager(settings.logFile));
      return;
    }

    case "check": {
      await checkCommand(await loadSettings());
      return;
    }

    case "scripts": {
      const settings = await loadSettings();
      await scriptsCommand(settings, new LogManager(settings.logFile));
      return;
    }

    case "revenue": {
      await revenueCommand(rest, await loadSettings());
      return;
    }

    case "logs": {
      const settings = await loadSettings();
      return logsCommand(rest, new LogManager(settings.logFile));
    }

    case "version":
    case "--version":
    case "-v":
      output(jsonMode ? { version: VERSION } : `salesgen ${VERSION}`);
      return;

    case "help":
    case "--help":
    case "-h":
      printUsage();
      return;

    default:
      // Reported, not fatal.
      console.log(`Unknown command: ${cmd}`);
      console.log("Run with --help for usage.");
      return;
  }
}

export function printUsage(): void {
  const small = DATASET_PRESETS.create_small;
  const large = DATASET_PRESETS.create_large;
  console.log(`
Distributed Sales Processing System Setup  (salesgen v${VERSION})
${"=".repeat(50)}

Usage: salesgen <command> [args...] [--json] [--verbose]

Available commands:
  create_small                 Create 1M row sample dataset (${small.file})
  create_large                 Create 5M row sample dataset (${large.file})
  generate <rows> [file]       Create a dataset of any size
           [--batch-size n] [--seed n]
  demo [csv_file]              Run complete demo with 3 workers
  check                        Check requirements
  scripts                      Create launcher scripts (run_system.bat / .sh)
  revenue [csv_file]           Total revenue (Price * Quantity) of a dataset
  logs [n]                     Show the last n run-log entries
  version                      Print version
  help                         This message

Examples:
  salesgen create_small
  salesgen demo
  salesgen generate 250000 sales_250k.csv --seed 7

Environment variables (override salesgen.yml):
  SALESGEN_ROOT                Where salesgen.yml is read (default: cwd)
  SALESGEN_DATA_FOLDER         Where datasets are written and read
  SALESGEN_SCRIPTS_DIR         Where launcher scripts are written
  SALESGEN_LOG_FILE            Run log path
  SALESGEN_EXTERNAL_CMD        External server/worker program
  SALESGEN_WORKERS             Number of demo workers
  SALESGEN_CLI                 How launcher scripts invoke salesgen
`);
}
