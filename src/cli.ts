#!/usr/bin/env node

/**
 * CLI entry point for salesgen.
 *
 * Usage:  salesgen <command> [args...] [--json]
 */

import { main } from "./dispatch.js";

main(process.argv.slice(2)).catch((err) => {
  console.error(`Fatal: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
