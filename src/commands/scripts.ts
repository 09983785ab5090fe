/**
 * `salesgen scripts`: emit run_system.bat and run_system.sh.
 */

import { writeLaunchScripts, type WrittenScripts } from "../lib/launch-scripts.js";
import type { Settings } from "../lib/config.js";
import type { LogManager } from "../lib/logger.js";
import { jsonMode, output } from "../lib/output.js";

export async function scriptsCommand(settings: Settings, log: LogManager): Promise<WrittenScripts> {
  const written = await writeLaunchScripts(settings.scriptsDir, {
    cliCommand: settings.cliCommand,
    externalCommand: settings.externalCommand.join(" "),
  });
  await log.log(`scripts ${written.batch} ${written.shell}`);

  if (jsonMode) {
    output(written);
  } else {
    console.log("Created batch scripts:");
    console.log(`  - ${written.batch} (Windows)`);
    console.log(`  - ${written.shell} (Unix/Linux/Mac)`);
  }
  return written;
}
