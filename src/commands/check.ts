/**
 * `salesgen check`: verify the runtime libraries are installed.
 * Advisory only: never changes the exit code.
 */

import { checkNode, checkPackages, installHint, importModule, type Check, type ModuleLoader } from "../lib/environment.js";
import type { Settings } from "../lib/config.js";
import { jsonMode, output } from "../lib/output.js";

export interface CheckReport {
  checks: Check[];
  missing: string[];
  ok: boolean;
}

export async function checkCommand(settings: Settings, load: ModuleLoader = importModule): Promise<CheckReport> {
  const node = checkNode();
  const packages = await checkPackages(settings.requiredPackages, load);
  const missing = packages.filter((c) => !c.ok).map((c) => c.name);
  const report: CheckReport = { checks: [node, ...packages], missing, ok: node.ok && !missing.length };

  if (jsonMode) {
    output(report);
    return report;
  }

  console.log(`${node.ok ? "✓" : "✗"} ${node.name} ${node.detail}`);
  for (const c of packages) {
    console.log(c.ok ? `✓ ${c.name} is installed` : `✗ ${c.name} is missing`);
  }

  if (missing.length) {
    console.log("\nInstall missing packages with:");
    console.log(installHint(missing));
  } else {
    console.log("\n✓ All required packages are installed");
  }
  return report;
}
