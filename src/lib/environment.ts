/**
 * Runtime prerequisite checks for `salesgen check`.
 */

export interface Check {
  name: string;
  ok: boolean;
  detail: string;
}

export type ModuleLoader = (specifier: string) => Promise<unknown>;

export const importModule: ModuleLoader = (specifier) => import(specifier);

export const MIN_NODE_MAJOR = 20;

export function checkNode(version: string = process.version): Check {
  const major = parseInt(version.replace(/^v/, ""), 10);
  const ok = major >= MIN_NODE_MAJOR;
  return {
    name: "Node.js",
    ok,
    detail: ok ? version : `${version} (need ${MIN_NODE_MAJOR}+)`,
  };
}

/** Try to load each package; a package that fails to import counts as missing. */
export async function checkPackages(
  packages: readonly string[],
  load: ModuleLoader = importModule
): Promise<Check[]> {
  const checks: Check[] = [];
  for (const name of packages) {
    try {
      await load(name);
      checks.push({ name, ok: true, detail: "installed" });
    } catch (err) {
      const reason = err instanceof Error ? err.message.split("\n")[0] : String(err);
      checks.push({ name, ok: false, detail: reason });
    }
  }
  return checks;
}

export function installHint(missing: readonly string[]): string {
  return `npm install ${missing.join(" ")}`;
}
