/**
 * Launcher scripts for `salesgen scripts`: a numbered menu for people
 * who would rather not remember the commands.
 */

import * as fs from "fs/promises";
import * as path from "path";

export interface MenuOption {
  label: string;
  command: string;
}

export interface LaunchScriptOptions {
  /** How the scripts invoke this CLI. */
  cliCommand: string;
  /** How the scripts invoke the external server/worker program. */
  externalCommand: string;
  title?: string;
}

export interface WrittenScripts {
  batch: string;
  shell: string;
}

export const BATCH_SCRIPT = "run_system.bat";
export const SHELL_SCRIPT = "run_system.sh";

const DEFAULT_TITLE = "Distributed Sales Processing System";

export function menuOptions(opts: LaunchScriptOptions): MenuOption[] {
  return [
    { label: "Create sample dataset (1M rows)", command: `${opts.cliCommand} create_small` },
    { label: "Create large dataset (5M rows)", command: `${opts.cliCommand} create_large` },
    { label: "Run server", command: `${opts.externalCommand} server` },
    { label: "Run worker", command: `${opts.externalCommand} worker` },
    { label: "Run demo with 3 workers", command: `${opts.cliCommand} demo` },
  ];
}

export function renderBatchScript(opts: LaunchScriptOptions): string {
  const title = opts.title ?? DEFAULT_TITLE;
  const options = menuOptions(opts);
  const lines = [
    "@echo off",
    `echo ${title}`,
    `echo ${"=".repeat(title.length)}`,
    "",
    "echo.",
    "echo Choose an option:",
    ...options.map((o, i) => `echo ${i + 1}. ${o.label}`),
    "",
    `set /p choice="Enter choice (1-${options.length}): "`,
    "",
  ];
  options.forEach((o, i) => {
    const keyword = i === 0 ? "if" : ") else if";
    lines.push(`${keyword} "%choice%"=="${i + 1}" (`, `    ${o.command}`);
  });
  lines.push(") else (", "    echo Invalid choice", ")", "", "pause", "");
  return lines.join("\r\n");
}

export function renderShellScript(opts: LaunchScriptOptions): string {
  const title = opts.title ?? DEFAULT_TITLE;
  const options = menuOptions(opts);
  const lines = [
    "#!/bin/bash",
    `echo "${title}"`,
    `echo "${"=".repeat(title.length)}"`,
    "",
    'echo ""',
    'echo "Choose an option:"',
    ...options.map((o, i) => `echo "${i + 1}. ${o.label}"`),
    "",
    `read -p "Enter choice (1-${options.length}): " choice`,
    "",
    "case $choice in",
  ];
  options.forEach((o, i) => {
    lines.push(`    ${i + 1})`, `        ${o.command}`, "        ;;");
  });
  lines.push("    *)", '        echo "Invalid choice"', "        ;;", "esac", "");
  return lines.join("\n");
}

/** Write both scripts into `dir`; the shell script is made executable. */
export async function writeLaunchScripts(dir: string, opts: LaunchScriptOptions): Promise<WrittenScripts> {
  await fs.mkdir(dir, { recursive: true });
  const batch = path.join(dir, BATCH_SCRIPT);
  const shell = path.join(dir, SHELL_SCRIPT);
  await fs.writeFile(batch, renderBatchScript(opts), "utf-8");
  await fs.writeFile(shell, renderShellScript(opts), "utf-8");
  await fs.chmod(shell, 0o755);
  return { batch, shell };
}
