/**
 * salesgen.yml: project-level configuration.
 *
 * Looked up in SALESGEN_ROOT, or the current directory. Settings
 * resolve in this order: environment variables, then salesgen.yml,
 * then built-in defaults.
 *
 * Example salesgen.yml:
 *   paths:
 *     data_folder: data
 *     scripts_dir: .
 *     log_file: .salesgen/salesgen.log
 *   generator:
 *     batch_size: 100000
 *     seed: 42
 *   demo:
 *     workers: 3
 *     server_delay_ms: 3000
 *     worker_stagger_ms: 1000
 *     command: python3 distributed_sales_system.py
 *   check:
 *     packages:
 *       - "@duckdb/node-api"
 */

import * as fs from "fs/promises";
import * as path from "path";
import { DEFAULT_BATCH_SIZE, DEFAULT_SEED } from "./generator.js";

export interface SalesgenConfig {
  paths?: {
    data_folder?: string;
    scripts_dir?: string;
    log_file?: string;
  };
  generator?: {
    batch_size?: number;
    seed?: number;
  };
  demo?: {
    workers?: number;
    server_delay_ms?: number;
    worker_stagger_ms?: number;
    command?: string;
  };
  check?: {
    packages?: string[];
  };
}

/** Fully resolved settings used by the commands. */
export interface Settings {
  root: string;
  dataFolder: string;
  scriptsDir: string;
  logFile: string;
  batchSize: number;
  seed: number;
  workers: number;
  serverDelayMs: number;
  workerStaggerMs: number;
  externalCommand: string[];
  cliCommand: string;
  requiredPackages: string[];
}

export const DEFAULT_EXTERNAL_COMMAND = "python3 distributed_sales_system.py";
export const DEFAULT_REQUIRED_PACKAGES = ["@duckdb/node-api", "@duckdb/node-bindings"];

/** Datasets and scripts land beside the caller, not inside the package. */
export function projectRoot(): string {
  return path.resolve(process.env.SALESGEN_ROOT || process.cwd());
}

export function configFilePath(root?: string): string {
  return path.join(root || projectRoot(), "salesgen.yml");
}

type YamlValue = string | number | YamlValue[] | { [key: string]: YamlValue };

function scalar(raw: string): string | number {
  const val = raw.trim().replace(/^["']|["']$/g, "");
  return /^\d+$/.test(val) ? parseInt(val, 10) : val;
}

/**
 * Lightweight YAML reader for the subset salesgen.yml uses:
 * top-level sections, nested `key: value` pairs, and `- item` lists
 * either directly under a section or under a nested key.
 */
export function parseSimpleYaml(raw: string): Record<string, YamlValue> {
  const result: Record<string, YamlValue> = {};
  let section: Record<string, YamlValue> | null = null;
  let sectionKey: string | null = null;
  let nestedKey: string | null = null;

  for (const line of raw.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const indented = line.startsWith(" ") || line.startsWith("\t");

    const keyMatch = trimmed.match(/^([a-zA-Z_][a-zA-Z0-9_]*):\s*(.*)$/);

    if (!indented && keyMatch) {
      const [, key, val] = keyMatch;
      nestedKey = null;
      if (val.trim()) {
        result[key] = scalar(val);
        section = null;
        sectionKey = null;
      } else {
        section = {};
        result[key] = section;
        sectionKey = key;
      }
      continue;
    }

    if (!sectionKey) continue;

    if (trimmed.startsWith("- ")) {
      const item = scalar(trimmed.slice(2));
      if (nestedKey && section) {
        const list = section[nestedKey];
        section[nestedKey] = Array.isArray(list) ? [...list, item] : [item];
      } else {
        const list = result[sectionKey];
        result[sectionKey] = Array.isArray(list) ? [...list, item] : [item];
        section = null;
      }
      continue;
    }

    if (keyMatch && section) {
      const [, key, val] = keyMatch;
      if (val.trim()) {
        section[key] = scalar(val);
        nestedKey = null;
      } else {
        section[key] = [];
        nestedKey = key;
      }
    }
  }

  return result;
}

function asRecord(value: YamlValue | undefined): Record<string, YamlValue> {
  return value !== undefined && typeof value === "object" && !Array.isArray(value) ? value : {};
}

function asString(value: YamlValue | undefined): string | undefined {
  return typeof value === "string" ? value : typeof value === "number" ? String(value) : undefined;
}

function asNumber(value: YamlValue | undefined): number | undefined {
  return typeof value === "number" ? value : undefined;
}

function asStringList(value: YamlValue | undefined): string[] | undefined {
  return Array.isArray(value) ? value.map(String) : undefined;
}

/** Shape the parsed YAML into a typed config, dropping unknown or mistyped keys. */
export function toConfig(parsed: Record<string, YamlValue>): SalesgenConfig {
  const paths = asRecord(parsed.paths);
  const generator = asRecord(parsed.generator);
  const demo = asRecord(parsed.demo);
  const check = asRecord(parsed.check);
  return {
    paths: {
      data_folder: asString(paths.data_folder),
      scripts_dir: asString(paths.scripts_dir),
      log_file: asString(paths.log_file),
    },
    generator: {
      batch_size: asNumber(generator.batch_size),
      seed: asNumber(generator.seed),
    },
    demo: {
      workers: asNumber(demo.workers),
      server_delay_ms: asNumber(demo.server_delay_ms),
      worker_stagger_ms: asNumber(demo.worker_stagger_ms),
      command: asString(demo.command),
    },
    check: {
      packages: asStringList(check.packages),
    },
  };
}

/**
 * Load and parse salesgen.yml. Returns null if the file doesn't exist.
 */
export async function loadConfig(root?: string): Promise<SalesgenConfig | null> {
  let raw: string;
  try {
    raw = await fs.readFile(configFilePath(root), "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }
  return toConfig(parseSimpleYaml(raw));
}

function envInt(name: string, env: NodeJS.ProcessEnv): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === "") return undefined;
  const num = parseInt(raw, 10);
  if (Number.isNaN(num)) throw new Error(`${name} must be an integer (got "${raw}")`);
  return num;
}

/** Merge env vars, config file and defaults into concrete settings. */
export function resolveSettings(
  config: SalesgenConfig | null,
  root: string,
  env: NodeJS.ProcessEnv = process.env
): Settings {
  const cfg = config ?? {};
  const fromRoot = (p: string) => path.resolve(root, p);
  const command = env.SALESGEN_EXTERNAL_CMD || cfg.demo?.command || DEFAULT_EXTERNAL_COMMAND;

  return {
    root,
    dataFolder: fromRoot(env.SALESGEN_DATA_FOLDER || cfg.paths?.data_folder || "."),
    scriptsDir: fromRoot(env.SALESGEN_SCRIPTS_DIR || cfg.paths?.scripts_dir || "."),
    logFile: fromRoot(env.SALESGEN_LOG_FILE || cfg.paths?.log_file || ".salesgen/salesgen.log"),
    batchSize: cfg.generator?.batch_size ?? DEFAULT_BATCH_SIZE,
    seed: cfg.generator?.seed ?? DEFAULT_SEED,
    workers: envInt("SALESGEN_WORKERS", env) ?? cfg.demo?.workers ?? 3,
    serverDelayMs: cfg.demo?.server_delay_ms ?? 3000,
    workerStaggerMs: cfg.demo?.worker_stagger_ms ?? 1000,
    externalCommand: command.split(/\s+/).filter(Boolean),
    cliCommand: env.SALESGEN_CLI || "salesgen",
    requiredPackages: cfg.check?.packages ?? DEFAULT_REQUIRED_PACKAGES,
  };
}

export async function loadSettings(root: string = projectRoot()): Promise<Settings> {
  return resolveSettings(await loadConfig(root), root);
}
