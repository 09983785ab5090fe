/**
 * Demo orchestration: starts the external server and workers as
 * independent OS processes and tears them down again.
 *
 * The external system is opaque: its output goes straight to our
 * terminal and nothing is read back. Start-up ordering relies on fixed
 * delays (server first, then staggered workers).
 *
 * Usage:
 *   const controller = new AbortController();
 *   process.once("SIGINT", () => controller.abort());
 *   const result = await runDemo({
 *     csvFile: "sales_data_1m.csv",
 *     command: ["python3", "distributed_sales_system.py"],
 *     signal: controller.signal,
 *   });
 */

import { spawn } from "node:child_process";
import { existsSync } from "node:fs";
import { generateSalesDataset, type GenerateOptions, type GenerateResult } from "./generator.js";
import { TaskTracker, type Task } from "./tasks.js";

export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  /** Set when the process could not be started at all. */
  error?: string;
}

export interface ChildProcessHandle {
  readonly pid: number | undefined;
  /** Resolves once the process has exited; never rejects. */
  readonly exited: Promise<ProcessExit>;
  isRunning(): boolean;
  kill(signal?: NodeJS.Signals): void;
}

export type ProcessLauncher = (command: string, args: string[]) => ChildProcessHandle;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface DemoOptions {
  csvFile: string;
  /** External executable followed by its fixed leading arguments. */
  command: readonly string[];
  workers?: number;
  serverDelayMs?: number;
  workerStaggerMs?: number;
  /** Rows to generate when `csvFile` does not exist yet. */
  datasetRows?: number;
  batchSize?: number;
  seed?: number;
  /** How long to wait for terminated processes to report their exit. */
  shutdownGraceMs?: number;
  signal?: AbortSignal;
  launch?: ProcessLauncher;
  sleep?: Sleep;
  generate?: (options: GenerateOptions) => GenerateResult;
  tracker?: TaskTracker;
  report?: (message: string) => void;
}

export interface DemoResult {
  csvFile: string;
  generated: boolean;
  interrupted: boolean;
  serverExit: ProcessExit | null;
  processes: Task[];
}

interface Launched {
  taskId: string;
  handle: ChildProcessHandle;
}

export const DEMO_DATASET_ROWS = 1_000_000;

/** Launch a child process that shares our stdio. */
export const spawnProcess: ProcessLauncher = (command, args) => {
  const child = spawn(command, args, { stdio: "inherit" });
  let running = true;

  const exited = new Promise<ProcessExit>((resolve) => {
    child.once("exit", (code, signal) => {
      running = false;
      resolve({ code, signal });
    });
    child.once("error", (err) => {
      running = false;
      resolve({ code: null, signal: null, error: err.message });
    });
  });

  return {
    pid: child.pid,
    exited,
    isRunning: () => running,
    kill: (signal = "SIGTERM") => {
      if (running) child.kill(signal);
    },
  };
};

/** Resolves after `ms`, or as soon as `signal` aborts. */
export const delay: Sleep = (ms, signal) =>
  new Promise((resolve) => {
    if (signal?.aborted) return resolve();
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });

function waitForExitOrAbort(
  exited: Promise<ProcessExit>,
  signal?: AbortSignal
): Promise<ProcessExit | "aborted"> {
  if (signal?.aborted) return Promise.resolve("aborted");
  if (!signal) return exited;
  return new Promise((resolve) => {
    const onAbort = () => resolve("aborted");
    signal.addEventListener("abort", onAbort, { once: true });
    void exited.then((exit) => {
      signal.removeEventListener("abort", onAbort);
      resolve(exit);
    });
  });
}

function describeExit(exit: ProcessExit): string {
  if (exit.error) return `failed to start: ${exit.error}`;
  if (exit.signal) return `killed by ${exit.signal}`;
  return `exited with code ${exit.code}`;
}

export async function runDemo(options: DemoOptions): Promise<DemoResult> {
  const {
    csvFile,
    command,
    workers = 3,
    serverDelayMs = 3000,
    workerStaggerMs = 1000,
    datasetRows = DEMO_DATASET_ROWS,
    shutdownGraceMs = 5000,
    signal,
    launch = spawnProcess,
    sleep = delay,
    generate = generateSalesDataset,
    tracker = new TaskTracker(),
    report = () => {},
  } = options;

  const [executable, ...leadingArgs] = command;
  if (!executable) throw new Error("External command is empty");
  if (!Number.isInteger(workers) || workers < 0) {
    throw new RangeError(`workers must be a non-negative integer (got ${workers})`);
  }

  let generated = false;
  if (!existsSync(csvFile)) {
    report(`Creating sample dataset: ${csvFile}`);
    generate({ rows: datasetRows, outputPath: csvFile, batchSize: options.batchSize, seed: options.seed });
    generated = true;
  }

  report(`Using dataset: ${csvFile}`);
  report(`Number of workers: ${workers}`);

  if (signal?.aborted) {
    report("\n4. Demo interrupted by user");
    return { csvFile, generated, interrupted: true, serverExit: null, processes: tracker.list() };
  }

  const terminated = new Set<string>();
  const settled: Promise<void>[] = [];

  const start = (name: string, args: string[]): Launched => {
    const id = tracker.createTask(name);
    const handle = launch(executable, [...leadingArgs, ...args]);
    tracker.startTask(id, handle.pid, [executable, ...leadingArgs, ...args].join(" "));
    settled.push(
      handle.exited.then((exit) => {
        tracker.recordExit(id, exit.code, exit.signal);
        if (terminated.has(id) && !exit.error) {
          tracker.completeTask(id, "terminated");
        } else if (exit.code === 0) {
          tracker.completeTask(id, "exited");
        } else {
          tracker.failTask(id, describeExit(exit));
        }
      })
    );
    return { taskId: id, handle };
  };

  const stop = ({ taskId, handle }: Launched) => {
    if (!handle.isRunning()) return;
    terminated.add(taskId);
    handle.kill("SIGTERM");
  };

  report("\n1. Starting server...");
  const server = start("server", ["server", csvFile]);
  const workerHandles: Launched[] = [];
  let interrupted = false;
  let serverExit: ProcessExit | null = null;

  try {
    await sleep(serverDelayMs, signal);

    if (!signal?.aborted) report(`\n2. Starting ${workers} workers...`);
    for (let i = 0; i < workers && !signal?.aborted; i++) {
      report(`  Starting worker ${i + 1}...`);
      workerHandles.push(start(`worker-${i + 1}`, ["worker"]));
      await sleep(workerStaggerMs, signal);
    }

    report(`\n3. Processing data with ${workerHandles.length} workers...`);
    report("   (Check the server output for detailed progress)");

    const outcome = await waitForExitOrAbort(server.handle.exited, signal);
    if (outcome === "aborted") {
      interrupted = true;
      report("\n4. Demo interrupted by user");
    } else {
      serverExit = outcome;
      report("\n4. Processing completed!");
    }
  } finally {
    report("\n5. Cleaning up processes...");
    workerHandles.forEach(stop);
    stop(server);
  }

  await settleWithin(settled, shutdownGraceMs);

  return { csvFile, generated, interrupted, serverExit, processes: tracker.list() };
}

/** Wait for every promise, but give up after `ms`. */
async function settleWithin(promises: Promise<void>[], ms: number): Promise<void> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<void>((resolve) => {
    timer = setTimeout(resolve, ms);
  });
  await Promise.race([Promise.all(promises), timeout]);
  clearTimeout(timer);
}
