import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import {
  runDemo,
  delay,
  spawnProcess,
  type ChildProcessHandle,
  type ProcessExit,
  type ProcessLauncher,
} from "../../src/lib/orchestrator.js";
import { TaskTracker } from "../../src/lib/tasks.js";

/** Stand-in for a child process; exits only when told to or killed. */
class FakeProcess implements ChildProcessHandle {
  readonly exited: Promise<ProcessExit>;
  killedWith: NodeJS.Signals | null = null;
  private running = true;
  private resolveExit: (exit: ProcessExit) => void = () => {};

  constructor(readonly pid: number, readonly command: string, readonly args: string[]) {
    this.exited = new Promise((resolve) => {
      this.resolveExit = resolve;
    });
  }

  isRunning(): boolean {
    return this.running;
  }

  kill(signal: NodeJS.Signals = "SIGTERM"): void {
    this.killedWith = signal;
    this.exit(null, signal);
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (!this.running) return;
    this.running = false;
    this.resolveExit({ code, signal });
  }
}

function fakeLauncher(): { launch: ProcessLauncher; launched: FakeProcess[] } {
  const launched: FakeProcess[] = [];
  const launch: ProcessLauncher = (command, args) => {
    const proc = new FakeProcess(1000 + launched.length, command, args);
    launched.push(proc);
    return proc;
  };
  return { launch, launched };
}

const COMMAND = ["python3", "distributed_sales_system.py"];
const noSleep = async () => {};

describe("runDemo", () => {
  let tmpDir: string;
  let csvFile: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "salesgen-demo-"));
    csvFile = path.join(tmpDir, "sales.csv");
    fs.writeFileSync(csvFile, "TransactionID\n1\n");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("starts the server, then the workers, and stops workers once the server exits", async () => {
    const { launch, launched } = fakeLauncher();
    setTimeout(() => launched[0].exit(0), 0);

    const result = await runDemo({ csvFile, command: COMMAND, launch, sleep: noSleep });

    expect(launched.map((p) => [p.command, ...p.args])).toEqual([
      ["python3", "distributed_sales_system.py", "server", csvFile],
      ["python3", "distributed_sales_system.py", "worker"],
      ["python3", "distributed_sales_system.py", "worker"],
      ["python3", "distributed_sales_system.py", "worker"],
    ]);
    expect(result.interrupted).toBe(false);
    expect(result.generated).toBe(false);
    expect(result.serverExit).toEqual({ code: 0, signal: null });
    expect(launched[0].killedWith).toBeNull();
    expect(launched.slice(1).map((p) => p.killedWith)).toEqual(["SIGTERM", "SIGTERM", "SIGTERM"]);

    expect(result.processes.map((p) => [p.name, p.status, p.message])).toEqual([
      ["server", "completed", "exited"],
      ["worker-1", "completed", "terminated"],
      ["worker-2", "completed", "terminated"],
      ["worker-3", "completed", "terminated"],
    ]);
    expect(result.processes[1].pid).toBe(1001);
  });

  it("waits the server delay once and the stagger delay after each worker", async () => {
    const { launch, launched } = fakeLauncher();
    const waits: number[] = [];
    setTimeout(() => launched[0].exit(0), 0);

    await runDemo({
      csvFile,
      command: COMMAND,
      workers: 2,
      serverDelayMs: 3000,
      workerStaggerMs: 1000,
      launch,
      sleep: async (ms) => {
        waits.push(ms);
      },
    });

    expect(waits).toEqual([3000, 1000, 1000]);
  });

  it("terminates everything when interrupted while waiting", async () => {
    const { launch, launched } = fakeLauncher();
    const controller = new AbortController();
    const messages: string[] = [];
    setTimeout(() => controller.abort(), 0);

    const result = await runDemo({
      csvFile,
      command: COMMAND,
      workers: 2,
      launch,
      sleep: noSleep,
      signal: controller.signal,
      report: (m) => messages.push(m),
    });

    expect(result.interrupted).toBe(true);
    expect(result.serverExit).toBeNull();
    expect(launched.map((p) => p.killedWith)).toEqual(["SIGTERM", "SIGTERM", "SIGTERM"]);
    expect(result.processes.every((p) => p.status === "completed" && p.message === "terminated")).toBe(true);
    expect(messages).toContain("\n4. Demo interrupted by user");
    expect(messages[messages.length - 1]).toBe("\n5. Cleaning up processes...");
  });

  it("launches nothing when interrupted before the server starts", async () => {
    const { launch, launched } = fakeLauncher();
    const controller = new AbortController();
    controller.abort();
    const messages: string[] = [];

    const result = await runDemo({
      csvFile,
      command: COMMAND,
      launch,
      sleep: noSleep,
      signal: controller.signal,
      report: (m) => messages.push(m),
    });

    expect(launched).toHaveLength(0);
    expect(result).toEqual({ csvFile, generated: false, interrupted: true, serverExit: null, processes: [] });
    expect(messages[messages.length - 1]).toBe("\n4. Demo interrupted by user");
  });

  it("generates a missing dataset but launches nothing once interrupted", async () => {
    const { launch, launched } = fakeLauncher();
    const controller = new AbortController();
    controller.abort();
    const missing = path.join(tmpDir, "late.csv");

    const result = await runDemo({
      csvFile: missing,
      command: COMMAND,
      datasetRows: 10,
      launch,
      sleep: noSleep,
      signal: controller.signal,
    });

    expect(launched).toHaveLength(0);
    expect(result.generated).toBe(true);
    expect(result.interrupted).toBe(true);
    expect(result.processes).toEqual([]);
  });

  it("stops launching workers once interrupted during the server delay", async () => {
    const { launch, launched } = fakeLauncher();
    const controller = new AbortController();

    const result = await runDemo({
      csvFile,
      command: COMMAND,
      launch,
      sleep: async () => {
        controller.abort();
      },
      signal: controller.signal,
    });

    expect(launched).toHaveLength(1);
    expect(result.interrupted).toBe(true);
    expect(launched[0].killedWith).toBe("SIGTERM");
  });

  it("leaves workers that already exited alone and records failures", async () => {
    const { launch, launched } = fakeLauncher();
    setTimeout(() => {
      launched[1].exit(1);
      launched[0].exit(0);
    }, 0);

    const result = await runDemo({ csvFile, command: COMMAND, workers: 2, launch, sleep: noSleep });

    expect(launched[1].killedWith).toBeNull();
    expect(launched[2].killedWith).toBe("SIGTERM");
    const worker1 = result.processes[1];
    expect(worker1.status).toBe("failed");
    expect(worker1.error).toBe("exited with code 1");
    expect(worker1.exitCode).toBe(1);
  });

  it("generates the dataset first when it is missing", async () => {
    const { launch, launched } = fakeLauncher();
    const missing = path.join(tmpDir, "fresh", "sales.csv");
    setTimeout(() => launched[0].exit(0), 0);

    const result = await runDemo({
      csvFile: missing,
      command: COMMAND,
      workers: 0,
      datasetRows: 50,
      launch,
      sleep: noSleep,
    });

    expect(result.generated).toBe(true);
    expect(fs.readFileSync(missing, "utf-8").trim().split("\n")).toHaveLength(51);
    expect(launched[0].args).toEqual(["distributed_sales_system.py", "server", missing]);
  });

  it("records lifecycle in the tracker it is given", async () => {
    const { launch, launched } = fakeLauncher();
    const tracker = new TaskTracker();
    setTimeout(() => launched[0].exit(0), 0);

    await runDemo({ csvFile, command: COMMAND, workers: 1, launch, sleep: noSleep, tracker });

    expect(tracker.getSummary()).toEqual({ total: 2, running: 0, completed: 2, failed: 0 });
  });

  it("rejects an empty external command", async () => {
    const { launch } = fakeLauncher();
    await expect(runDemo({ csvFile, command: [], launch, sleep: noSleep })).rejects.toThrow(
      "External command is empty"
    );
  });
});

describe("delay", () => {
  it("resolves early when the signal aborts", async () => {
    const controller = new AbortController();
    const pending = delay(60_000, controller.signal);
    controller.abort();
    await expect(pending).resolves.toBeUndefined();
  });

  it("resolves immediately for an already-aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(delay(60_000, controller.signal)).resolves.toBeUndefined();
  });
});

describe("spawnProcess", () => {
  it("resolves with the exit code", async () => {
    const child = spawnProcess(process.execPath, ["-e", "process.exit(3)"]);
    expect(child.pid).toBeTypeOf("number");
    await expect(child.exited).resolves.toEqual({ code: 3, signal: null });
    expect(child.isRunning()).toBe(false);
  });

  it("resolves with the signal after kill", async () => {
    const child = spawnProcess(process.execPath, ["-e", "setInterval(() => {}, 1000)"]);
    expect(child.isRunning()).toBe(true);
    child.kill();
    const exit = await child.exited;
    expect(exit.signal).toBe("SIGTERM");
    expect(exit.code).toBeNull();
    expect(child.isRunning()).toBe(false);
    expect(() => child.kill()).not.toThrow();
  });

  it("resolves with an error when the executable does not exist", async () => {
    const child = spawnProcess(path.join(os.tmpdir(), "salesgen-no-such-binary"), []);
    const exit = await child.exited;
    expect(exit.code).toBeNull();
    expect(exit.error).toContain("ENOENT");
    expect(child.isRunning()).toBe(false);
  });
});
