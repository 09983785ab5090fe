/**
 * Lifecycle bookkeeping for the processes a demo run launches.
 */

export type TaskStatus = "pending" | "running" | "completed" | "failed";

export interface Task {
  id: string;
  name: string;
  status: TaskStatus;
  pid?: number;
  startTime?: Date;
  endTime?: Date;
  exitCode?: number | null;
  signal?: string | null;
  message?: string;
  error?: string;
}

export interface TaskSummary {
  total: number;
  running: number;
  completed: number;
  failed: number;
}

export class TaskTracker {
  private tasks: Map<string, Task> = new Map();
  private taskCounter = 0;

  createTask(name: string): string {
    const id = `task_${++this.taskCounter}`;
    this.tasks.set(id, { id, name, status: "pending" });
    return id;
  }

  startTask(id: string, pid?: number, message?: string): void {
    const task = this.tasks.get(id);
    if (task) {
      task.status = "running";
      task.startTime = new Date();
      task.pid = pid;
      task.message = message;
    }
  }

  completeTask(id: string, message?: string): void {
    const task = this.tasks.get(id);
    if (task) {
      task.status = "completed";
      task.endTime = new Date();
      task.message = message;
    }
  }

  failTask(id: string, error: string): void {
    const task = this.tasks.get(id);
    if (task) {
      task.status = "failed";
      task.endTime = new Date();
      task.error = error;
    }
  }

  /** Record how the process ended without changing its status. */
  recordExit(id: string, exitCode: number | null, signal: string | null): void {
    const task = this.tasks.get(id);
    if (task) {
      task.exitCode = exitCode;
      task.signal = signal;
    }
  }

  getTask(id: string): Task | undefined {
    return this.tasks.get(id);
  }

  /** All tasks in creation order. */
  list(): Task[] {
    return [...this.tasks.values()];
  }

  getSummary(): TaskSummary {
    const all = this.list();
    return {
      total: all.length,
      running: all.filter((t) => t.status === "running").length,
      completed: all.filter((t) => t.status === "completed").length,
      failed: all.filter((t) => t.status === "failed").length,
    };
  }
}
