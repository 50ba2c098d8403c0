import type { TaskId, TaskState } from "./types";

const EVENT_HISTORY_LIMIT = 2_000;

export type RunEventLevel = "info" | "error";
export type RunStatus = "running" | "completed" | "failed" | "interrupted";

export type RunEvent =
  | { id: number; type: "task_state"; timestamp: string; payload: { taskId: TaskId; state: TaskState; cached?: boolean; error?: string } }
  | { id: number; type: "log"; timestamp: string; payload: { level: RunEventLevel; message: string } }
  | { id: number; type: "run_status"; timestamp: string; payload: { status: RunStatus; error?: string } };

export type RunEventListener = (event: RunEvent) => void;

/** Bounded, in-memory history of what happened during a run. */
export class RunEventLog {
  private readonly history: RunEvent[] = [];
  private readonly listeners = new Set<RunEventListener>();
  private sequence = 0;

  subscribe(listener: RunEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Events with an id greater than `afterId`, oldest first. */
  events(afterId?: number): RunEvent[] {
    return afterId === undefined ? [...this.history] : this.history.filter((e) => e.id > afterId);
  }

  emitTaskState(taskId: TaskId, state: TaskState, extra: { cached?: boolean; error?: string } = {}): void {
    this.push({ ...this.stamp(), type: "task_state", payload: { taskId, state, ...extra } });
  }

  emitLog(message: string, level: RunEventLevel = "info"): void {
    this.push({ ...this.stamp(), type: "log", payload: { level, message } });
  }

  emitRunStatus(status: RunStatus, error?: string): void {
    this.push({ ...this.stamp(), type: "run_status", payload: { status, ...(error ? { error } : {}) } });
    const suffix = error ? `: ${error}` : "";
    this.emitLog(`Run status changed to ${status}${suffix}`, status === "failed" ? "error" : "info");
  }

  private stamp(): { id: number; timestamp: string } {
    return { id: ++this.sequence, timestamp: new Date().toISOString() };
  }

  private push(event: RunEvent): void {
    this.history.push(event);
    if (this.history.length > EVENT_HISTORY_LIMIT) {
      this.history.splice(0, this.history.length - EVENT_HISTORY_LIMIT);
    }
    for (const listener of [...this.listeners]) {
      listener(event);
    }
  }
}
