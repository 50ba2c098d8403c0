import { DependencyFailedError, InvalidPlanError } from "./errors";
import type { TaskId } from "./types";

export type SignalState = "pending" | "done" | "failed";

interface Waiter {
  resolve: (value: string) => void;
  reject: (error: unknown) => void;
}

/**
 * One-shot broadcast. Settles once; every current and future waiter sees the
 * same outcome. `state` can be read without waiting.
 */
export class CompletionSignal {
  private current: SignalState = "pending";
  private value: string | undefined;
  private failure: unknown;
  private waiters: Waiter[] = [];

  get state(): SignalState {
    return this.current;
  }

  isSet(): boolean {
    return this.current === "done";
  }

  /** Artifact path, once done. */
  get path(): string | undefined {
    return this.value;
  }

  get error(): unknown {
    return this.failure;
  }

  set(value: string): boolean {
    if (this.current !== "pending") {
      return false;
    }
    this.current = "done";
    this.value = value;
    for (const waiter of this.drain()) {
      waiter.resolve(value);
    }
    return true;
  }

  fail(error: unknown): boolean {
    if (this.current !== "pending") {
      return false;
    }
    this.current = "failed";
    this.failure = error;
    for (const waiter of this.drain()) {
      waiter.reject(error);
    }
    return true;
  }

  wait(): Promise<string> {
    if (this.current === "done" && this.value !== undefined) {
      return Promise.resolve(this.value);
    }
    if (this.current === "failed") {
      return Promise.reject(this.failure);
    }
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  private drain(): Waiter[] {
    const waiters = this.waiters;
    this.waiters = [];
    return waiters;
  }
}

/** Completion signals for every task of a run, keyed by task id. */
export class EventBoard {
  private readonly signals = new Map<TaskId, CompletionSignal>();

  constructor(ids: Iterable<TaskId>) {
    for (const id of ids) {
      this.signals.set(id, new CompletionSignal());
    }
  }

  get(id: TaskId): CompletionSignal {
    const signal = this.signals.get(id);
    if (!signal) {
      throw new InvalidPlanError(`No completion signal for task ${id}`);
    }
    return signal;
  }

  state(id: TaskId): SignalState {
    return this.get(id).state;
  }

  markDone(id: TaskId, path: string): void {
    this.get(id).set(path);
  }

  markFailed(id: TaskId, error: unknown): void {
    this.get(id).fail(error);
  }

  pathOf(id: TaskId): string {
    const signal = this.get(id);
    if (signal.path === undefined) {
      throw new InvalidPlanError(`Task ${id} has no artifact yet`);
    }
    return signal.path;
  }

  /**
   * Waits until every prerequisite is done. Rejects with
   * DependencyFailedError naming the first prerequisite seen failing.
   */
  async waitForAll(dependent: TaskId, prerequisites: readonly TaskId[]): Promise<void> {
    await Promise.all(
      prerequisites.map(async (id) => {
        try {
          await this.get(id).wait();
        } catch (error) {
          throw new DependencyFailedError(dependent, id, { cause: error });
        }
      }),
    );
  }
}
