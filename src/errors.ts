import { ApiError as GenAIApiError } from "@google/genai";
import type { ShotOutput, TaskId, TaskOutcome } from "./types";

export class FrameChainError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network failures, timeouts, 429s and 5xx responses from a generator. */
export class TransientRemoteError extends FrameChainError {
  constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** A generator answered, but the answer is unusable (no image, bad JSON, unknown camera). */
export class ValidationError extends FrameChainError {}

/** Cache miss. Callers treat it as control flow. */
export class NotFoundError extends FrameChainError {
  constructor(readonly key: string) {
    super(`No cache entry for ${key}`);
  }
}

/** Disk or configuration failure. Never retried; aborts the run. */
export class FatalIOError extends FrameChainError {}

export class DependencyFailedError extends FrameChainError {
  constructor(readonly taskId: TaskId, readonly prerequisiteId: TaskId, options?: { cause?: unknown }) {
    super(`Task ${taskId} skipped: prerequisite ${prerequisiteId} failed`, options);
  }
}

export class RateLimitExceededError extends FrameChainError {}

/** Raised for a task that had not started, or a remote job abandoned mid-poll. */
export class RunInterruptedError extends FrameChainError {
  constructor(readonly subject: string, detail = "not started") {
    super(`${subject} ${detail}: run interrupted`);
  }
}

export class CameraTreeError extends FrameChainError {
  constructor(readonly violations: string[]) {
    super(`Invalid camera tree:\n  - ${violations.join("\n  - ")}`);
  }
}

export class InvalidPlanError extends FrameChainError {}

export interface TaskFailure {
  taskId: TaskId;
  error: string;
  errorName: string;
}

/** Carries what the run did finish, so callers can still report it. */
export class RunFailedError extends FrameChainError {
  constructor(
    readonly failures: TaskFailure[],
    readonly outcomes: TaskOutcome[] = [],
    readonly shots: ShotOutput[] = [],
  ) {
    const lines = failures.map((f) => `${f.taskId}: ${f.error}`);
    super(`${failures.length} task(s) failed:\n  ${lines.join("\n  ")}`);
  }
}

const NON_RETRYABLE: ReadonlyArray<new (...args: never[]) => Error> = [
  FatalIOError,
  DependencyFailedError,
  RunInterruptedError,
  RateLimitExceededError,
];

export function isRetryable(error: unknown): boolean {
  return !NON_RETRYABLE.some((cls) => error instanceof cls);
}

function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Maps provider errors onto the taxonomy. Anything unrecognized is returned
 * as-is; the retry policy still treats it as retryable.
 */
export function classifyRemoteError(error: unknown): unknown {
  if (error instanceof FrameChainError) {
    return error;
  }
  if (error instanceof GenAIApiError) {
    if (isTransientStatus(error.status)) {
      return new TransientRemoteError(`API Error (Code ${error.status}): ${error.message}`, error.status, { cause: error });
    }
    return error;
  }
  if (error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError")) {
    return new TransientRemoteError(error.message, undefined, { cause: error });
  }
  return error;
}

export function httpError(action: string, status: number, statusText: string): Error {
  const message = `Failed to ${action}: ${status} ${statusText}`;
  return isTransientStatus(status) ? new TransientRemoteError(message, status) : new Error(message);
}

export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.toString();
  }

  if (error && typeof error === "object") {
    if ("message" in error && typeof error.message === "string") {
      return error.message;
    }
    try {
      return JSON.stringify(error);
    } catch {
      return String(error);
    }
  }

  return String(error);
}

export function errorName(error: unknown): string {
  return error instanceof Error ? error.name : typeof error;
}
