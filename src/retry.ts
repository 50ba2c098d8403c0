import { extractErrorMessage, isRetryable } from "./errors";

/**
 * Configuration for retrying remote calls.
 * @property maxAttempts - Total attempts, including the first call.
 * @property initialDelayMs - Delay before the second attempt.
 * @property backoffFactor - Multiplier applied per further attempt.
 * @property maxDelayMs - Upper bound for a single delay.
 */
export type RetryConfig = {
  maxAttempts?: number;
  initialDelayMs?: number;
  backoffFactor?: number;
  maxDelayMs?: number;
};

export const defaultRetryConfig: Required<RetryConfig> = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  backoffFactor: 2,
  maxDelayMs: 30_000,
};

export interface RetryFailure {
  label: string;
  attempt: number;
  maxAttempts: number;
  error: unknown;
  willRetry: boolean;
  delayMs: number;
}

export type RetryFailureReporter = (failure: RetryFailure) => void;

export const consoleRetryReporter: RetryFailureReporter = (failure) => {
  const { label, attempt, maxAttempts, error, willRetry, delayMs } = failure;
  const suffix = willRetry ? `Retrying in ${delayMs}ms...` : "Giving up.";
  console.warn(`[retry] ${label}: attempt ${attempt}/${maxAttempts} failed: ${extractErrorMessage(error)}. ${suffix}`);
  if (error instanceof Error && error.stack) {
    console.warn(`[retry] ${label}: ${error.stack.split("\n").slice(1, 4).join("\n")}`);
  }
};

export type RetryOptions<T> = RetryConfig & {
  label: string;
  reporter?: RetryFailureReporter;
  /** Returns revised params for the next attempt, or nothing to reuse the current ones. */
  onRetry?: (error: unknown, attempt: number, currentParams: T) => Promise<T | undefined> | T | undefined;
};

export function backoffDelay(attempt: number, config: RetryConfig = {}): number {
  const initialDelayMs = config.initialDelayMs ?? defaultRetryConfig.initialDelayMs;
  const backoffFactor = config.backoffFactor ?? defaultRetryConfig.backoffFactor;
  const maxDelayMs = config.maxDelayMs ?? defaultRetryConfig.maxDelayMs;
  return Math.min(initialDelayMs * Math.pow(backoffFactor, attempt - 1), maxDelayMs);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Calls `call(params)` until it succeeds or attempts run out. Every failed
 * attempt goes to the reporter. Validation failures are retried like
 * transient ones; errors marked non-retryable are rethrown at once.
 */
export async function retryCall<T, U>(
  call: (params: T) => Promise<U>,
  initialParams: T,
  options: RetryOptions<T>,
): Promise<U> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? defaultRetryConfig.maxAttempts);
  const reporter = options.reporter ?? consoleRetryReporter;
  let params = initialParams;

  for (let attempt = 1; ; attempt++) {
    try {
      return await call(params);
    } catch (error) {
      const willRetry = attempt < maxAttempts && isRetryable(error);
      const delayMs = willRetry ? backoffDelay(attempt, options) : 0;
      reporter({ label: options.label, attempt, maxAttempts, error, willRetry, delayMs });
      if (!willRetry) {
        throw error;
      }
      if (options.onRetry) {
        const revised = await options.onRetry(error, attempt, params);
        if (revised !== undefined) {
          params = revised;
        }
      }
      if (delayMs > 0) {
        await sleep(delayMs);
      }
    }
  }
}

export async function withRetry<U>(
  operation: () => Promise<U>,
  options: Omit<RetryOptions<undefined>, "onRetry">,
): Promise<U> {
  return retryCall(() => operation(), undefined, options);
}
