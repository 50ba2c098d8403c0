import { classifyRemoteError } from "./errors";
import { RateLimiter } from "./rate-limiter";
import { consoleRetryReporter, retryCall, type RetryConfig, type RetryFailureReporter } from "./retry";

export type ServiceClass = "chat" | "image" | "video";

export interface RemoteGatewayOptions {
  limiters?: Partial<Record<ServiceClass, RateLimiter>>;
  retry?: RetryConfig;
  reporter?: RetryFailureReporter;
}

/**
 * Single path for every outbound generation call: each attempt waits for a
 * slot on the service's shared limiter, and failures go through the retry
 * policy.
 */
export class RemoteGateway {
  private readonly limiters: Partial<Record<ServiceClass, RateLimiter>>;
  private readonly retry: RetryConfig;
  private readonly reporter: RetryFailureReporter;
  private calls = 0;

  constructor(options: RemoteGatewayOptions = {}) {
    this.limiters = options.limiters ?? {};
    this.retry = options.retry ?? {};
    this.reporter = options.reporter ?? consoleRetryReporter;
  }

  /** Attempts made so far, successful or not. */
  get callCount(): number {
    return this.calls;
  }

  limiter(service: ServiceClass): RateLimiter | undefined {
    return this.limiters[service];
  }

  async call<U>(service: ServiceClass, label: string, fn: () => Promise<U>): Promise<U> {
    return this.callWith(service, label, () => fn(), undefined);
  }

  async callWith<T, U>(
    service: ServiceClass,
    label: string,
    fn: (params: T) => Promise<U>,
    params: T,
    onRetry?: (error: unknown, attempt: number, currentParams: T) => Promise<T | undefined> | T | undefined,
  ): Promise<U> {
    const limiter = this.limiters[service];
    return retryCall(
      async (current: T) => {
        if (limiter) {
          await limiter.acquire();
        }
        this.calls++;
        try {
          return await fn(current);
        } catch (error) {
          throw classifyRemoteError(error);
        }
      },
      params,
      { ...this.retry, label, reporter: this.reporter, onRetry },
    );
  }
}
