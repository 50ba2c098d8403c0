import { RateLimitExceededError } from "./errors";
import { sleep } from "./retry";

const MINUTE_MS = 60_000;
const DAY_MS = 86_400_000;

export type DailyQuotaPolicy = "wait" | "fail";

export interface RateLimitConfig {
  requestsPerMinute?: number;
  requestsPerDay?: number;
  dailyQuotaPolicy?: DailyQuotaPolicy;
}

/**
 * Shared request budget for one class of remote service. Callers are served
 * one at a time in arrival order; each recorded request counts against a
 * rolling one-minute window and a rolling one-day window. With a per-minute
 * quota, consecutive requests are also spaced by at least 60s / rpm.
 */
export class RateLimiter {
  private readonly requestTimes: number[] = [];
  private readonly minDelayMs: number;
  private tail: Promise<void> = Promise.resolve();

  constructor(
    readonly name: string,
    private readonly config: RateLimitConfig = {},
  ) {
    const rpm = config.requestsPerMinute;
    this.minDelayMs = rpm && rpm > 0 ? MINUTE_MS / rpm : 0;
  }

  get enabled(): boolean {
    return Boolean(this.config.requestsPerMinute || this.config.requestsPerDay);
  }

  /** Requests recorded inside the rolling windows. */
  get recordedRequests(): readonly number[] {
    return this.requestTimes;
  }

  describe(): string {
    const limits: string[] = [];
    if (this.config.requestsPerMinute) limits.push(`${this.config.requestsPerMinute} req/min`);
    if (this.config.requestsPerDay) limits.push(`${this.config.requestsPerDay} req/day`);
    return limits.length > 0 ? limits.join(", ") : "unlimited";
  }

  /**
   * Resolves once a request may be sent. Only delays, unless the daily quota
   * is exhausted under the "fail" policy.
   */
  async acquire(): Promise<void> {
    if (!this.enabled) {
      return;
    }
    const turn = this.tail.then(() => this.reserve());
    this.tail = turn.then(() => undefined);
    const rejection = await turn;
    if (rejection) {
      throw rejection;
    }
  }

  private prune(now: number): void {
    const horizon = this.config.requestsPerDay ? DAY_MS : MINUTE_MS;
    while (this.requestTimes.length > 0 && now - this.requestTimes[0] >= horizon) {
      this.requestTimes.shift();
    }
  }

  private countWithin(now: number, windowMs: number): { count: number; oldest?: number } {
    const inWindow = this.requestTimes.filter((t) => now - t < windowMs);
    return { count: inWindow.length, oldest: inWindow[0] };
  }

  private async reserve(): Promise<RateLimitExceededError | undefined> {
    let now = Date.now();
    this.prune(now);

    const perDay = this.config.requestsPerDay;
    if (perDay && perDay > 0) {
      const { count, oldest } = this.countWithin(now, DAY_MS);
      if (count >= perDay && oldest !== undefined) {
        if (this.config.dailyQuotaPolicy === "fail") {
          return new RateLimitExceededError(`${this.name}: daily quota of ${perDay} requests exhausted`);
        }
        const waitMs = DAY_MS - (now - oldest);
        console.log(`[rate-limit] ${this.name}: daily limit reached (${perDay} requests/day). Waiting ${(waitMs / 3_600_000).toFixed(1)} hours...`);
        await sleep(waitMs);
        now = Date.now();
        this.prune(now);
      }
    }

    const perMinute = this.config.requestsPerMinute;
    if (perMinute && perMinute > 0) {
      const { count, oldest } = this.countWithin(now, MINUTE_MS);
      if (count >= perMinute && oldest !== undefined) {
        const waitMs = MINUTE_MS - (now - oldest);
        console.log(`[rate-limit] ${this.name}: limit reached (${perMinute} requests/min). Waiting ${(waitMs / 1000).toFixed(1)}s...`);
        await sleep(waitMs);
        now = Date.now();
        this.prune(now);
      }

      const last = this.requestTimes[this.requestTimes.length - 1];
      if (last !== undefined && now - last < this.minDelayMs) {
        await sleep(this.minDelayMs - (now - last));
        now = Date.now();
      }
    }

    this.requestTimes.push(now);
    return undefined;
  }
}
