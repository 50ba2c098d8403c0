import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { RateLimitExceededError } from "./errors";
import { RateLimiter } from "./rate-limiter";

describe("RateLimiter", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should never delay without quotas", async () => {
    const limiter = new RateLimiter("chat");

    await limiter.acquire();
    await limiter.acquire();

    expect(limiter.enabled).toBe(false);
    expect(limiter.recordedRequests).toEqual([]);
    expect(limiter.describe()).toBe("unlimited");
  });

  it("should spread N requests over at least ceil(N/M) one-minute windows", async () => {
    const limiter = new RateLimiter("image", { requestsPerMinute: 3 });
    const granted: number[] = [];

    const all = Promise.all(
      Array.from({ length: 7 }, () => limiter.acquire().then(() => granted.push(Date.now()))),
    );
    await vi.runAllTimersAsync();
    await all;

    expect(granted).toEqual([0, 20_000, 40_000, 60_000, 80_000, 100_000, 120_000]);
    const windows = new Set(granted.map((t) => Math.floor(t / 60_000)));
    expect(windows.size).toBeGreaterThanOrEqual(Math.ceil(7 / 3));
    for (const start of granted) {
      expect(granted.filter((t) => t >= start && t < start + 60_000).length).toBeLessThanOrEqual(3);
    }
  });

  it("should reject past the daily quota under the fail policy", async () => {
    const limiter = new RateLimiter("video", { requestsPerDay: 2, dailyQuotaPolicy: "fail" });

    await limiter.acquire();
    await limiter.acquire();

    await expect(limiter.acquire()).rejects.toBeInstanceOf(RateLimitExceededError);
    expect(limiter.recordedRequests).toHaveLength(2);
  });

  it("should wait for the oldest request to age out of the day under the wait policy", async () => {
    const limiter = new RateLimiter("video", { requestsPerDay: 1 });
    const granted: number[] = [];

    const all = Promise.all([
      limiter.acquire().then(() => granted.push(Date.now())),
      limiter.acquire().then(() => granted.push(Date.now())),
    ]);
    await vi.runAllTimersAsync();
    await all;

    expect(granted).toEqual([0, 86_400_000]);
  });

  it("should describe its quotas", () => {
    expect(new RateLimiter("image", { requestsPerMinute: 10, requestsPerDay: 500 }).describe()).toBe("10 req/min, 500 req/day");
  });
});
