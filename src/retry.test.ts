import { describe, expect, it, vi } from "vitest";
import { FatalIOError, TransientRemoteError, ValidationError } from "./errors";
import { backoffDelay, retryCall, withRetry, type RetryFailure } from "./retry";

function collectingReporter(): { failures: RetryFailure[]; reporter: (failure: RetryFailure) => void } {
  const failures: RetryFailure[] = [];
  return { failures, reporter: (failure) => failures.push(failure) };
}

describe("retryCall", () => {
  it("should return the result on the first successful call", async () => {
    const call = vi.fn().mockResolvedValue("success");
    const { failures, reporter } = collectingReporter();

    const result = await retryCall(call, "params", { label: "test", reporter, initialDelayMs: 0 });

    expect(result).toBe("success");
    expect(call).toHaveBeenCalledTimes(1);
    expect(failures).toEqual([]);
  });

  it("should call a permanently failing operation at most maxAttempts times", async () => {
    const error = new TransientRemoteError("503 from upstream", 503);
    const call = vi.fn().mockRejectedValue(error);
    const { failures, reporter } = collectingReporter();

    await expect(retryCall(call, "params", { label: "image", reporter, maxAttempts: 3, initialDelayMs: 0 })).rejects.toBe(error);

    expect(call).toHaveBeenCalledTimes(3);
    expect(failures.map((f) => [f.attempt, f.willRetry])).toEqual([[1, true], [2, true], [3, false]]);
    expect(failures.every((f) => f.label === "image" && f.maxAttempts === 3 && f.error === error)).toBe(true);
  });

  it("should not retry fatal errors", async () => {
    const call = vi.fn().mockRejectedValue(new FatalIOError("disk full"));
    const { failures, reporter } = collectingReporter();

    await expect(retryCall(call, "params", { label: "save", reporter, initialDelayMs: 0 })).rejects.toBeInstanceOf(FatalIOError);

    expect(call).toHaveBeenCalledTimes(1);
    expect(failures).toHaveLength(1);
    expect(failures[0].willRetry).toBe(false);
  });

  // Malformed model output is retried like a network failure.
  it("should retry validation failures with revised params", async () => {
    const call = vi.fn()
      .mockRejectedValueOnce(new ValidationError("no image in response"))
      .mockResolvedValue("success");
    const onRetry = vi.fn().mockReturnValue("stricter prompt");

    const result = await retryCall(call, "prompt", { label: "image", reporter: () => undefined, initialDelayMs: 0, onRetry });

    expect(result).toBe("success");
    expect(call).toHaveBeenCalledTimes(2);
    expect(call).toHaveBeenLastCalledWith("stricter prompt");
    expect(onRetry).toHaveBeenCalledWith(expect.any(ValidationError), 1, "prompt");
  });

  it("should keep params when onRetry returns nothing", async () => {
    const call = vi.fn()
      .mockRejectedValueOnce(new Error("timeout"))
      .mockResolvedValue("success");

    await retryCall(call, "prompt", { label: "chat", reporter: () => undefined, initialDelayMs: 0, onRetry: () => undefined });

    expect(call).toHaveBeenLastCalledWith("prompt");
  });

  it("should wait out the backoff between attempts", async () => {
    vi.useFakeTimers();
    try {
      const call = vi.fn()
        .mockRejectedValueOnce(new Error("timeout"))
        .mockResolvedValue("success");

      const pending = withRetry(call, { label: "video", reporter: () => undefined, initialDelayMs: 1000 });
      await vi.advanceTimersByTimeAsync(999);
      expect(call).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1);
      await expect(pending).resolves.toBe("success");
      expect(call).toHaveBeenCalledTimes(2);
    } finally {
      vi.useRealTimers();
    }
  });
});

describe("backoffDelay", () => {
  it("should grow exponentially up to the cap", () => {
    expect(backoffDelay(1)).toBe(1000);
    expect(backoffDelay(2)).toBe(2000);
    expect(backoffDelay(3)).toBe(4000);
    expect(backoffDelay(6)).toBe(30_000);
    expect(backoffDelay(2, { initialDelayMs: 500, backoffFactor: 3 })).toBe(1500);
  });
});
