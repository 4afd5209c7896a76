/**
 * Tests for the shared retry policy
 */
import { describe, it, expect, vi } from "vitest";
import { backoffDelay, isRetryable, withRetry, worstCaseDurationMs } from "../../services/shared/src/retry.js";
import {
  PersistenceError,
  StageResponseError,
  TransientNetworkError,
  ValidationError,
} from "../../services/shared/src/errors.js";

const policy = { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 250 };

describe("backoffDelay", () => {
  it("should double per attempt up to the cap", () => {
    expect(backoffDelay(policy, 1)).toBe(100);
    expect(backoffDelay(policy, 2)).toBe(200);
    expect(backoffDelay(policy, 3)).toBe(250);
  });
});

describe("worstCaseDurationMs", () => {
  it("should add every attempt timeout and every backoff", () => {
    expect(worstCaseDurationMs(policy, 1_000)).toBe(3 * 1_000 + 100 + 200);
    expect(worstCaseDurationMs({ maxAttempts: 5, baseDelayMs: 100, maxDelayMs: 250 }, 1_000)).toBe(
      5 * 1_000 + 100 + 200 + 250 + 250
    );
  });

  it("should be one timeout for a single attempt", () => {
    expect(worstCaseDurationMs({ ...policy, maxAttempts: 1 }, 30_000)).toBe(30_000);
  });
});

describe("isRetryable", () => {
  it("should retry transient network failures only", () => {
    expect(isRetryable(new TransientNetworkError("boom"))).toBe(true);
    expect(isRetryable(new StageResponseError("bad request", 400))).toBe(false);
    expect(isRetryable(new ValidationError("bad body"))).toBe(false);
    expect(isRetryable(new PersistenceError("db down"))).toBe(false);
  });

  it("should treat unknown errors as transient", () => {
    expect(isRetryable(new Error("socket hang up"))).toBe(true);
  });
});

describe("withRetry", () => {
  it("should return the first success without sleeping", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const result = await withRetry(async () => "ok", { ...policy, sleep });

    expect(result).toBe("ok");
    expect(sleep).not.toHaveBeenCalled();
  });

  it("should retry transient failures with backoff", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const onRetry = vi.fn();
    let calls = 0;

    const result = await withRetry(
      async (attempt) => {
        calls++;
        if (attempt < 3) throw new TransientNetworkError(`attempt ${attempt}`);
        return attempt;
      },
      { ...policy, sleep, onRetry }
    );

    expect(result).toBe(3);
    expect(calls).toBe(3);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls[0]?.[1]).toBe(1);
    expect(onRetry.mock.calls[0]?.[2]).toBe(100);
  });

  it("should rethrow the last error once attempts are exhausted", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    let calls = 0;

    await expect(
      withRetry(
        async (attempt) => {
          calls++;
          throw new TransientNetworkError(`attempt ${attempt}`);
        },
        { ...policy, sleep }
      )
    ).rejects.toThrow("attempt 3");
    expect(calls).toBe(3);
  });

  it("should not retry a non-retryable error", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    let calls = 0;

    await expect(
      withRetry(
        async () => {
          calls++;
          throw new StageResponseError("rejected", 422);
        },
        { ...policy, sleep }
      )
    ).rejects.toBeInstanceOf(StageResponseError);
    expect(calls).toBe(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("should make a single attempt when maxAttempts is 1", async () => {
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls++;
          throw new TransientNetworkError("down");
        },
        { ...policy, maxAttempts: 1 }
      )
    ).rejects.toThrow("down");
    expect(calls).toBe(1);
  });
});
