import { describe, it, expect, vi } from "vitest";
import { retry, calculateDelay, type RetryPolicy } from "../src/utils/retry.js";
import { InvalidRequestError, RateLimitError, StatusError } from "../src/types/errors.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function unavailable(message = "unavailable"): StatusError {
  return new StatusError(message, { code: 14, code_name: "UNAVAILABLE" });
}

function rateLimited(retryAfter?: number): RateLimitError {
  return new RateLimitError("rate limited", {
    code: 8,
    code_name: "RESOURCE_EXHAUSTED",
    retry_after: retryAfter,
  });
}

/** No-jitter policy with a recorded, instant sleep. */
function fastPolicy(overrides?: Partial<RetryPolicy>) {
  const sleep = vi.fn(async (_ms: number) => {});
  const policy: Partial<RetryPolicy> = { baseDelay: 100, jitter: false, sleep, ...overrides };
  return { policy, sleep };
}

// ---------------------------------------------------------------------------
// calculateDelay
// ---------------------------------------------------------------------------

describe("calculateDelay", () => {
  const policy: RetryPolicy = {
    maxRetries: 5,
    baseDelay: 1000,
    maxDelay: 5000,
    backoffMultiplier: 2,
    jitter: false,
  };

  it("grows exponentially up to maxDelay", () => {
    expect([0, 1, 2, 3].map((attempt) => calculateDelay(attempt, policy))).toEqual([
      1000, 2000, 4000, 5000,
    ]);
  });

  it("keeps jittered delays within +/- 50%", () => {
    for (let i = 0; i < 20; i++) {
      const delay = calculateDelay(0, { ...policy, jitter: true });
      expect(delay).toBeGreaterThanOrEqual(500);
      expect(delay).toBeLessThan(1500);
    }
  });
});

// ---------------------------------------------------------------------------
// retry
// ---------------------------------------------------------------------------

describe("retry", () => {
  it("returns the first success without sleeping", async () => {
    const { policy, sleep } = fastPolicy();
    const fn = vi.fn(async () => "ok");
    await expect(retry(fn, policy)).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("retries retryable errors with backoff", async () => {
    const { policy, sleep } = fastPolicy();
    const fn = vi
      .fn<[], Promise<string>>()
      .mockRejectedValueOnce(unavailable())
      .mockRejectedValueOnce(unavailable())
      .mockResolvedValue("ok");

    await expect(retry(fn, policy)).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
  });

  it("gives up after maxRetries", async () => {
    const fn = vi.fn(async () => {
      throw unavailable("still down");
    });
    await expect(retry(fn, fastPolicy({ maxRetries: 2 }).policy)).rejects.toThrow("still down");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("does not retry non-retryable errors", async () => {
    const fn = vi.fn(async () => {
      throw new InvalidRequestError("bad");
    });
    await expect(retry(fn, fastPolicy().policy)).rejects.toBeInstanceOf(InvalidRequestError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("does not retry errors outside the hierarchy", async () => {
    const fn = vi.fn(async () => {
      throw new TypeError("oops");
    });
    await expect(retry(fn, fastPolicy().policy)).rejects.toBeInstanceOf(TypeError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("waits for the server's retry-after", async () => {
    const onRetry = vi.fn();
    const { policy, sleep } = fastPolicy({ onRetry });
    const fn = vi
      .fn<[], Promise<string>>()
      .mockRejectedValueOnce(rateLimited(2))
      .mockResolvedValue("ok");

    await expect(retry(fn, policy)).resolves.toBe("ok");
    expect(sleep).toHaveBeenCalledWith(2000);
    expect(onRetry).toHaveBeenCalledWith(expect.any(RateLimitError), 0, 2000);
  });

  it("rethrows when retry-after exceeds maxDelay", async () => {
    const { policy, sleep } = fastPolicy({ maxDelay: 10_000 });
    const fn = vi.fn(async () => {
      throw rateLimited(120);
    });
    await expect(retry(fn, policy)).rejects.toBeInstanceOf(RateLimitError);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });
});
