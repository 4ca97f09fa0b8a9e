/**
 * Retry Policy Tests
 */

import { describe, it, expect, vi } from "vitest";
import { backoffDelay, withRetry, type RetryPolicy } from "../../src/api/market-data/retry.js";
import { ProviderUnavailableError } from "../../src/utils/errors.js";

const POLICY: RetryPolicy = { maxAttempts: 5, baseDelayMs: 1000, rateLimitMultiplier: 1.5 };

const transient = () => new ProviderUnavailableError("HTTP 503", { status: 503 });
const rateLimited = () => new ProviderUnavailableError("HTTP 429", { status: 429, rateLimited: true });

describe("backoffDelay", () => {
  it("should grow linearly with the attempt number", () => {
    expect(backoffDelay(POLICY, 1, false)).toBe(1000);
    expect(backoffDelay(POLICY, 3, false)).toBe(3000);
  });

  it("should stretch rate-limit delays by the multiplier", () => {
    expect(backoffDelay(POLICY, 1, true)).toBe(1500);
    expect(backoffDelay(POLICY, 2, true)).toBe(3000);
  });
});

describe("withRetry", () => {
  it("should return the first successful result", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(transient())
      .mockRejectedValueOnce(rateLimited())
      .mockResolvedValueOnce("ok");

    await expect(withRetry(fn, POLICY, { sleep })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map((c) => c[0])).toEqual([1000, 3000]);
  });

  it("should pass the attempt number to the call", async () => {
    const seen: number[] = [];
    await withRetry(
      async (attempt) => {
        seen.push(attempt);
        if (attempt < 3) throw transient();
        return attempt;
      },
      POLICY,
      { sleep: async () => {} }
    );
    expect(seen).toEqual([1, 2, 3]);
  });

  it("should give up after maxAttempts and rethrow the last error", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const fn = vi.fn(async () => {
      throw transient();
    });

    await expect(withRetry(fn, POLICY, { sleep })).rejects.toBeInstanceOf(ProviderUnavailableError);
    expect(fn).toHaveBeenCalledTimes(5);
    expect(sleep).toHaveBeenCalledTimes(4);
  });

  it("should not retry errors that are not transient", async () => {
    const fn = vi.fn(async () => {
      throw new TypeError("bad payload");
    });

    await expect(withRetry(fn, POLICY, { sleep: async () => {} })).rejects.toThrow("bad payload");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("should not start when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn(async () => "never");

    await expect(withRetry(fn, POLICY, { signal: controller.signal })).rejects.toMatchObject({
      name: "AbortError",
    });
    expect(fn).not.toHaveBeenCalled();
  });

  it("should treat maxAttempts below 1 as a single attempt", async () => {
    const fn = vi.fn(async () => {
      throw transient();
    });

    await expect(withRetry(fn, { ...POLICY, maxAttempts: 0 }, { sleep: async () => {} })).rejects.toBeInstanceOf(
      ProviderUnavailableError
    );
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
