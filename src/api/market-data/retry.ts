/**
 * Bounded retry with linear backoff for provider calls.
 *
 * Delay before attempt n+1 is n × baseDelayMs, stretched by
 * rateLimitMultiplier when the provider answered with its rate-limit status.
 * Only ProviderUnavailableError is retried.
 */

import { setTimeout as sleepMs } from "node:timers/promises";
import { isProviderUnavailable } from "../../utils/errors.js";
import { componentLogger } from "../../utils/logger.js";

const log = componentLogger("retry");

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  rateLimitMultiplier: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  baseDelayMs: 1_000,
  rateLimitMultiplier: 1.5,
};

export interface RetryOptions {
  /** Label used in log lines */
  label?: string;
  signal?: AbortSignal;
  /** Injected in tests to skip real waiting */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/** Delay in ms after a failed attempt (1-based) */
export function backoffDelay(policy: RetryPolicy, attempt: number, rateLimited: boolean): number {
  const base = attempt * policy.baseDelayMs;
  return rateLimited ? base * policy.rateLimitMultiplier : base;
}

async function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  await sleepMs(ms, undefined, { signal });
}

/**
 * Run `fn` until it succeeds or the attempt budget is spent.
 * The last error is rethrown unchanged.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  options: RetryOptions = {}
): Promise<T> {
  const { label = "provider call", signal, sleep = defaultSleep } = options;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    signal?.throwIfAborted();
    try {
      return await fn(attempt);
    } catch (err) {
      if (!isProviderUnavailable(err) || attempt >= maxAttempts) {
        throw err;
      }
      const delay = backoffDelay(policy, attempt, err.rateLimited);
      log.debug(`${label} failed (attempt ${attempt}/${maxAttempts}), retrying in ${delay}ms`, {
        error: err.message,
        rateLimited: err.rateLimited,
      });
      await sleep(delay, signal);
    }
  }
}
