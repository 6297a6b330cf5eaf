/**
 * Retry timing: exponential backoff with jitter, Retry-After parsing and
 * per-call policy resolution
 */

import type { RetryPolicy } from "@/types";
import {
  BACKOFF_JITTER_MIN_FACTOR,
  BACKOFF_JITTER_SPREAD,
  DEFAULT_RETRY_POLICY,
} from "@/constants";

/**
 * Merge a per-call override onto a base policy
 */
export function resolveRetryPolicy(
  base: RetryPolicy = DEFAULT_RETRY_POLICY,
  override?: Partial<RetryPolicy>,
): RetryPolicy {
  const policy: RetryPolicy = { ...base, ...override };
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new Error(`maxAttempts must be an integer >= 1. Received: ${policy.maxAttempts}`);
  }
  return policy;
}

/**
 * Parse Retry-After header value
 * Supports both delay-seconds (number) and HTTP-date formats
 * Returns delay in milliseconds, or null if invalid/missing
 */
export function parseRetryAfter(
  retryAfterHeader: string | null | undefined,
  nowMs: number = Date.now(),
): number | null {
  if (!retryAfterHeader) {
    return null;
  }

  const trimmed = retryAfterHeader.trim();

  if (/^\d+$/.test(trimmed)) {
    const seconds = Number.parseInt(trimmed, 10);
    return seconds > 0 ? seconds * 1000 : null;
  }

  const date = new Date(trimmed);
  if (!Number.isNaN(date.getTime())) {
    const delayMs = date.getTime() - nowMs;
    return delayMs > 0 ? delayMs : null;
  }

  return null;
}

/**
 * Compute exponential backoff delay with jitter
 * Formula: min(maxDelay, baseDelay * 2^(attempt-1)) * (0.5 + random)
 * so the wait lands within ±50% of the computed delay.
 */
export function computeBackoffDelay(
  attempt: number,
  policy: Pick<RetryPolicy, "baseDelayMs" | "maxDelayMs">,
  random: () => number = Math.random,
): number {
  const exponentialDelay = policy.baseDelayMs * Math.pow(2, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, policy.maxDelayMs);
  const r = Math.min(1, Math.max(0, random()));
  const jitter = BACKOFF_JITTER_MIN_FACTOR + r * BACKOFF_JITTER_SPREAD;
  return Math.floor(cappedDelay * jitter);
}

/**
 * Compute the wait before the next attempt
 * A Retry-After hint (clamped to maxRetryAfterMs) is a floor on the backoff.
 */
export function computeRetryDelay(
  attempt: number,
  policy: RetryPolicy,
  retryAfterMs: number | undefined,
  random: () => number = Math.random,
): number {
  const backoff = computeBackoffDelay(attempt, policy, random);
  if (retryAfterMs === undefined) {
    return backoff;
  }
  return Math.max(backoff, Math.min(retryAfterMs, policy.maxRetryAfterMs));
}
