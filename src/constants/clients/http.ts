/**
 * HTTP transport constants: defaults and configuration
 */

import type { RetryPolicy } from "@/types";

/**
 * Default request timeout in milliseconds (30 seconds)
 */
export const DEFAULT_HTTP_TIMEOUT_MS = 30_000;

/**
 * Default headers for JSON requests
 */
export const DEFAULT_JSON_HEADERS: Record<string, string> = {
  "Content-Type": "application/json",
  Accept: "application/json",
};

export const IDEMPOTENCY_KEY_HEADER = "Idempotency-Key";

/**
 * Maximum length of error body snippet to include in error messages
 */
export const ERROR_BODY_SNIPPET_MAX_LENGTH = 200;

/**
 * Default maximum number of attempts (including initial request)
 */
export const DEFAULT_MAX_ATTEMPTS = 3;

/**
 * Base delay in milliseconds for exponential backoff
 * First retry: ~1s, second retry: ~2s (before jitter)
 */
export const DEFAULT_BASE_DELAY_MS = 1_000;

/**
 * Maximum delay in milliseconds for one computed backoff
 */
export const DEFAULT_MAX_DELAY_MS = 30_000;

/**
 * Maximum time in milliseconds to respect a Retry-After header
 */
export const DEFAULT_MAX_RETRY_AFTER_MS = 60_000;

/**
 * Budget for the sum of all waits spent on one logical request
 */
export const DEFAULT_MAX_TOTAL_WAIT_MS = 120_000;

/**
 * HTTP status codes that warrant a retry
 * - 408: Request Timeout
 * - 425: Too Early
 * - 429: Too Many Requests (rate limit)
 * - 500/502/503/504: Server errors (temporary issues)
 */
export const RETRYABLE_STATUS_CODES = [408, 425, 429, 500, 502, 503, 504];

/**
 * Jitter bounds: the computed delay is scaled by a factor in [min, max)
 */
export const BACKOFF_JITTER_MIN_FACTOR = 0.5;
export const BACKOFF_JITTER_SPREAD = 1.0;

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: DEFAULT_MAX_ATTEMPTS,
  baseDelayMs: DEFAULT_BASE_DELAY_MS,
  maxDelayMs: DEFAULT_MAX_DELAY_MS,
  maxRetryAfterMs: DEFAULT_MAX_RETRY_AFTER_MS,
  maxTotalWaitMs: DEFAULT_MAX_TOTAL_WAIT_MS,
  retryableStatuses: RETRYABLE_STATUS_CODES,
  retryNetworkErrors: true,
};
