/**
 * HTTP transport type definitions
 */

import type { JsonValue } from "@/types/json";

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD";

export type QueryParams = Record<
  string,
  string | number | boolean | Array<string | number | boolean>
>;

/**
 * One logical API call. Treated as immutable once submitted.
 */
export interface ApiRequest {
  method: HttpMethod;
  /** Path relative to the API base URL (e.g. "/rest/api/3/issue/PROJ-1") */
  target: string;
  query?: QueryParams;
  json?: JsonValue;
  headers?: Record<string, string>;
  /** Sent as the Idempotency-Key header so retries do not duplicate effects */
  idempotencyKey?: string;
  timeoutMs?: number;
}

export interface ApiResponse {
  status: number;
  body: unknown;
  headers?: Headers;
}

/**
 * Performs a single attempt. Throws HttpError on non-2xx,
 * AbortError on timeout and TypeError on network failures.
 */
export type HttpSender = (request: ApiRequest) => Promise<ApiResponse>;

/**
 * Retry policy applied by the retrying transport
 */
export interface RetryPolicy {
  /** Maximum number of attempts (including the initial request) */
  maxAttempts: number;
  /** Base delay in ms for exponential backoff */
  baseDelayMs: number;
  /** Cap on a single computed backoff delay */
  maxDelayMs: number;
  /** Cap on a server-provided Retry-After hint */
  maxRetryAfterMs: number;
  /** Budget for the sum of all waits of one call */
  maxTotalWaitMs: number;
  retryableStatuses: readonly number[];
  retryNetworkErrors: boolean;
}

export interface HttpErrorDetails {
  status: number;
  statusText: string;
  url: string;
  bodySnippet?: string;
  headers?: Headers;
}

export interface FetchSenderOptions {
  baseUrl: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
}
