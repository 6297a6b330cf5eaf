/**
 * Remote error classification
 *
 * Maps whatever a sender threw onto the transient/permanent taxonomy:
 * - rate limits, timeouts, retryable 5xx and network failures are transient
 * - validation, auth, not-found, conflict and everything else are permanent
 */

import type { PermanentFailureKind, RetryPolicy } from "@/types";
import {
  PermanentRemoteError,
  TransientRemoteError,
  type RemoteError,
} from "@/errors";
import { HttpError } from "./httpError";
import { parseRetryAfter } from "./backoff";

function permanentKindForStatus(status: number): PermanentFailureKind {
  switch (status) {
    case 400:
    case 422:
      return "validation";
    case 401:
      return "unauthorized";
    case 403:
      return "forbidden";
    case 404:
      return "not_found";
    case 409:
      return "conflict";
    default:
      return status >= 500 ? "server_error" : "client_error";
  }
}

function classifyHttpError(
  error: HttpError,
  policy: Pick<RetryPolicy, "retryableStatuses">,
  nowMs: number,
): RemoteError {
  const { status } = error;

  if (!policy.retryableStatuses.includes(status)) {
    return new PermanentRemoteError({
      kind: permanentKindForStatus(status),
      message: error.message,
      status,
      cause: error,
    });
  }

  const retryAfterMs = parseRetryAfter(error.retryAfter, nowMs) ?? undefined;

  const kind = status === 429 ? "rate_limited" : status === 408 ? "timeout" : "server_error";
  return new TransientRemoteError({
    kind,
    message: error.message,
    status,
    retryAfterMs,
    cause: error,
  });
}

/**
 * Classify an error thrown by one send attempt
 */
export function classifyRemoteError(
  error: unknown,
  policy: Pick<RetryPolicy, "retryableStatuses" | "retryNetworkErrors">,
  nowMs: number = Date.now(),
): RemoteError {
  if (error instanceof TransientRemoteError || error instanceof PermanentRemoteError) {
    return error;
  }

  if (error instanceof HttpError) {
    return classifyHttpError(error, policy, nowMs);
  }

  if (error instanceof Error && policy.retryNetworkErrors) {
    // AbortError: our timeout fired; TypeError: fetch failed before a response
    if (error.name === "AbortError" || error.name === "TimeoutError") {
      return new TransientRemoteError({ kind: "timeout", message: error.message, cause: error });
    }
    if (error.name === "TypeError") {
      return new TransientRemoteError({ kind: "network", message: error.message, cause: error });
    }
  }

  return new PermanentRemoteError({
    kind: "unexpected",
    message: error instanceof Error ? error.message : String(error),
    cause: error,
  });
}
