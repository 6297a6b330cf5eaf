/**
 * Retrying transport: executes one logical request, masking transient
 * remote failures from callers
 *
 * Retries on:
 * - HTTP 408/425/429 and retryable 5xx (429/503 honor Retry-After as a floor)
 * - Timeouts and network errors
 *
 * Returns immediately on permanent failures (validation, auth, not-found,
 * conflict). Never throws for remote faults: every result is an Outcome.
 */

import type {
  ApiRequest,
  FailureOutcome,
  HttpSender,
  Logger,
  Outcome,
  RetryPolicy,
} from "@/types";
import { TransientRemoteError, type RemoteError } from "@/errors";
import { DEFAULT_RETRY_POLICY } from "@/constants";
import { classifyRemoteError } from "./classifyRemoteError";
import { computeRetryDelay, resolveRetryPolicy } from "./backoff";
import * as logger from "@/logger";

/**
 * Anything able to execute a request into an Outcome
 */
export interface Transport {
  execute(request: ApiRequest, policy?: Partial<RetryPolicy>): Promise<Outcome>;
}

export type RetryingTransportDeps = {
  send: HttpSender;
  /** Process-wide default, overridable per call */
  policy?: RetryPolicy;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  now?: () => number;
};

/**
 * Sleep for the specified number of milliseconds
 */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function toFailure(error: RemoteError, attempts: number): FailureOutcome {
  const failure: FailureOutcome = {
    ok: false,
    kind: error.kind,
    message: error.message,
    attempts,
    retryable: error instanceof TransientRemoteError,
  };
  if (error.status !== undefined) {
    failure.status = error.status;
  }
  return failure;
}

export class RetryingTransport implements Transport {
  private readonly send: HttpSender;
  private readonly defaultPolicy: RetryPolicy;
  private readonly log: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly now: () => number;

  constructor(deps: RetryingTransportDeps) {
    this.send = deps.send;
    this.defaultPolicy = resolveRetryPolicy(deps.policy ?? DEFAULT_RETRY_POLICY);
    this.log = deps.logger ?? logger.rootLogger;
    this.sleep = deps.sleep ?? sleep;
    this.random = deps.random ?? Math.random;
    this.now = deps.now ?? Date.now;
  }

  get policy(): RetryPolicy {
    return this.defaultPolicy;
  }

  async execute(request: ApiRequest, override?: Partial<RetryPolicy>): Promise<Outcome> {
    const policy = resolveRetryPolicy(this.defaultPolicy, override);
    let waitedMs = 0;

    for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
      try {
        const response = await this.send(request);
        if (attempt > 1) {
          this.log.debug("HTTP request succeeded after retry", {
            method: request.method,
            target: request.target,
            attempt,
          });
        }
        return { ok: true, response, attempts: attempt };
      } catch (err) {
        const remoteError = classifyRemoteError(err, policy, this.now());

        if (!(remoteError instanceof TransientRemoteError)) {
          return toFailure(remoteError, attempt);
        }

        if (attempt >= policy.maxAttempts) {
          this.log.warn("HTTP request gave up after max attempts", {
            method: request.method,
            target: request.target,
            attempts: attempt,
            kind: remoteError.kind,
            status: remoteError.status ?? null,
          });
          return toFailure(remoteError, attempt);
        }

        const delayMs = computeRetryDelay(
          attempt,
          policy,
          remoteError.retryAfterMs,
          this.random,
        );

        if (waitedMs + delayMs > policy.maxTotalWaitMs) {
          this.log.warn("HTTP request gave up: retry wait budget exhausted", {
            method: request.method,
            target: request.target,
            attempts: attempt,
            waitedMs,
            nextDelayMs: delayMs,
            maxTotalWaitMs: policy.maxTotalWaitMs,
          });
          return toFailure(remoteError, attempt);
        }

        this.log.debug("Retrying HTTP request", {
          method: request.method,
          target: request.target,
          attempt,
          maxAttempts: policy.maxAttempts,
          delayMs,
          reason: remoteError.status !== undefined ? `status ${remoteError.status}` : remoteError.kind,
        });

        await this.sleep(delayMs);
        waitedMs += delayMs;
      }
    }

    // Unreachable: the loop returns on its last attempt
    throw new Error("retry loop exited without an outcome");
  }
}
