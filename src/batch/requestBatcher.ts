/**
 * Request batcher: fans a set of independent requests out through the
 * transport with a concurrency ceiling and collects one Outcome per request
 *
 * Partial-failure semantics: a failed request never cancels its siblings;
 * the caller always receives a complete, input-ordered result set.
 */

import type {
  ApiRequest,
  DispatchResult,
  Logger,
  Outcome,
  RetryPolicy,
} from "@/types";
import type { Transport } from "@/clients/http";
import { createLimiter } from "@/utils";
import { DEFAULT_BATCH_CONCURRENCY } from "@/constants";
import * as logger from "@/logger";

export type DispatchOptions = {
  /** Retry policy override applied to every request of this dispatch */
  policy?: Partial<RetryPolicy>;
  /** Called as each request completes (completion order, not input order) */
  onResult?: (result: DispatchResult, index: number) => void;
};

export type RequestBatcherDeps = {
  transport: Transport;
  defaultConcurrency?: number;
  logger?: Logger;
};

export class RequestBatcher {
  private readonly transport: Transport;
  private readonly defaultConcurrency: number;
  private readonly log: Logger;

  constructor(deps: RequestBatcherDeps) {
    this.transport = deps.transport;
    this.defaultConcurrency = deps.defaultConcurrency ?? DEFAULT_BATCH_CONCURRENCY;
    this.log = deps.logger ?? logger.rootLogger;
  }

  /**
   * Execute requests with at most `concurrencyLimit` in flight
   *
   * @returns Results correlated 1:1 with `requests`
   * @throws Only if `onResult` throws; the remaining requests still finish first
   */
  async dispatch(
    requests: readonly ApiRequest[],
    concurrencyLimit: number = this.defaultConcurrency,
    options: DispatchOptions = {},
  ): Promise<DispatchResult[]> {
    const limit = createLimiter(concurrencyLimit);
    const results: DispatchResult[] = new Array(requests.length);

    const settled = await Promise.allSettled(
      requests.map((request, index) =>
        limit(async () => {
          const outcome = await this.executeOne(request, options.policy);
          const result: DispatchResult = { request, outcome };
          results[index] = result;
          options.onResult?.(result, index);
        }),
      ),
    );

    const rejected = settled.find(
      (entry): entry is PromiseRejectedResult => entry.status === "rejected",
    );
    if (rejected) {
      throw rejected.reason;
    }

    const failed = results.filter((r) => !r.outcome.ok).length;
    this.log.debug("Dispatch complete", {
      requests: requests.length,
      succeeded: requests.length - failed,
      failed,
      concurrency: concurrencyLimit,
    });

    return results;
  }

  private async executeOne(
    request: ApiRequest,
    policy: Partial<RetryPolicy> | undefined,
  ): Promise<Outcome> {
    try {
      return await this.transport.execute(request, policy);
    } catch (err) {
      // Transports report remote faults as outcomes; anything thrown is a bug
      // in the transport or a rejected policy, recorded against this request
      // only. No attempt can be attributed to it.
      this.log.error("Transport threw instead of returning an outcome", {
        method: request.method,
        target: request.target,
        error: err instanceof Error ? err.message : String(err),
      });
      return {
        ok: false,
        kind: "unexpected",
        message: err instanceof Error ? err.message : String(err),
        attempts: 0,
        retryable: false,
      };
    }
  }
}
