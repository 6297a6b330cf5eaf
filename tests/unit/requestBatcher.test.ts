/**
 * Unit tests for RequestBatcher
 */

import { describe, it, expect } from "vitest";
import { RequestBatcher } from "@/batch";
import { RetryingTransport, type Transport } from "@/clients/http";
import type { ApiRequest, Logger, Outcome, RetryPolicy } from "@/types";

const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function requestsFor(count: number): ApiRequest[] {
  return Array.from({ length: count }, (_, i) => ({
    method: "PUT" as const,
    target: `/issue/A-${i + 1}`,
    json: { labels: ["bulk"] },
  }));
}

/**
 * Transport stub with random latency; tracks the in-flight high-water mark
 */
function createLatencyTransport(failTargets: Set<string> = new Set()) {
  let inFlight = 0;
  const stats = { maxInFlight: 0, calls: 0 };

  const transport: Transport = {
    async execute(request): Promise<Outcome> {
      stats.calls += 1;
      inFlight += 1;
      stats.maxInFlight = Math.max(stats.maxInFlight, inFlight);
      await delay(Math.floor(Math.random() * 8));
      inFlight -= 1;

      if (failTargets.has(request.target)) {
        return {
          ok: false,
          kind: "validation",
          message: `rejected ${request.target}`,
          attempts: 1,
          retryable: false,
          status: 400,
        };
      }
      return { ok: true, response: { status: 200, body: request.target }, attempts: 1 };
    },
  };

  return { transport, stats };
}

describe("RequestBatcher", () => {
  it("preserves input order under randomized latencies", async () => {
    for (let round = 0; round < 5; round++) {
      const { transport } = createLatencyTransport();
      const batcher = new RequestBatcher({ transport, logger: silentLogger });
      const requests = requestsFor(25);

      const results = await batcher.dispatch(requests, 4);

      expect(results).toHaveLength(requests.length);
      results.forEach((result, i) => {
        expect(result.request).toBe(requests[i]);
        expect(result.outcome.ok && result.outcome.response.body).toBe(requests[i].target);
      });
    }
  });

  it("never exceeds the concurrency limit", async () => {
    const { transport, stats } = createLatencyTransport();
    const batcher = new RequestBatcher({ transport, logger: silentLogger });

    await batcher.dispatch(requestsFor(30), 3);

    expect(stats.calls).toBe(30);
    expect(stats.maxInFlight).toBeLessThanOrEqual(3);
  });

  it("uses the default concurrency when no limit is given", async () => {
    const { transport, stats } = createLatencyTransport();
    const batcher = new RequestBatcher({ transport, defaultConcurrency: 2, logger: silentLogger });

    await batcher.dispatch(requestsFor(10));

    expect(stats.maxInFlight).toBeLessThanOrEqual(2);
  });

  it("does not short-circuit on failures", async () => {
    const { transport, stats } = createLatencyTransport(new Set(["/issue/A-2", "/issue/A-5"]));
    const batcher = new RequestBatcher({ transport, logger: silentLogger });

    const results = await batcher.dispatch(requestsFor(6), 2);

    expect(stats.calls).toBe(6);
    expect(results.map((r) => r.outcome.ok)).toEqual([true, false, true, true, false, true]);
  });

  it("turns a thrown transport error into an unexpected failure", async () => {
    const transport: Transport = {
      async execute(request) {
        if (request.target === "/issue/A-2") {
          throw new Error("transport bug");
        }
        return { ok: true, response: { status: 200, body: null }, attempts: 1 };
      },
    };
    const batcher = new RequestBatcher({ transport, logger: silentLogger });

    const results = await batcher.dispatch(requestsFor(3), 2);

    expect(results[0].outcome.ok).toBe(true);
    expect(results[1].outcome).toEqual({
      ok: false,
      kind: "unexpected",
      message: "transport bug",
      attempts: 0,
      retryable: false,
    });
    expect(results[2].outcome.ok).toBe(true);
  });

  it("counts no attempts when the per-call policy is rejected before sending", async () => {
    let sent = 0;
    const transport = new RetryingTransport({
      send: async () => {
        sent += 1;
        return { status: 204, body: undefined };
      },
      logger: silentLogger,
      sleep: async () => {},
    });
    const batcher = new RequestBatcher({ transport, logger: silentLogger });

    const results = await batcher.dispatch(requestsFor(2), 2, { policy: { maxAttempts: 0 } });

    expect(sent).toBe(0);
    expect(results.map((r) => r.outcome)).toEqual([
      {
        ok: false,
        kind: "unexpected",
        message: "maxAttempts must be an integer >= 1. Received: 0",
        attempts: 0,
        retryable: false,
      },
      {
        ok: false,
        kind: "unexpected",
        message: "maxAttempts must be an integer >= 1. Received: 0",
        attempts: 0,
        retryable: false,
      },
    ]);
  });

  it("reports every result to onResult with its input index", async () => {
    const { transport } = createLatencyTransport();
    const batcher = new RequestBatcher({ transport, logger: silentLogger });
    const requests = requestsFor(8);
    const seen: Array<[number, string]> = [];

    await batcher.dispatch(requests, 3, {
      onResult: (result, index) => seen.push([index, result.request.target]),
    });

    expect(seen).toHaveLength(8);
    expect([...seen].sort((a, b) => a[0] - b[0])).toEqual(
      requests.map((r, i) => [i, r.target]),
    );
  });

  it("rethrows an onResult error after every request finished", async () => {
    const { transport, stats } = createLatencyTransport();
    const batcher = new RequestBatcher({ transport, logger: silentLogger });

    await expect(
      batcher.dispatch(requestsFor(5), 2, {
        onResult: (_result, index) => {
          if (index === 1) throw new Error("checkpoint write failed");
        },
      }),
    ).rejects.toThrow("checkpoint write failed");
    expect(stats.calls).toBe(5);
  });

  it("passes the policy override to the transport", async () => {
    const policies: Array<Partial<RetryPolicy> | undefined> = [];
    const transport: Transport = {
      async execute(_request, policy) {
        policies.push(policy);
        return { ok: true, response: { status: 204, body: undefined }, attempts: 1 };
      },
    };
    const batcher = new RequestBatcher({ transport, logger: silentLogger });

    await batcher.dispatch(requestsFor(2), 1, { policy: { maxAttempts: 1 } });

    expect(policies).toEqual([{ maxAttempts: 1 }, { maxAttempts: 1 }]);
  });

  it("returns an empty result set for no requests", async () => {
    const { transport } = createLatencyTransport();
    const batcher = new RequestBatcher({ transport, logger: silentLogger });

    expect(await batcher.dispatch([])).toEqual([]);
  });
});
