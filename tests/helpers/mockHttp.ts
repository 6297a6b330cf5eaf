/**
 * Scripted HTTP sender for offline tests
 *
 * Provides a controllable HttpSender that:
 * - Replays scripted replies per route, in order (the last one repeats)
 * - Throws loudly on unmocked requests (prevents accidental real calls)
 * - Records every request for assertions
 *
 * Usage:
 *   const mock = createMockHttp();
 *   mock.on("GET", "/issue/A-1", { status: 429, headers: { "Retry-After": "2" } }, { status: 200, body: {} });
 *   const transport = new RetryingTransport({ send: mock.send, sleep: async () => {} });
 */

import type { ApiRequest, ApiResponse, HttpSender } from "@/types";
import { HttpError } from "@/clients/http";

type RouteKey = string; // "METHOD target"
type RouteHandler = (req: ApiRequest) => Promise<ApiResponse>;

export type ScriptedReply =
  | { status: number; body?: unknown; headers?: Record<string, string> }
  | { error: unknown };

export interface MockHttp {
  /**
   * Script the replies for a route; each call consumes the next reply and
   * the last one repeats once the script runs out
   */
  on(method: string, target: string, ...replies: ScriptedReply[]): void;

  /**
   * Register a custom handler for a route
   */
  onCustom(method: string, target: string, handler: RouteHandler): void;

  /**
   * HttpSender to inject into a transport
   */
  send: HttpSender;

  /**
   * Get recorded requests (for debugging/assertions)
   */
  getRecordedRequests(): ApiRequest[];

  /**
   * Number of requests received for a route
   */
  callCount(method: string, target: string): number;

  /**
   * Clear all routes and recorded requests
   */
  reset(): void;
}

function buildRouteKey(method: string, target: string): RouteKey {
  return `${method.toUpperCase()} ${target}`;
}

function replyToResponse(req: ApiRequest, reply: ScriptedReply): ApiResponse {
  if ("error" in reply) {
    throw reply.error;
  }

  const headers = new Headers(reply.headers);
  if (reply.status >= 200 && reply.status < 300) {
    return { status: reply.status, body: reply.body, headers };
  }

  throw new HttpError({
    status: reply.status,
    statusText: "Mock Response",
    url: req.target,
    bodySnippet: reply.body === undefined ? undefined : JSON.stringify(reply.body),
    headers,
  });
}

export function createMockHttp(): MockHttp {
  const routes = new Map<RouteKey, RouteHandler>();
  const recordedRequests: ApiRequest[] = [];

  const on = (method: string, target: string, ...replies: ScriptedReply[]): void => {
    if (replies.length === 0) {
      throw new Error(`[MockHttp] No replies scripted for ${buildRouteKey(method, target)}`);
    }
    let next = 0;
    routes.set(buildRouteKey(method, target), async (req) => {
      const reply = replies[Math.min(next, replies.length - 1)];
      next += 1;
      return replyToResponse(req, reply);
    });
  };

  const onCustom = (method: string, target: string, handler: RouteHandler): void => {
    routes.set(buildRouteKey(method, target), handler);
  };

  const send: HttpSender = async (req) => {
    recordedRequests.push({ ...req });

    const key = buildRouteKey(req.method, req.target);
    const handler = routes.get(key);
    if (!handler) {
      throw new Error(
        `[MockHttp] Unmocked request: ${key}\n` +
          `Available routes: ${Array.from(routes.keys()).join(", ") || "(none)"}`,
      );
    }

    return handler(req);
  };

  const callCount = (method: string, target: string): number => {
    const key = buildRouteKey(method, target);
    return recordedRequests.filter((req) => buildRouteKey(req.method, req.target) === key)
      .length;
  };

  return {
    on,
    onCustom,
    send,
    getRecordedRequests: () => [...recordedRequests],
    callCount,
    reset: () => {
      routes.clear();
      recordedRequests.length = 0;
    },
  };
}
