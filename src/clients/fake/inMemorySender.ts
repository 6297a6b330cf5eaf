/**
 * In-memory sender: stands in for the remote API in mock mode
 *
 * Stores JSON documents by request target:
 * - GET/HEAD return the stored document or 404
 * - POST/PUT store the body (201 on create, 200 on replace)
 * - PATCH shallow-merges into an existing object or 404
 * - DELETE removes the document (204) or 404
 */

import type { ApiRequest, ApiResponse, HttpSender, JsonValue } from "@/types";
import { HttpError } from "@/clients/http/httpError";

export type InMemorySender = HttpSender & {
  /** Seed or inspect documents by target */
  documents: Map<string, JsonValue>;
  /** Every request received, in order */
  requests: ApiRequest[];
};

function notFound(req: ApiRequest): HttpError {
  return new HttpError({
    status: 404,
    statusText: "Not Found",
    url: req.target,
  });
}

function isJsonObject(value: JsonValue | undefined): value is { [key: string]: JsonValue } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function createInMemorySender(
  seed: Iterable<[string, JsonValue]> = [],
): InMemorySender {
  const documents = new Map<string, JsonValue>(seed);
  const requests: ApiRequest[] = [];

  const send = async (req: ApiRequest): Promise<ApiResponse> => {
    requests.push(req);
    const existing = documents.get(req.target);

    switch (req.method) {
      case "GET":
      case "HEAD":
        if (existing === undefined) throw notFound(req);
        return { status: 200, body: req.method === "GET" ? existing : undefined };

      case "POST":
      case "PUT": {
        documents.set(req.target, req.json ?? null);
        return { status: existing === undefined ? 201 : 200, body: req.json ?? null };
      }

      case "PATCH": {
        if (!isJsonObject(existing)) throw notFound(req);
        const patch = isJsonObject(req.json) ? req.json : {};
        const merged = { ...existing, ...patch };
        documents.set(req.target, merged);
        return { status: 200, body: merged };
      }

      case "DELETE":
        if (existing === undefined) throw notFound(req);
        documents.delete(req.target);
        return { status: 204, body: undefined };
    }
  };

  return Object.assign(send, { documents, requests });
}
