/**
 * Fetch sender: one HTTP attempt against the remote API using native fetch
 *
 * Supports timeouts, query params, JSON bodies, idempotency keys and
 * structured errors. Retrying is not done here; see retryingTransport.
 */

import type {
  ApiRequest,
  ApiResponse,
  FetchSenderOptions,
  HttpSender,
  QueryParams,
} from "@/types";
import { HttpError } from "./httpError";
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_JSON_HEADERS,
  ERROR_BODY_SNIPPET_MAX_LENGTH,
  IDEMPOTENCY_KEY_HEADER,
} from "@/constants";
import * as logger from "@/logger";

/**
 * Join the base URL and a request target, then append query parameters
 * (arrays become repeated params)
 */
export function buildUrl(
  baseUrl: string,
  target: string,
  query?: QueryParams,
): string {
  const base = baseUrl.endsWith("/") ? baseUrl.slice(0, -1) : baseUrl;
  const path = target.startsWith("/") ? target : `/${target}`;
  const url = new URL(base + path);

  if (query) {
    Object.entries(query).forEach(([key, value]) => {
      if (Array.isArray(value)) {
        value.forEach((item) => url.searchParams.append(key, String(item)));
      } else {
        url.searchParams.append(key, String(value));
      }
    });
  }

  return url.toString();
}

/**
 * Extract a snippet of the error response body for debugging
 */
async function extractBodySnippet(response: Response): Promise<string | undefined> {
  try {
    const text = await response.text();
    if (!text) {
      return undefined;
    }
    return text.length > ERROR_BODY_SNIPPET_MAX_LENGTH
      ? text.substring(0, ERROR_BODY_SNIPPET_MAX_LENGTH) + "..."
      : text;
  } catch {
    return undefined;
  }
}

function buildHeaders(
  req: ApiRequest,
  defaults: Record<string, string>,
): Record<string, string> {
  // Defaults first, caller headers override
  const headers: Record<string, string> = { ...defaults };
  if (req.json !== undefined) {
    Object.assign(headers, DEFAULT_JSON_HEADERS);
  }
  if (req.idempotencyKey) {
    headers[IDEMPOTENCY_KEY_HEADER] = req.idempotencyKey;
  }
  Object.assign(headers, req.headers);
  return headers;
}

async function readBody(
  req: ApiRequest,
  url: string,
  response: Response,
): Promise<unknown> {
  if (response.status === 204 || req.method === "HEAD") {
    return undefined;
  }

  const contentType = response.headers.get("content-type");
  const isJson =
    contentType !== null &&
    (contentType.includes("application/json") || contentType.includes("+json"));

  if (!isJson) {
    // Return text content as fallback, let caller handle it
    const text = await response.text();
    return text === "" ? undefined : text;
  }

  try {
    return await response.json();
  } catch (parseError) {
    logger.warn("JSON parse failed", {
      method: req.method,
      url,
      status: response.status,
      error: parseError instanceof Error ? parseError.message : String(parseError),
    });
    return undefined;
  }
}

/**
 * Create a sender bound to one API base URL
 *
 * A timed-out attempt rejects with the fetch AbortError and a network
 * failure with fetch's TypeError, so the transport can classify both as
 * transient.
 */
export function createFetchSender(options: FetchSenderOptions): HttpSender {
  const defaultHeaders = options.headers ?? {};
  const defaultTimeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;

  return async (req: ApiRequest): Promise<ApiResponse> => {
    const url = buildUrl(options.baseUrl, req.target, req.query);
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), req.timeoutMs ?? defaultTimeoutMs);

    try {
      const init: RequestInit = {
        method: req.method,
        headers: buildHeaders(req, defaultHeaders),
        signal: controller.signal,
      };
      if (req.json !== undefined) {
        init.body = JSON.stringify(req.json);
      }

      const response = await fetch(url, init);

      if (!response.ok) {
        const bodySnippet = await extractBodySnippet(response);
        throw new HttpError({
          status: response.status,
          statusText: response.statusText,
          url,
          bodySnippet,
          headers: response.headers,
        });
      }

      return {
        status: response.status,
        body: await readBody(req, url, response),
        headers: response.headers,
      };
    } finally {
      clearTimeout(timeoutId);
    }
  };
}
