/**
 * HttpError class: structured error for non-2xx responses
 *
 * Thrown by senders for a single attempt; the retrying transport classifies
 * it by status and never lets it reach its own callers.
 */

import type { HttpErrorDetails } from "@/types";

export class HttpError extends Error {
  public readonly status: number;
  public readonly statusText: string;
  public readonly url: string;
  public readonly bodySnippet?: string;
  public readonly headers?: Headers;

  constructor(details: HttpErrorDetails) {
    super(
      `HTTP ${details.status} ${details.statusText} - ${details.url}${
        details.bodySnippet ? ` - ${details.bodySnippet}` : ""
      }`,
    );
    this.name = "HttpError";
    this.status = details.status;
    this.statusText = details.statusText;
    this.url = details.url;
    this.bodySnippet = details.bodySnippet;
    this.headers = details.headers;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /** Raw Retry-After header value, if the response carried one */
  get retryAfter(): string | null {
    return this.headers?.get("retry-after") ?? null;
  }
}
