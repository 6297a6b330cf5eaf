/**
 * HTTP transport public API
 */

export { createFetchSender, buildUrl } from "./httpClient";
export { HttpError } from "./httpError";
export { classifyRemoteError } from "./classifyRemoteError";
export {
  computeBackoffDelay,
  computeRetryDelay,
  parseRetryAfter,
  resolveRetryPolicy,
} from "./backoff";
export { RetryingTransport } from "./retryingTransport";
export type { Transport, RetryingTransportDeps } from "./retryingTransport";
export type {
  ApiRequest,
  ApiResponse,
  HttpMethod,
  HttpSender,
  HttpErrorDetails,
  RetryPolicy,
} from "@/types";
