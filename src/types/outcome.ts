/**
 * Outcome type definitions
 *
 * Result of one logical request after the retry loop has finished.
 */

import type { ApiRequest, ApiResponse } from "@/types/clients/http";

/**
 * Transient kinds are retried by the transport; permanent kinds are not.
 */
export type TransientFailureKind =
  | "rate_limited"
  | "timeout"
  | "server_error"
  | "network";

export type PermanentFailureKind =
  | "validation"
  | "unauthorized"
  | "forbidden"
  | "not_found"
  | "conflict"
  | "client_error"
  | "server_error"
  | "unexpected";

export type FailureKind = TransientFailureKind | PermanentFailureKind;

export type SuccessOutcome = {
  ok: true;
  response: ApiResponse;
  attempts: number;
};

export type FailureOutcome = {
  ok: false;
  kind: FailureKind;
  message: string;
  attempts: number;
  /** Whether the last error was classified as transient */
  retryable: boolean;
  status?: number;
};

export type Outcome = SuccessOutcome | FailureOutcome;

/**
 * A request paired with its outcome, as returned by the batcher
 */
export type DispatchResult = {
  request: ApiRequest;
  outcome: Outcome;
};
