/**
 * Remote failure classes: produced by classifying whatever the sender threw
 *
 * TransientRemoteError is absorbed by the retry loop; PermanentRemoteError
 * ends it immediately. Both end up as a Failure outcome, never thrown to
 * callers of the transport.
 */

import type { PermanentFailureKind, TransientFailureKind } from "@/types";

type RemoteErrorArgs<K> = {
  kind: K;
  message: string;
  status?: number;
  cause?: unknown;
};

export class TransientRemoteError extends Error {
  public readonly kind: TransientFailureKind;
  public readonly status?: number;
  /** Server-provided wait hint (Retry-After), in ms */
  public readonly retryAfterMs?: number;
  public readonly cause?: unknown;

  constructor(args: RemoteErrorArgs<TransientFailureKind> & { retryAfterMs?: number }) {
    super(args.message);
    this.name = "TransientRemoteError";
    this.kind = args.kind;
    this.status = args.status;
    this.retryAfterMs = args.retryAfterMs;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class PermanentRemoteError extends Error {
  public readonly kind: PermanentFailureKind;
  public readonly status?: number;
  public readonly cause?: unknown;

  constructor(args: RemoteErrorArgs<PermanentFailureKind>) {
    super(args.message);
    this.name = "PermanentRemoteError";
    this.kind = args.kind;
    this.status = args.status;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type RemoteError = TransientRemoteError | PermanentRemoteError;
