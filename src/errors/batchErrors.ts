/**
 * Batch processing errors
 *
 * Raised by the checkpointed processor before any item is touched; callers
 * decide whether to retry later or restart the run fresh.
 */

/**
 * Persisted checkpoint is unreadable or inconsistent. Fatal for resume:
 * progress is never guessed from a partially trusted checkpoint.
 */
export class CheckpointCorruptionError extends Error {
  public readonly runId: string;
  public readonly detail: string;

  constructor(runId: string, detail: string) {
    super(`Checkpoint for run ${runId} is corrupt: ${detail}`);
    this.name = "CheckpointCorruptionError";
    this.runId = runId;
    this.detail = detail;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Another run/resume call currently holds the run
 */
export class ConcurrentRunError extends Error {
  public readonly runId: string;
  public readonly heldBy: string;
  public readonly expiresAt: string;

  constructor(runId: string, heldBy: string, expiresAt: string) {
    super(`Run ${runId} is already active (lock held by ${heldBy} until ${expiresAt})`);
    this.name = "ConcurrentRunError";
    this.runId = runId;
    this.heldBy = heldBy;
    this.expiresAt = expiresAt;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class BatchRunNotFoundError extends Error {
  public readonly runId: string;

  constructor(runId: string) {
    super(`Batch run not found: ${runId}`);
    this.name = "BatchRunNotFoundError";
    this.runId = runId;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Operation not allowed in the run's current status
 */
export class BatchStateError extends Error {
  public readonly runId: string;
  public readonly status: string;

  constructor(runId: string, status: string, message: string) {
    super(message);
    this.name = "BatchStateError";
    this.runId = runId;
    this.status = status;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Rejected start() input (duplicate or empty ids, out-of-range options)
 */
export class BatchInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BatchInputError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
