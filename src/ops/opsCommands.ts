/**
 * Operator commands over the engine database
 *
 * Parsing and execution are kept apart from the process entry (opsMain) so
 * both can be exercised without spawning a process.
 */

import type { LogMeta } from "@/types";
import type { CheckpointStore } from "@/batch";
import type { TtlCache } from "@/cache";
import { DEFAULT_RUN_LIST_LIMIT } from "@/constants";

export type OpsInvocation =
  | { command: "migrate" }
  | { command: "runs"; limit: number }
  | { command: "status"; runId: string }
  | { command: "cancel"; runId: string }
  | { command: "unlock"; runId: string }
  | { command: "cache-purge" }
  | { command: "cache-clear" };

export type OpsContext = {
  store: CheckpointStore;
  cache: TtlCache;
  /** Migration files applied when the context was opened */
  appliedMigrations: string[];
};

export const OPS_USAGE = [
  "Usage: opsMain <command> [args]",
  "  migrate            apply pending migrations",
  "  runs [limit]       list recent batch runs",
  "  status <runId>     show progress counts of a run",
  "  cancel <runId>     request cancellation of an active run",
  "  unlock <runId>     clear the run lock left by a killed process",
  "  cache-purge        delete expired cache entries",
  "  cache-clear        delete every cache entry",
].join("\n");

export class OpsUsageError extends Error {
  constructor(message: string) {
    super(`${message}\n${OPS_USAGE}`);
    this.name = "OpsUsageError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

function requireRunId(command: string, args: readonly string[]): string {
  const runId = args[0]?.trim();
  if (!runId) {
    throw new OpsUsageError(`${command} requires a run id`);
  }
  return runId;
}

export function parseOpsArgs(argv: readonly string[]): OpsInvocation {
  if (argv.length === 0) {
    throw new OpsUsageError("Missing command");
  }
  const [command, ...args] = argv;

  switch (command) {
    case "migrate":
    case "cache-purge":
    case "cache-clear":
      return { command };
    case "runs": {
      if (args[0] === undefined) {
        return { command, limit: DEFAULT_RUN_LIST_LIMIT };
      }
      const limit = Number(args[0]);
      if (!Number.isInteger(limit) || limit < 1) {
        throw new OpsUsageError(`runs limit must be a positive integer, got ${args[0]}`);
      }
      return { command, limit };
    }
    case "status":
    case "cancel":
    case "unlock":
      return { command, runId: requireRunId(command, args) };
    default:
      throw new OpsUsageError(`Unknown command: ${command}`);
  }
}

/**
 * Execute one command
 *
 * @returns Structured result, logged by the caller
 */
export function executeOpsCommand(ctx: OpsContext, invocation: OpsInvocation): LogMeta {
  switch (invocation.command) {
    case "migrate":
      return { applied: ctx.appliedMigrations };
    case "runs":
      return {
        runs: ctx.store.listRuns(invocation.limit).map((run) => ({
          runId: run.runId,
          operation: run.operation,
          status: run.status,
          items: run.itemCount,
          dryRun: run.dryRun,
          createdAt: run.createdAt,
        })),
      };
    case "status":
      return { ...ctx.store.snapshot(invocation.runId) };
    case "cancel": {
      const run = ctx.store.requestCancel(invocation.runId);
      return { runId: run.runId, status: run.status, cancelRequested: true };
    }
    case "unlock": {
      // Unknown run ids raise BatchRunNotFoundError
      const run = ctx.store.loadRun(invocation.runId);
      return { runId: run.runId, released: ctx.store.forceReleaseLock(run.runId) };
    }
    case "cache-purge":
      return { removed: ctx.cache.purgeExpired() };
    case "cache-clear":
      return { removed: ctx.cache.clear() };
  }
}
