/**
 * Integration Test: Run Locks
 *
 * Verifies per-run lock behavior:
 * - Single owner per run, independent runs
 * - Acquire/refresh/release lifecycle
 * - Takeover of an expired lock
 */

import { describe, it, expect, afterEach } from "vitest";
import { createTestDb, type TestDbHarness } from "../../helpers/testDb";
import { acquireRunLock, getRunLock, refreshRunLock, releaseRunLock } from "@/db";

const T0 = Date.parse("2026-03-01T10:00:00.000Z");
const TTL_SECONDS = 600;

describe("Run locks", () => {
  let harness: TestDbHarness | null = null;

  afterEach(() => {
    if (harness) {
      harness.cleanup();
      harness = null;
    }
  });

  it("should enforce single owner and allow release/reacquisition", () => {
    harness = createTestDb();
    const db = harness.db;

    expect(acquireRunLock(db, "run-1", "owner-a", TTL_SECONDS, T0)).toEqual({ ok: true });
    expect(getRunLock(db, "run-1")?.owner_id).toBe("owner-a");

    expect(acquireRunLock(db, "run-1", "owner-b", TTL_SECONDS, T0 + 1000)).toEqual({
      ok: false,
      reason: "LOCKED",
      heldBy: "owner-a",
      expiresAt: "2026-03-01T10:10:00.000Z",
    });

    expect(refreshRunLock(db, "run-1", "owner-b", TTL_SECONDS, T0)).toBe(false);
    expect(releaseRunLock(db, "run-1", "owner-b")).toBe(false);

    expect(refreshRunLock(db, "run-1", "owner-a", TTL_SECONDS, T0 + 60_000)).toBe(true);
    expect(getRunLock(db, "run-1")?.expires_at).toBe("2026-03-01T10:11:00.000Z");

    expect(releaseRunLock(db, "run-1", "owner-a")).toBe(true);
    expect(getRunLock(db, "run-1")).toBeNull();

    expect(acquireRunLock(db, "run-1", "owner-b", TTL_SECONDS, T0)).toEqual({ ok: true });
    expect(getRunLock(db, "run-1")?.owner_id).toBe("owner-b");
  });

  it("locks runs independently", () => {
    harness = createTestDb();
    const db = harness.db;

    expect(acquireRunLock(db, "run-1", "owner-a", TTL_SECONDS, T0)).toEqual({ ok: true });
    expect(acquireRunLock(db, "run-2", "owner-b", TTL_SECONDS, T0)).toEqual({ ok: true });
  });

  it("lets another owner take over once the lock expired", () => {
    harness = createTestDb();
    const db = harness.db;

    acquireRunLock(db, "run-1", "owner-a", TTL_SECONDS, T0);

    const justBefore = acquireRunLock(db, "run-1", "owner-b", TTL_SECONDS, T0 + TTL_SECONDS * 1000 - 1);
    expect(justBefore.ok).toBe(false);

    const atExpiry = acquireRunLock(db, "run-1", "owner-b", TTL_SECONDS, T0 + TTL_SECONDS * 1000);
    expect(atExpiry).toEqual({ ok: true });
    expect(getRunLock(db, "run-1")?.owner_id).toBe("owner-b");

    // The previous owner can no longer refresh or release
    expect(refreshRunLock(db, "run-1", "owner-a", TTL_SECONDS, T0)).toBe(false);
    expect(releaseRunLock(db, "run-1", "owner-a")).toBe(false);
  });
});
