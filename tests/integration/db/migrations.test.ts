/**
 * Integration Test: Migrations
 *
 * Verifies the real migration files apply cleanly and only once.
 */

import { describe, it, expect, afterEach } from "vitest";
import { createTestDb, type TestDbHarness } from "../../helpers/testDb";
import { runMigrations } from "@/db";

describe("Migrations", () => {
  let harness: TestDbHarness | null = null;

  afterEach(() => {
    if (harness) {
      harness.cleanup();
      harness = null;
    }
  });

  it("creates every engine table", () => {
    harness = createTestDb();

    const tables = harness.db
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name")
      .all() as { name: string }[];

    expect(tables.map((t) => t.name)).toEqual(
      expect.arrayContaining(["batch_items", "batch_runs", "cache_entries", "run_locks", "schema_migrations"]),
    );
  });

  it("records applied migrations and skips them on the next run", () => {
    harness = createTestDb();

    const versions = harness.db
      .prepare("SELECT version FROM schema_migrations ORDER BY version")
      .all() as { version: string }[];

    expect(versions.map((v) => v.version)).toEqual([
      "0001_batch_runs.sql",
      "0002_cache_entries.sql",
    ]);
    expect(runMigrations(harness.db)).toEqual([]);
  });

  it("enables foreign keys and WAL on file databases", () => {
    harness = createTestDb();

    expect(harness.db.pragma("foreign_keys", { simple: true })).toBe(1);
    expect(harness.db.pragma("journal_mode", { simple: true })).toBe("wal");
  });
});
