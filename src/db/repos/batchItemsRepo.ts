/**
 * Batch items repository
 *
 * Data access layer for the batch_items table. Status updates are guarded in
 * SQL so an item never leaves a terminal status.
 */

import type {
  BatchItemInput,
  BatchItemRow,
  TerminalItemUpdate,
} from "@/types";
import type { Db } from "../connection";

/**
 * Insert all items of a new run as pending, preserving submission order
 */
export function insertItems(
  db: Db,
  runId: string,
  items: readonly BatchItemInput[],
  now: string,
): void {
  const stmt = db.prepare(
    `
    INSERT INTO batch_items (run_id, position, item_id, input_json, status, updated_at)
    VALUES (?, ?, ?, ?, 'pending', ?)
  `,
  );

  items.forEach((item, position) => {
    stmt.run(runId, position, item.id, JSON.stringify(item.input), now);
  });
}

export function listItemRows(db: Db, runId: string): BatchItemRow[] {
  return db
    .prepare("SELECT * FROM batch_items WHERE run_id = ? ORDER BY position")
    .all(runId) as BatchItemRow[];
}

/**
 * pending -> in_flight
 *
 * @returns Number of items moved
 */
export function markItemsInFlight(
  db: Db,
  runId: string,
  itemIds: readonly string[],
  now: string,
): number {
  const stmt = db.prepare(
    `
    UPDATE batch_items
    SET status = 'in_flight', updated_at = ?
    WHERE run_id = ? AND item_id = ? AND status = 'pending'
  `,
  );

  let changed = 0;
  for (const itemId of itemIds) {
    changed += stmt.run(now, runId, itemId).changes;
  }
  return changed;
}

/**
 * pending | in_flight -> terminal
 *
 * @returns false if the item was already terminal (or does not exist)
 */
export function recordTerminalStatus(
  db: Db,
  runId: string,
  update: TerminalItemUpdate,
  now: string,
): boolean {
  const result = db
    .prepare(
      `
    UPDATE batch_items
    SET status = ?, reason = ?, attempts = attempts + ?, updated_at = ?
    WHERE run_id = ? AND item_id = ? AND status IN ('pending', 'in_flight')
  `,
    )
    .run(update.status, update.reason, update.attempts, now, runId, update.itemId);

  return result.changes > 0;
}

/**
 * in_flight -> pending, for items whose outcome was never persisted
 *
 * @returns Number of items reverted
 */
export function revertInFlightItems(db: Db, runId: string, now: string): number {
  return db
    .prepare(
      `
    UPDATE batch_items
    SET status = 'pending', updated_at = ?
    WHERE run_id = ? AND status = 'in_flight'
  `,
    )
    .run(now, runId).changes;
}

export function countItemsByStatus(
  db: Db,
  runId: string,
): Array<{ status: string; count: number }> {
  return db
    .prepare(
      "SELECT status, COUNT(*) AS count FROM batch_items WHERE run_id = ? GROUP BY status",
    )
    .all(runId) as Array<{ status: string; count: number }>;
}
