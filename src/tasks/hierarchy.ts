/**
 * Parent-chain checks for the self-referencing task table.
 *
 * The chain is walked by id, one row at a time, inside the caller's
 * transaction. A walk longer than `maxDepth` is rejected as if it were a
 * cycle: it cannot be proven finite within the bound.
 */

import type Database from "better-sqlite3";
import { CycleDetectedError } from "../errors.js";

/**
 * Throw CycleDetectedError if making `parentId` the parent of `taskId` would
 * close a loop or produce a chain deeper than `maxDepth`. `taskId` is null for
 * a task that does not exist yet.
 */
export function assertValidParent(
  db: Database.Database,
  taskId: number | null,
  parentId: number,
  maxDepth: number,
): void {
  const parentOf = db.prepare("SELECT parent_task_id FROM tasks WHERE id = ?");

  let current: number | null = parentId;
  let steps = 0;
  while (current !== null) {
    if (current === taskId) {
      throw new CycleDetectedError(taskId, parentId, "descendant");
    }
    if (++steps > maxDepth) {
      throw new CycleDetectedError(taskId, parentId, "depth");
    }
    const row = parentOf.get(current) as { parent_task_id: number | null } | undefined;
    current = row ? row.parent_task_id : null;
  }
}

/** Ids of `taskId` and every task below it, breadth first. */
export function collectSubtree(db: Database.Database, taskId: number): number[] {
  const rows = db
    .prepare(
      `WITH RECURSIVE subtree(id) AS (
         SELECT id FROM tasks WHERE id = ?
         UNION ALL
         SELECT t.id FROM tasks t JOIN subtree s ON t.parent_task_id = s.id
       )
       SELECT id FROM subtree`,
    )
    .all(taskId) as Array<{ id: number }>;
  return rows.map((r) => r.id);
}
