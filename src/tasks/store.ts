/**
 * Task store -- tasks, subtasks and followers.
 *
 * A task's section and parent must live in the task's own project, and the
 * parent chain is re-checked for cycles whenever it changes. Deleting a task
 * removes its subtasks, comments, attachments, tag links, followers and
 * custom field values in the same transaction.
 */

import type Database from "better-sqlite3";
import type { Principal } from "../identity/types.js";
import type { Task, TaskRow, CreateTaskInput, UpdateTaskInput } from "./types.js";
import { AccessGuard } from "../access/guard.js";
import { assertValidParent, collectSubtree } from "./hierarchy.js";
import { runInTransaction, systemClock, type Clock } from "../db/database.js";
import { DEFAULT_LIMITS } from "../config.js";
import { NotFoundError, ValidationError } from "../errors.js";
import { optionalInt, requireInstant, requireName } from "../util/validate.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("task-store");

export function toTask(row: TaskRow): Task {
  return { ...row, completed: row.completed_at !== null };
}

export class TaskStore {
  private guard: AccessGuard;

  constructor(
    private db: Database.Database,
    private clock: Clock = systemClock,
    private maxDepth: number = DEFAULT_LIMITS.maxTaskDepth,
  ) {
    this.guard = new AccessGuard(db);
  }

  get(principal: Principal, id: number): Task {
    this.guard.task(principal, id, "read");
    return this.row(id);
  }

  /** Direct children, by position then id. */
  listSubtasks(principal: Principal, id: number): Task[] {
    this.guard.task(principal, id, "read");
    const rows = this.db
      .prepare("SELECT * FROM tasks WHERE parent_task_id = ? ORDER BY position ASC, id ASC")
      .all(id) as TaskRow[];
    return rows.map(toTask);
  }

  create(principal: Principal, input: CreateTaskInput): Task {
    const name = requireName(input.name);
    const position = optionalInt(input.position, "position") ?? 0;
    const dueDate = input.due_date == null ? null : requireInstant(input.due_date, "due_date");

    return runInTransaction(this.db, () => {
      this.guard.project(principal, input.project_id, "write");
      if (input.section_id != null) {
        this.checkSection(input.section_id, input.project_id);
      }
      if (input.parent_task_id != null) {
        this.checkParent(null, input.parent_task_id, input.project_id);
      }

      const now = this.clock().toISOString();
      const result = this.db
        .prepare(
          `INSERT INTO tasks (name, description, project_id, section_id, parent_task_id, assignee_id,
                              creator_id, due_date, completed_at, position, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          name,
          input.description ?? null,
          input.project_id,
          input.section_id ?? null,
          input.parent_task_id ?? null,
          input.assignee_id ?? null,
          principal.userId,
          dueDate,
          input.completed ? now : null,
          position,
          now,
          now,
        );
      const id = Number(result.lastInsertRowid);
      log.info({ id, name, projectId: input.project_id }, "task created");
      return this.row(id);
    });
  }

  update(principal: Principal, id: number, input: UpdateTaskInput): Task {
    return runInTransaction(this.db, () => {
      const scope = this.guard.task(principal, id, "write");
      const existing = this.row(id);

      if (input.project_id !== undefined && input.project_id !== existing.project_id) {
        throw new ValidationError("Tasks cannot be moved to another project", {
          taskId: id,
          projectId: existing.project_id,
        });
      }

      const fields: string[] = [];
      const values: unknown[] = [];

      if (input.name !== undefined) {
        fields.push("name = ?");
        values.push(requireName(input.name));
      }
      if (input.description !== undefined) {
        fields.push("description = ?");
        values.push(input.description);
      }
      if (input.assignee_id !== undefined) {
        fields.push("assignee_id = ?");
        values.push(input.assignee_id);
      }
      if (input.due_date !== undefined) {
        fields.push("due_date = ?");
        values.push(input.due_date === null ? null : requireInstant(input.due_date, "due_date"));
      }
      if (input.section_id !== undefined) {
        if (input.section_id !== null) this.checkSection(input.section_id, scope.project_id);
        fields.push("section_id = ?");
        values.push(input.section_id);
      }
      if (input.parent_task_id !== undefined) {
        if (input.parent_task_id !== null) this.checkParent(id, input.parent_task_id, scope.project_id);
        fields.push("parent_task_id = ?");
        values.push(input.parent_task_id);
      }
      const position = optionalInt(input.position, "position");
      if (position !== undefined) {
        fields.push("position = ?");
        values.push(position);
      }
      if (input.completed !== undefined) {
        // Re-completing keeps the original completion instant.
        if (!input.completed) {
          fields.push("completed_at = NULL");
        } else if (existing.completed_at === null) {
          fields.push("completed_at = ?");
          values.push(this.clock().toISOString());
        }
      }

      if (fields.length === 0) return existing;

      fields.push("updated_at = ?");
      values.push(this.clock().toISOString(), id);

      this.db.prepare(`UPDATE tasks SET ${fields.join(", ")} WHERE id = ?`).run(...values);
      log.info({ id }, "task updated");
      return this.row(id);
    });
  }

  delete(principal: Principal, id: number): void {
    runInTransaction(this.db, () => {
      this.guard.task(principal, id, "write");
      const subtree = collectSubtree(this.db, id);
      this.db
        .prepare("DELETE FROM tasks WHERE id IN (SELECT value FROM json_each(?))")
        .run(JSON.stringify(subtree));
      log.info({ id, removed: subtree.length }, "task deleted");
    });
  }

  /** Idempotent. */
  follow(principal: Principal, id: number): void {
    runInTransaction(this.db, () => {
      this.guard.task(principal, id, "write");
      this.db
        .prepare("INSERT OR IGNORE INTO task_followers (task_id, user_id) VALUES (?, ?)")
        .run(id, principal.userId);
    });
  }

  /** Idempotent. */
  unfollow(principal: Principal, id: number): void {
    runInTransaction(this.db, () => {
      this.guard.task(principal, id, "write");
      this.db
        .prepare("DELETE FROM task_followers WHERE task_id = ? AND user_id = ?")
        .run(id, principal.userId);
    });
  }

  listFollowers(principal: Principal, id: number): number[] {
    this.guard.task(principal, id, "read");
    const rows = this.db
      .prepare("SELECT user_id FROM task_followers WHERE task_id = ? ORDER BY rowid ASC")
      .all(id) as Array<{ user_id: number }>;
    return rows.map((r) => r.user_id);
  }

  private checkSection(sectionId: number, projectId: number): void {
    const section = this.db.prepare("SELECT project_id FROM sections WHERE id = ?").get(sectionId) as
      | { project_id: number }
      | undefined;
    if (!section) throw new NotFoundError("Section", sectionId);
    if (section.project_id !== projectId) {
      throw new ValidationError(`Section ${sectionId} belongs to a different project`, {
        sectionId,
        projectId,
      });
    }
  }

  private checkParent(taskId: number | null, parentId: number, projectId: number): void {
    const parent = this.db.prepare("SELECT project_id FROM tasks WHERE id = ?").get(parentId) as
      | { project_id: number }
      | undefined;
    if (!parent) throw new NotFoundError("Task", parentId);
    if (parent.project_id !== projectId) {
      throw new ValidationError(`Parent task ${parentId} belongs to a different project`, {
        parentId,
        projectId,
      });
    }
    assertValidParent(this.db, taskId, parentId, this.maxDepth);
  }

  private row(id: number): Task {
    const row = this.db.prepare("SELECT * FROM tasks WHERE id = ?").get(id) as TaskRow | undefined;
    if (!row) throw new NotFoundError("Task", id);
    return toTask(row);
  }
}
