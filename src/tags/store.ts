/**
 * TagStore -- workspace-scoped labels and their links to tasks.
 *
 * Names are unique per workspace. Linking is idempotent in both directions
 * and only allowed between a tag and a task of the same workspace.
 */

import type Database from "better-sqlite3";
import type { Principal } from "../identity/types.js";
import type { Tag, CreateTagInput, UpdateTagInput } from "./types.js";
import { AccessGuard } from "../access/guard.js";
import { runInTransaction, systemClock, type Clock } from "../db/database.js";
import { ConflictError, NotFoundError, ValidationError, isUniqueViolation } from "../errors.js";
import { optionalColor, requireName } from "../util/validate.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("tag-store");

export class TagStore {
  private guard: AccessGuard;

  constructor(
    private db: Database.Database,
    private clock: Clock = systemClock,
  ) {
    this.guard = new AccessGuard(db);
  }

  list(principal: Principal, workspaceId: number): Tag[] {
    this.guard.workspace(principal, workspaceId, "read");
    return this.db
      .prepare("SELECT * FROM tags WHERE workspace_id = ? ORDER BY name ASC, id ASC")
      .all(workspaceId) as Tag[];
  }

  get(principal: Principal, id: number): Tag {
    const tag = this.find(id);
    if (!tag) throw new NotFoundError("Tag", id);
    this.guard.workspace(principal, tag.workspace_id, "read", { entity: "Tag", id });
    return tag;
  }

  create(principal: Principal, input: CreateTagInput): Tag {
    const name = requireName(input.name);
    const color = optionalColor(input.color) ?? null;

    return runInTransaction(this.db, () => {
      this.guard.workspace(principal, input.workspace_id, "write");
      try {
        const result = this.db
          .prepare("INSERT INTO tags (name, color, workspace_id, created_at) VALUES (?, ?, ?, ?)")
          .run(name, color, input.workspace_id, this.clock().toISOString());
        const id = Number(result.lastInsertRowid);
        log.info({ id, name, workspaceId: input.workspace_id }, "tag created");
        return this.require(id);
      } catch (e) {
        if (isUniqueViolation(e)) throw duplicate(name, input.workspace_id);
        throw e;
      }
    });
  }

  update(principal: Principal, id: number, input: UpdateTagInput): Tag {
    return runInTransaction(this.db, () => {
      const tag = this.writable(principal, id);
      const name = input.name === undefined ? undefined : requireName(input.name);
      const fields: string[] = [];
      const values: unknown[] = [];

      if (name !== undefined) {
        fields.push("name = ?");
        values.push(name);
      }
      if (input.color !== undefined) {
        fields.push("color = ?");
        values.push(optionalColor(input.color));
      }
      if (fields.length === 0) return tag;

      values.push(id);
      try {
        this.db.prepare(`UPDATE tags SET ${fields.join(", ")} WHERE id = ?`).run(...values);
      } catch (e) {
        if (isUniqueViolation(e)) throw duplicate(name ?? tag.name, tag.workspace_id);
        throw e;
      }
      log.info({ id }, "tag updated");
      return this.require(id);
    });
  }

  /** Unlinks the tag from every task. */
  delete(principal: Principal, id: number): void {
    runInTransaction(this.db, () => {
      this.writable(principal, id);
      this.db.prepare("DELETE FROM tags WHERE id = ?").run(id);
      log.info({ id }, "tag deleted");
    });
  }

  /** Idempotent. */
  attach(principal: Principal, taskId: number, tagId: number): void {
    runInTransaction(this.db, () => {
      this.linkable(principal, taskId, tagId);
      const result = this.db
        .prepare("INSERT OR IGNORE INTO task_tags (task_id, tag_id) VALUES (?, ?)")
        .run(taskId, tagId);
      if (result.changes > 0) log.info({ taskId, tagId }, "tag attached");
    });
  }

  /** Idempotent. */
  detach(principal: Principal, taskId: number, tagId: number): void {
    runInTransaction(this.db, () => {
      this.linkable(principal, taskId, tagId);
      const result = this.db
        .prepare("DELETE FROM task_tags WHERE task_id = ? AND tag_id = ?")
        .run(taskId, tagId);
      if (result.changes > 0) log.info({ taskId, tagId }, "tag detached");
    });
  }

  /** Tags of a task in the order they were attached. */
  listForTask(principal: Principal, taskId: number): Tag[] {
    this.guard.task(principal, taskId, "read");
    return this.db
      .prepare(
        `SELECT g.* FROM task_tags tt
         JOIN tags g ON g.id = tt.tag_id
         WHERE tt.task_id = ?
         ORDER BY tt.rowid ASC`,
      )
      .all(taskId) as Tag[];
  }

  private linkable(principal: Principal, taskId: number, tagId: number): void {
    const scope = this.guard.task(principal, taskId, "write");
    const tag = this.find(tagId);
    if (!tag) throw new NotFoundError("Tag", tagId);
    if (tag.workspace_id !== scope.workspace_id) {
      throw new ValidationError(`Tag ${tagId} and task ${taskId} belong to different workspaces`, {
        taskId,
        tagId,
      });
    }
  }

  private writable(principal: Principal, id: number): Tag {
    const tag = this.find(id);
    if (!tag) throw new NotFoundError("Tag", id);
    this.guard.workspace(principal, tag.workspace_id, "write", { entity: "Tag", id });
    return tag;
  }

  private find(id: number): Tag | undefined {
    return this.db.prepare("SELECT * FROM tags WHERE id = ?").get(id) as Tag | undefined;
  }

  private require(id: number): Tag {
    const tag = this.find(id);
    if (!tag) throw new Error(`tag ${id} vanished inside its own transaction`);
    return tag;
  }
}

function duplicate(name: string, workspaceId: number): ConflictError {
  return new ConflictError(`Tag '${name}' already exists in workspace ${workspaceId}`, {
    name,
    workspaceId,
  });
}
