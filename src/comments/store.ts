/**
 * CommentStore -- append-mostly discussion on tasks.
 *
 * Only the author may edit or delete a comment. Deleting a comment removes
 * the attachments hanging off it.
 */

import type Database from "better-sqlite3";
import type { Principal } from "../identity/types.js";
import type { Comment, CreateCommentInput } from "./types.js";
import { AccessGuard } from "../access/guard.js";
import { runInTransaction, systemClock, type Clock } from "../db/database.js";
import { ForbiddenError, NotFoundError } from "../errors.js";
import { requireName } from "../util/validate.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("comment-store");

export class CommentStore {
  private guard: AccessGuard;

  constructor(
    private db: Database.Database,
    private clock: Clock = systemClock,
  ) {
    this.guard = new AccessGuard(db);
  }

  list(principal: Principal, taskId: number): Comment[] {
    this.guard.task(principal, taskId, "read");
    return this.db
      .prepare("SELECT * FROM comments WHERE task_id = ? ORDER BY id ASC")
      .all(taskId) as Comment[];
  }

  get(principal: Principal, id: number): Comment {
    const comment = this.find(id);
    if (!comment) throw new NotFoundError("Comment", id);
    this.guard.task(principal, comment.task_id, "read", { entity: "Comment", id });
    return comment;
  }

  create(principal: Principal, input: CreateCommentInput): Comment {
    const text = requireName(input.text, "text");
    return runInTransaction(this.db, () => {
      this.guard.task(principal, input.task_id, "write");
      const now = this.clock().toISOString();
      const result = this.db
        .prepare("INSERT INTO comments (text, task_id, author_id, created_at, updated_at) VALUES (?, ?, ?, ?, ?)")
        .run(text, input.task_id, principal.userId, now, now);
      const id = Number(result.lastInsertRowid);
      log.info({ id, taskId: input.task_id }, "comment created");
      return this.require(id);
    });
  }

  update(principal: Principal, id: number, text: string): Comment {
    const body = requireName(text, "text");
    return runInTransaction(this.db, () => {
      this.authored(principal, id, "edit");
      this.db
        .prepare("UPDATE comments SET text = ?, updated_at = ? WHERE id = ?")
        .run(body, this.clock().toISOString(), id);
      log.info({ id }, "comment updated");
      return this.require(id);
    });
  }

  delete(principal: Principal, id: number): void {
    runInTransaction(this.db, () => {
      this.authored(principal, id, "delete");
      this.db.prepare("DELETE FROM comments WHERE id = ?").run(id);
      log.info({ id }, "comment deleted");
    });
  }

  private authored(principal: Principal, id: number, action: string): Comment {
    const comment = this.find(id);
    if (!comment) throw new NotFoundError("Comment", id);
    this.guard.task(principal, comment.task_id, "write", { entity: "Comment", id });
    if (comment.author_id !== principal.userId) {
      throw new ForbiddenError(`Only the author may ${action} comment ${id}`, { commentId: id });
    }
    return comment;
  }

  private find(id: number): Comment | undefined {
    return this.db.prepare("SELECT * FROM comments WHERE id = ?").get(id) as Comment | undefined;
  }

  private require(id: number): Comment {
    const comment = this.find(id);
    if (!comment) throw new Error(`comment ${id} vanished inside its own transaction`);
    return comment;
  }
}
