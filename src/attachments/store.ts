/**
 * AttachmentStore -- file references hung off a task or a comment.
 *
 * Only metadata is kept; `reference` points at bytes stored elsewhere.
 */

import type Database from "better-sqlite3";
import type { Principal } from "../identity/types.js";
import type { Attachment, AttachmentTarget, CreateAttachmentInput } from "./types.js";
import { AccessGuard, type AccessMode, type TaskScope } from "../access/guard.js";
import { runInTransaction, systemClock, type Clock } from "../db/database.js";
import { ForbiddenError, NotFoundError, ValidationError } from "../errors.js";
import { requireName } from "../util/validate.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("attachment-store");

type ResolvedTarget = { column: "task_id" | "comment_id"; id: number };

export class AttachmentStore {
  private guard: AccessGuard;

  constructor(
    private db: Database.Database,
    private clock: Clock = systemClock,
  ) {
    this.guard = new AccessGuard(db);
  }

  list(principal: Principal, target: AttachmentTarget): Attachment[] {
    const { column, id } = resolveTarget(target);
    this.reach(principal, column, id, "read");
    return this.db
      .prepare(`SELECT * FROM attachments WHERE ${column} = ? ORDER BY id ASC`)
      .all(id) as Attachment[];
  }

  get(principal: Principal, id: number): Attachment {
    const attachment = this.find(id);
    if (!attachment) throw new NotFoundError("Attachment", id);
    this.reachOwner(principal, attachment, "read");
    return attachment;
  }

  create(principal: Principal, input: CreateAttachmentInput): Attachment {
    const { column, id: targetId } = resolveTarget(input);
    const filename = requireName(input.filename, "filename");
    const reference = requireName(input.reference, "reference");

    return runInTransaction(this.db, () => {
      this.reach(principal, column, targetId, "write");
      const result = this.db
        .prepare(
          `INSERT INTO attachments (filename, reference, ${column}, uploader_id, created_at)
           VALUES (?, ?, ?, ?, ?)`,
        )
        .run(filename, reference, targetId, principal.userId, this.clock().toISOString());
      const id = Number(result.lastInsertRowid);
      log.info({ id, [column]: targetId }, "attachment created");
      return this.require(id);
    });
  }

  /** The uploader or the owner of the workspace may delete. */
  delete(principal: Principal, id: number): void {
    runInTransaction(this.db, () => {
      const attachment = this.find(id);
      if (!attachment) throw new NotFoundError("Attachment", id);
      const scope = this.reachOwner(principal, attachment, "write");
      if (attachment.uploader_id !== principal.userId && scope.workspace_owner_id !== principal.userId) {
        throw new ForbiddenError(`Only the uploader or the workspace owner may delete attachment ${id}`, {
          attachmentId: id,
        });
      }
      this.db.prepare("DELETE FROM attachments WHERE id = ?").run(id);
      log.info({ id }, "attachment deleted");
    });
  }

  /** Access check against the task that ultimately holds the target. */
  private reach(
    principal: Principal,
    column: ResolvedTarget["column"],
    id: number,
    mode: AccessMode,
    subject = { entity: column === "task_id" ? "Task" : "Comment", id },
  ): TaskScope {
    if (column === "task_id") return this.guard.task(principal, id, mode, subject);
    const comment = this.db.prepare("SELECT task_id FROM comments WHERE id = ?").get(id) as
      | { task_id: number }
      | undefined;
    if (!comment) throw new NotFoundError(subject.entity, subject.id);
    return this.guard.task(principal, comment.task_id, mode, subject);
  }

  private reachOwner(principal: Principal, attachment: Attachment, mode: AccessMode): TaskScope {
    const subject = { entity: "Attachment", id: attachment.id };
    if (attachment.task_id !== null) return this.reach(principal, "task_id", attachment.task_id, mode, subject);
    if (attachment.comment_id !== null) {
      return this.reach(principal, "comment_id", attachment.comment_id, mode, subject);
    }
    throw new Error(`attachment ${attachment.id} has no target`);
  }

  private find(id: number): Attachment | undefined {
    return this.db.prepare("SELECT * FROM attachments WHERE id = ?").get(id) as Attachment | undefined;
  }

  private require(id: number): Attachment {
    const attachment = this.find(id);
    if (!attachment) throw new Error(`attachment ${id} vanished inside its own transaction`);
    return attachment;
  }
}

/** Exactly one of `task_id` and `comment_id`. */
export function resolveTarget(target: AttachmentTarget): ResolvedTarget {
  if (target.task_id != null && target.comment_id == null) return { column: "task_id", id: target.task_id };
  if (target.comment_id != null && target.task_id == null) return { column: "comment_id", id: target.comment_id };
  throw new ValidationError("Exactly one of 'task_id' and 'comment_id' is required", {
    task_id: target.task_id ?? null,
    comment_id: target.comment_id ?? null,
  });
}
