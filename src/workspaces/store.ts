/**
 * WorkspaceStore -- SQLite-backed CRUD for workspaces and their membership.
 *
 * Deleting a workspace removes its teams, projects and tags, and through
 * them every section, task, comment, attachment and custom field below.
 */

import type Database from "better-sqlite3";
import type { Principal } from "../identity/types.js";
import type {
  Workspace,
  CreateWorkspaceInput,
  UpdateWorkspaceInput,
  ListWorkspacesOptions,
} from "./types.js";
import { AccessGuard } from "../access/guard.js";
import { runInTransaction, systemClock, type Clock } from "../db/database.js";
import { ForbiddenError, ValidationError } from "../errors.js";
import { requireId, requireName } from "../util/validate.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("workspace-store");

export class WorkspaceStore {
  private guard: AccessGuard;

  constructor(
    private db: Database.Database,
    private clock: Clock = systemClock,
  ) {
    this.guard = new AccessGuard(db);
  }

  /**
   * Workspaces the principal belongs to, in creation order. `all` lists every
   * workspace and is reserved for admin principals.
   */
  list(principal: Principal, options: ListWorkspacesOptions = {}): Workspace[] {
    if (options.all) {
      if (!principal.admin) {
        throw new ForbiddenError("Listing all workspaces requires the admin capability");
      }
      return this.db.prepare("SELECT * FROM workspaces ORDER BY id ASC").all() as Workspace[];
    }
    return this.db
      .prepare(
        `SELECT w.* FROM workspaces w
         JOIN workspace_members m ON m.workspace_id = w.id
         WHERE m.user_id = ?
         ORDER BY w.id ASC`,
      )
      .all(principal.userId) as Workspace[];
  }

  get(principal: Principal, id: number): Workspace {
    this.guard.workspace(principal, id, "read");
    return this.row(id);
  }

  create(principal: Principal, input: CreateWorkspaceInput): Workspace {
    const name = requireName(input.name);
    return runInTransaction(this.db, () => {
      const now = this.clock().toISOString();
      const result = this.db
        .prepare("INSERT INTO workspaces (name, owner_id, created_at, updated_at) VALUES (?, ?, ?, ?)")
        .run(name, principal.userId, now, now);
      const id = Number(result.lastInsertRowid);
      this.db
        .prepare("INSERT INTO workspace_members (workspace_id, user_id) VALUES (?, ?)")
        .run(id, principal.userId);
      log.info({ id, name, owner: principal.userId }, "workspace created");
      return this.row(id);
    });
  }

  update(principal: Principal, id: number, input: UpdateWorkspaceInput): Workspace {
    return runInTransaction(this.db, () => {
      const scope = this.guard.workspace(principal, id, "write");
      this.guard.requireWorkspaceOwner(principal, scope, "update the workspace");

      if (input.name === undefined) return this.row(id);

      this.db
        .prepare("UPDATE workspaces SET name = ?, updated_at = ? WHERE id = ?")
        .run(requireName(input.name), this.clock().toISOString(), id);
      log.info({ id }, "workspace updated");
      return this.row(id);
    });
  }

  delete(principal: Principal, id: number): void {
    runInTransaction(this.db, () => {
      const scope = this.guard.workspace(principal, id, "write");
      this.guard.requireWorkspaceOwner(principal, scope, "delete the workspace");
      this.db.prepare("DELETE FROM workspaces WHERE id = ?").run(id);
      log.info({ id }, "workspace deleted");
    });
  }

  listMembers(principal: Principal, id: number): number[] {
    this.guard.workspace(principal, id, "read");
    const rows = this.db
      .prepare("SELECT user_id FROM workspace_members WHERE workspace_id = ? ORDER BY rowid ASC")
      .all(id) as Array<{ user_id: number }>;
    return rows.map((r) => r.user_id);
  }

  /** Idempotent: adding an existing member is a no-op. */
  addMember(principal: Principal, id: number, userId: number): void {
    requireId(userId, "user_id");
    runInTransaction(this.db, () => {
      const scope = this.guard.workspace(principal, id, "write");
      this.guard.requireWorkspaceOwner(principal, scope, "add members");
      const result = this.db
        .prepare("INSERT OR IGNORE INTO workspace_members (workspace_id, user_id) VALUES (?, ?)")
        .run(id, userId);
      if (result.changes > 0) log.info({ id, userId }, "workspace member added");
    });
  }

  /** Idempotent. Also drops the user from the workspace's teams. */
  removeMember(principal: Principal, id: number, userId: number): void {
    requireId(userId, "user_id");
    runInTransaction(this.db, () => {
      const scope = this.guard.workspace(principal, id, "write");
      this.guard.requireWorkspaceOwner(principal, scope, "remove members");
      if (userId === scope.workspace_owner_id) {
        throw new ValidationError("The workspace owner cannot be removed", { workspaceId: id, userId });
      }
      const result = this.db
        .prepare("DELETE FROM workspace_members WHERE workspace_id = ? AND user_id = ?")
        .run(id, userId);
      this.db
        .prepare(
          `DELETE FROM team_members
           WHERE user_id = ? AND team_id IN (SELECT id FROM teams WHERE workspace_id = ?)`,
        )
        .run(userId, id);
      if (result.changes > 0) log.info({ id, userId }, "workspace member removed");
    });
  }

  private row(id: number): Workspace {
    const workspace = this.db.prepare("SELECT * FROM workspaces WHERE id = ?").get(id) as
      | Workspace
      | undefined;
    if (!workspace) throw new Error(`workspace ${id} missing after access check`);
    return workspace;
  }
}
