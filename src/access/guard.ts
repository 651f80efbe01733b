/**
 * AccessGuard -- existence and membership checks shared by every store.
 *
 * Visibility is workspace membership. Reads of anything outside the
 * principal's workspaces answer NotFound; writes to an existing entity by a
 * non-member answer Forbidden.
 */

import type Database from "better-sqlite3";
import type { Principal } from "../identity/types.js";
import { ForbiddenError, NotFoundError } from "../errors.js";

export type AccessMode = "read" | "write";

export interface Subject {
  entity: string;
  id: number;
}

export interface WorkspaceScope {
  workspace_id: number;
  workspace_owner_id: number;
}

export interface ProjectScope extends WorkspaceScope {
  project_id: number;
  project_owner_id: number;
}

export interface TaskScope extends ProjectScope {
  task_id: number;
}

export class AccessGuard {
  constructor(private db: Database.Database) {}

  isMember(principal: Principal, workspaceId: number): boolean {
    const row = this.db
      .prepare("SELECT 1 FROM workspace_members WHERE workspace_id = ? AND user_id = ?")
      .get(workspaceId, principal.userId);
    return row !== undefined;
  }

  /**
   * `subject` names the child entity being reached through the workspace, so
   * an invisible team or tag reports itself as not found rather than its
   * workspace.
   */
  workspace(
    principal: Principal,
    workspaceId: number,
    mode: AccessMode,
    subject: Subject = { entity: "Workspace", id: workspaceId },
  ): WorkspaceScope {
    const scope = this.db
      .prepare("SELECT id AS workspace_id, owner_id AS workspace_owner_id FROM workspaces WHERE id = ?")
      .get(workspaceId) as WorkspaceScope | undefined;
    return this.check(principal, scope, subject, mode);
  }

  project(
    principal: Principal,
    projectId: number,
    mode: AccessMode,
    subject: Subject = { entity: "Project", id: projectId },
  ): ProjectScope {
    const scope = this.db
      .prepare(
        `SELECT p.id AS project_id, p.owner_id AS project_owner_id,
                w.id AS workspace_id, w.owner_id AS workspace_owner_id
         FROM projects p JOIN workspaces w ON w.id = p.workspace_id
         WHERE p.id = ?`,
      )
      .get(projectId) as ProjectScope | undefined;
    return this.check(principal, scope, subject, mode);
  }

  task(
    principal: Principal,
    taskId: number,
    mode: AccessMode,
    subject: Subject = { entity: "Task", id: taskId },
  ): TaskScope {
    const scope = this.db
      .prepare(
        `SELECT t.id AS task_id, p.id AS project_id, p.owner_id AS project_owner_id,
                w.id AS workspace_id, w.owner_id AS workspace_owner_id
         FROM tasks t
         JOIN projects p ON p.id = t.project_id
         JOIN workspaces w ON w.id = p.workspace_id
         WHERE t.id = ?`,
      )
      .get(taskId) as TaskScope | undefined;
    return this.check(principal, scope, subject, mode);
  }

  /** Owner of the project, or owner of its workspace. */
  requireProjectOwner(principal: Principal, scope: ProjectScope, action: string): void {
    if (principal.userId !== scope.project_owner_id && principal.userId !== scope.workspace_owner_id) {
      throw new ForbiddenError(`Only the project or workspace owner may ${action}`, {
        projectId: scope.project_id,
      });
    }
  }

  requireWorkspaceOwner(principal: Principal, scope: WorkspaceScope, action: string): void {
    if (principal.userId !== scope.workspace_owner_id) {
      throw new ForbiddenError(`Only the workspace owner may ${action}`, {
        workspaceId: scope.workspace_id,
      });
    }
  }

  private check<S extends WorkspaceScope>(
    principal: Principal,
    scope: S | undefined,
    subject: Subject,
    mode: AccessMode,
  ): S {
    if (!scope) throw new NotFoundError(subject.entity, subject.id);
    if (this.isMember(principal, scope.workspace_id)) return scope;
    if (mode === "read") throw new NotFoundError(subject.entity, subject.id);
    throw new ForbiddenError("Not a member of workspace", { workspaceId: scope.workspace_id });
  }
}
