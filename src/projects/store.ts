/**
 * ProjectStore -- SQLite-backed CRUD for projects.
 *
 * Deleting a project removes its sections, tasks (with their comments,
 * attachments, tag links and values) and custom field definitions.
 */

import type Database from "better-sqlite3";
import type { Principal } from "../identity/types.js";
import type { Project, ProjectRow, CreateProjectInput, UpdateProjectInput } from "./types.js";
import { AccessGuard } from "../access/guard.js";
import { runInTransaction, systemClock, type Clock } from "../db/database.js";
import { NotFoundError, ValidationError } from "../errors.js";
import { requireName } from "../util/validate.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("project-store");

function toProject(row: ProjectRow): Project {
  return { ...row, is_public: row.is_public === 1 };
}

export class ProjectStore {
  private guard: AccessGuard;

  constructor(
    private db: Database.Database,
    private clock: Clock = systemClock,
  ) {
    this.guard = new AccessGuard(db);
  }

  list(principal: Principal, workspaceId: number): Project[] {
    this.guard.workspace(principal, workspaceId, "read");
    const rows = this.db
      .prepare("SELECT * FROM projects WHERE workspace_id = ? ORDER BY id ASC")
      .all(workspaceId) as ProjectRow[];
    return rows.map(toProject);
  }

  get(principal: Principal, id: number): Project {
    this.guard.project(principal, id, "read");
    return this.row(id);
  }

  create(principal: Principal, input: CreateProjectInput): Project {
    const name = requireName(input.name);
    return runInTransaction(this.db, () => {
      this.guard.workspace(principal, input.workspace_id, "write");
      if (input.team_id != null) {
        this.checkTeam(input.team_id, input.workspace_id);
      }

      const now = this.clock().toISOString();
      const result = this.db
        .prepare(
          `INSERT INTO projects (name, description, workspace_id, team_id, owner_id, is_public, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          name,
          input.description ?? null,
          input.workspace_id,
          input.team_id ?? null,
          principal.userId,
          input.is_public === false ? 0 : 1,
          now,
          now,
        );
      const id = Number(result.lastInsertRowid);
      log.info({ id, name, workspaceId: input.workspace_id }, "project created");
      return this.row(id);
    });
  }

  update(principal: Principal, id: number, input: UpdateProjectInput): Project {
    return runInTransaction(this.db, () => {
      const scope = this.guard.project(principal, id, "write");
      this.guard.requireProjectOwner(principal, scope, "update the project");

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
      if (input.team_id !== undefined) {
        if (input.team_id !== null) this.checkTeam(input.team_id, scope.workspace_id);
        fields.push("team_id = ?");
        values.push(input.team_id);
      }
      if (input.is_public !== undefined) {
        fields.push("is_public = ?");
        values.push(input.is_public ? 1 : 0);
      }

      if (fields.length === 0) return this.row(id);

      fields.push("updated_at = ?");
      values.push(this.clock().toISOString(), id);

      this.db.prepare(`UPDATE projects SET ${fields.join(", ")} WHERE id = ?`).run(...values);
      log.info({ id }, "project updated");
      return this.row(id);
    });
  }

  delete(principal: Principal, id: number): void {
    runInTransaction(this.db, () => {
      const scope = this.guard.project(principal, id, "write");
      this.guard.requireProjectOwner(principal, scope, "delete the project");
      this.db.prepare("DELETE FROM projects WHERE id = ?").run(id);
      log.info({ id }, "project deleted");
    });
  }

  private checkTeam(teamId: number, workspaceId: number): void {
    const team = this.db.prepare("SELECT workspace_id FROM teams WHERE id = ?").get(teamId) as
      | { workspace_id: number }
      | undefined;
    if (!team) throw new NotFoundError("Team", teamId);
    if (team.workspace_id !== workspaceId) {
      throw new ValidationError(`Team ${teamId} belongs to a different workspace`, {
        teamId,
        workspaceId,
      });
    }
  }

  private row(id: number): Project {
    const row = this.db.prepare("SELECT * FROM projects WHERE id = ?").get(id) as ProjectRow | undefined;
    if (!row) throw new NotFoundError("Project", id);
    return toProject(row);
  }
}
