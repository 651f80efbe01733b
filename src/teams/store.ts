/**
 * TeamStore -- teams inside a workspace and their member sets.
 *
 * A team member must already belong to the team's workspace.
 */

import type Database from "better-sqlite3";
import type { Principal } from "../identity/types.js";
import type { Team, TeamWithMembers, CreateTeamInput } from "./types.js";
import { AccessGuard } from "../access/guard.js";
import { runInTransaction, systemClock, type Clock } from "../db/database.js";
import { NotFoundError, ValidationError } from "../errors.js";
import { requireId, requireName } from "../util/validate.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("team-store");

export class TeamStore {
  private guard: AccessGuard;

  constructor(
    private db: Database.Database,
    private clock: Clock = systemClock,
  ) {
    this.guard = new AccessGuard(db);
  }

  list(principal: Principal, workspaceId: number): TeamWithMembers[] {
    this.guard.workspace(principal, workspaceId, "read");
    const teams = this.db
      .prepare("SELECT * FROM teams WHERE workspace_id = ? ORDER BY id ASC")
      .all(workspaceId) as Team[];
    return teams.map((team) => this.withMembers(team));
  }

  get(principal: Principal, id: number): TeamWithMembers {
    const team = this.find(id);
    if (!team) throw new NotFoundError("Team", id);
    this.guard.workspace(principal, team.workspace_id, "read", { entity: "Team", id });
    return this.withMembers(team);
  }

  create(principal: Principal, input: CreateTeamInput): TeamWithMembers {
    const name = requireName(input.name);
    return runInTransaction(this.db, () => {
      this.guard.workspace(principal, input.workspace_id, "write");
      const result = this.db
        .prepare("INSERT INTO teams (name, workspace_id, created_at) VALUES (?, ?, ?)")
        .run(name, input.workspace_id, this.clock().toISOString());
      const id = Number(result.lastInsertRowid);
      log.info({ id, name, workspaceId: input.workspace_id }, "team created");
      return this.withMembers(this.require(id));
    });
  }

  /** Projects of the team keep existing with `team_id` cleared. */
  delete(principal: Principal, id: number): void {
    runInTransaction(this.db, () => {
      const team = this.writable(principal, id);
      this.db.prepare("DELETE FROM teams WHERE id = ?").run(team.id);
      log.info({ id }, "team deleted");
    });
  }

  /** Idempotent. */
  addMember(principal: Principal, id: number, userId: number): TeamWithMembers {
    requireId(userId, "user_id");
    return runInTransaction(this.db, () => {
      const team = this.writable(principal, id);
      if (!this.guard.isMember({ userId, admin: false }, team.workspace_id)) {
        throw new ValidationError(`User ${userId} is not a member of workspace ${team.workspace_id}`, {
          teamId: id,
          userId,
        });
      }
      const result = this.db
        .prepare("INSERT OR IGNORE INTO team_members (team_id, user_id) VALUES (?, ?)")
        .run(id, userId);
      if (result.changes > 0) log.info({ id, userId }, "team member added");
      return this.withMembers(team);
    });
  }

  /** Idempotent. */
  removeMember(principal: Principal, id: number, userId: number): TeamWithMembers {
    requireId(userId, "user_id");
    return runInTransaction(this.db, () => {
      const team = this.writable(principal, id);
      const result = this.db
        .prepare("DELETE FROM team_members WHERE team_id = ? AND user_id = ?")
        .run(id, userId);
      if (result.changes > 0) log.info({ id, userId }, "team member removed");
      return this.withMembers(team);
    });
  }

  private writable(principal: Principal, id: number): Team {
    const team = this.find(id);
    if (!team) throw new NotFoundError("Team", id);
    this.guard.workspace(principal, team.workspace_id, "write", { entity: "Team", id });
    return team;
  }

  private find(id: number): Team | undefined {
    return this.db.prepare("SELECT * FROM teams WHERE id = ?").get(id) as Team | undefined;
  }

  private require(id: number): Team {
    const team = this.find(id);
    if (!team) throw new Error(`team ${id} vanished inside its own transaction`);
    return team;
  }

  private withMembers(team: Team): TeamWithMembers {
    const rows = this.db
      .prepare("SELECT user_id FROM team_members WHERE team_id = ? ORDER BY rowid ASC")
      .all(team.id) as Array<{ user_id: number }>;
    return { ...team, member_ids: rows.map((r) => r.user_id) };
  }
}
