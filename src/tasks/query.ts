/**
 * TaskQuery -- filtered, paginated reads over the task collection.
 *
 * Predicates are AND-combined. Pages are ordered by id, never by position,
 * so a client walking offsets sees each task once even while others reorder.
 */

import type Database from "better-sqlite3";
import type { Principal } from "../identity/types.js";
import type { TaskFilters, TaskPage, TaskRow } from "./types.js";
import type { LimitsConfig } from "../config.js";
import { toTask } from "./store.js";
import { AccessGuard } from "../access/guard.js";
import { DEFAULT_LIMITS } from "../config.js";
import { runInTransaction } from "../db/database.js";
import { ValidationError } from "../errors.js";
import { requireInstant } from "../util/validate.js";

type PageLimits = Pick<LimitsConfig, "defaultPageSize" | "maxPageSize">;

export class TaskQuery {
  private guard: AccessGuard;

  constructor(
    private db: Database.Database,
    private limits: PageLimits = DEFAULT_LIMITS,
  ) {
    this.guard = new AccessGuard(db);
  }

  query(principal: Principal, filters: TaskFilters): TaskPage {
    const limit = filters.limit ?? this.limits.defaultPageSize;
    const offset = filters.offset ?? 0;
    if (!Number.isInteger(limit) || limit < 1 || limit > this.limits.maxPageSize) {
      throw new ValidationError(`'limit' must be an integer between 1 and ${this.limits.maxPageSize}`, {
        field: "limit",
        value: limit,
      });
    }
    if (!Number.isInteger(offset) || offset < 0) {
      throw new ValidationError("'offset' must be a non-negative integer", { field: "offset", value: offset });
    }
    // Past this SQLite receives a REAL and refuses it as an OFFSET.
    if (!Number.isSafeInteger(offset)) {
      throw new ValidationError(`'offset' must not exceed ${Number.MAX_SAFE_INTEGER}`, {
        field: "offset",
        value: offset,
      });
    }

    const clauses: string[] = [];
    const params: unknown[] = [];

    if (filters.project_id !== undefined) {
      const scope = this.guard.project(principal, filters.project_id, "read");
      if (filters.workspace_id !== undefined && filters.workspace_id !== scope.workspace_id) {
        throw new ValidationError(`Project ${filters.project_id} is not in workspace ${filters.workspace_id}`, {
          projectId: filters.project_id,
          workspaceId: filters.workspace_id,
        });
      }
      clauses.push("t.project_id = ?");
      params.push(filters.project_id);
    } else if (filters.workspace_id !== undefined) {
      this.guard.workspace(principal, filters.workspace_id, "read");
      clauses.push("p.workspace_id = ?");
      params.push(filters.workspace_id);
    } else {
      throw new ValidationError("A task query needs a 'workspace_id' or 'project_id' scope");
    }

    if (filters.assignee !== undefined) {
      clauses.push("t.assignee_id = ?");
      params.push(filters.assignee === "me" ? principal.userId : filters.assignee);
    }
    if (filters.completed !== undefined) {
      clauses.push(filters.completed ? "t.completed_at IS NOT NULL" : "t.completed_at IS NULL");
    }
    if (filters.completed_since !== undefined) {
      clauses.push("t.completed_at IS NOT NULL AND t.completed_at >= ?");
      params.push(requireInstant(filters.completed_since, "completed_since"));
    }
    if (filters.section_id !== undefined) {
      clauses.push("t.section_id = ?");
      params.push(filters.section_id);
    }
    if (filters.tag_id !== undefined) {
      clauses.push("EXISTS (SELECT 1 FROM task_tags tt WHERE tt.task_id = t.id AND tt.tag_id = ?)");
      params.push(filters.tag_id);
    }
    if (filters.parent_task_id !== undefined) {
      if (filters.parent_task_id === null) {
        clauses.push("t.parent_task_id IS NULL");
      } else {
        clauses.push("t.parent_task_id = ?");
        params.push(filters.parent_task_id);
      }
    }

    const from = `FROM tasks t JOIN projects p ON p.id = t.project_id WHERE ${clauses.join(" AND ")}`;

    // Count and page read under one snapshot.
    return runInTransaction(this.db, () => {
      const { total } = this.db.prepare(`SELECT COUNT(*) AS total ${from}`).get(...params) as {
        total: number;
      };
      const rows = this.db
        .prepare(`SELECT t.* ${from} ORDER BY t.id ASC LIMIT ? OFFSET ?`)
        .all(...params, limit, offset) as TaskRow[];
      return { data: rows.map(toTask), pagination: { total, limit, offset } };
    });
  }
}
