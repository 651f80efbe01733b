/**
 * SectionStore -- ordered groupings of tasks within a project.
 *
 * Listed by position, ties by id. Deleting a section leaves its tasks in the
 * project with `section_id` cleared.
 */

import type Database from "better-sqlite3";
import type { Principal } from "../identity/types.js";
import type { Section, CreateSectionInput, UpdateSectionInput } from "./types.js";
import { AccessGuard } from "../access/guard.js";
import { runInTransaction, systemClock, type Clock } from "../db/database.js";
import { NotFoundError } from "../errors.js";
import { optionalInt, requireName } from "../util/validate.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("section-store");

export class SectionStore {
  private guard: AccessGuard;

  constructor(
    private db: Database.Database,
    private clock: Clock = systemClock,
  ) {
    this.guard = new AccessGuard(db);
  }

  list(principal: Principal, projectId: number): Section[] {
    this.guard.project(principal, projectId, "read");
    return this.db
      .prepare("SELECT * FROM sections WHERE project_id = ? ORDER BY position ASC, id ASC")
      .all(projectId) as Section[];
  }

  get(principal: Principal, id: number): Section {
    const section = this.find(id);
    if (!section) throw new NotFoundError("Section", id);
    this.guard.project(principal, section.project_id, "read", { entity: "Section", id });
    return section;
  }

  create(principal: Principal, input: CreateSectionInput): Section {
    const name = requireName(input.name);
    const explicit = optionalInt(input.position, "position");
    return runInTransaction(this.db, () => {
      this.guard.project(principal, input.project_id, "write");
      const position = explicit ?? this.nextPosition(input.project_id);
      const result = this.db
        .prepare("INSERT INTO sections (name, project_id, position, created_at) VALUES (?, ?, ?, ?)")
        .run(name, input.project_id, position, this.clock().toISOString());
      const id = Number(result.lastInsertRowid);
      log.info({ id, name, projectId: input.project_id }, "section created");
      return this.require(id);
    });
  }

  update(principal: Principal, id: number, input: UpdateSectionInput): Section {
    return runInTransaction(this.db, () => {
      const section = this.writable(principal, id);

      const fields: string[] = [];
      const values: unknown[] = [];

      if (input.name !== undefined) {
        fields.push("name = ?");
        values.push(requireName(input.name));
      }
      const position = optionalInt(input.position, "position");
      if (position !== undefined) {
        fields.push("position = ?");
        values.push(position);
      }

      if (fields.length === 0) return section;

      values.push(id);
      this.db.prepare(`UPDATE sections SET ${fields.join(", ")} WHERE id = ?`).run(...values);
      log.info({ id }, "section updated");
      return this.require(id);
    });
  }

  delete(principal: Principal, id: number): void {
    runInTransaction(this.db, () => {
      this.writable(principal, id);
      this.db.prepare("DELETE FROM sections WHERE id = ?").run(id);
      log.info({ id }, "section deleted");
    });
  }

  private nextPosition(projectId: number): number {
    const row = this.db
      .prepare("SELECT COALESCE(MAX(position) + 1, 0) AS next FROM sections WHERE project_id = ?")
      .get(projectId) as { next: number };
    return row.next;
  }

  private writable(principal: Principal, id: number): Section {
    const section = this.find(id);
    if (!section) throw new NotFoundError("Section", id);
    this.guard.project(principal, section.project_id, "write", { entity: "Section", id });
    return section;
  }

  private find(id: number): Section | undefined {
    return this.db.prepare("SELECT * FROM sections WHERE id = ?").get(id) as Section | undefined;
  }

  private require(id: number): Section {
    const section = this.find(id);
    if (!section) throw new Error(`section ${id} vanished inside its own transaction`);
    return section;
  }
}
