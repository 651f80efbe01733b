/**
 * CustomFieldStore -- per-project field definitions and per-task typed values.
 *
 * Values live in one row per (task, field); setting upserts, clearing deletes
 * the row, so an unset field is simply absent. A field's declared type cannot
 * change while any value of it exists.
 */

import type Database from "better-sqlite3";
import type { Principal } from "../identity/types.js";
import type {
  CustomFieldDefinition,
  DefineFieldInput,
  FieldOption,
  FieldOptionInput,
  FieldType,
  TaskFieldValue,
  UpdateFieldInput,
} from "./types.js";
import { isFieldType } from "./types.js";
import { fromColumns, parseFieldValue, toColumns, type ValueColumns } from "./values.js";
import { AccessGuard } from "../access/guard.js";
import { runInTransaction, systemClock, type Clock } from "../db/database.js";
import { ConflictError, NotFoundError, ValidationError } from "../errors.js";
import { optionalColor, requireName } from "../util/validate.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("custom-field-store");

interface FieldRow {
  id: number;
  name: string;
  value_type: FieldType;
  project_id: number;
  created_at: string;
}

interface ValueRow extends ValueColumns {
  field_id: number;
  field_name: string;
  updated_at: string;
}

export class CustomFieldStore {
  private guard: AccessGuard;

  constructor(
    private db: Database.Database,
    private clock: Clock = systemClock,
  ) {
    this.guard = new AccessGuard(db);
  }

  // ── Definitions ─────────────────────────────────────────────────────

  listFields(principal: Principal, projectId: number): CustomFieldDefinition[] {
    this.guard.project(principal, projectId, "read");
    const rows = this.db
      .prepare("SELECT * FROM custom_fields WHERE project_id = ? ORDER BY id ASC")
      .all(projectId) as FieldRow[];
    return rows.map((row) => this.withOptions(row));
  }

  getField(principal: Principal, id: number): CustomFieldDefinition {
    const row = this.findField(id);
    if (!row) throw new NotFoundError("Custom field", id);
    this.guard.project(principal, row.project_id, "read", { entity: "Custom field", id });
    return this.withOptions(row);
  }

  defineField(principal: Principal, input: DefineFieldInput): CustomFieldDefinition {
    const name = requireName(input.name);
    if (!isFieldType(input.value_type)) {
      throw new ValidationError(`Unknown field type '${String(input.value_type)}'`, { field: "value_type" });
    }
    const options = checkOptions(input.value_type, input.options);

    return runInTransaction(this.db, () => {
      this.guard.project(principal, input.project_id, "write");
      const result = this.db
        .prepare("INSERT INTO custom_fields (name, value_type, project_id, created_at) VALUES (?, ?, ?, ?)")
        .run(name, input.value_type, input.project_id, this.clock().toISOString());
      const id = Number(result.lastInsertRowid);
      this.insertOptions(id, options);
      log.info({ id, name, type: input.value_type, projectId: input.project_id }, "custom field defined");
      return this.withOptions(this.requireField(id));
    });
  }

  /**
   * Rename, retype or replace options. Retyping and replacing options are
   * refused while values exist.
   */
  updateField(principal: Principal, id: number, input: UpdateFieldInput): CustomFieldDefinition {
    return runInTransaction(this.db, () => {
      const field = this.writableField(principal, id);
      const nextType = input.value_type ?? field.value_type;
      if (!isFieldType(nextType)) {
        throw new ValidationError(`Unknown field type '${String(nextType)}'`, { field: "value_type" });
      }
      const typeChanges = nextType !== field.value_type;

      if (input.name !== undefined) {
        this.db.prepare("UPDATE custom_fields SET name = ? WHERE id = ?").run(requireName(input.name), id);
      }

      if (typeChanges || input.options !== undefined) {
        const options = checkOptions(
          nextType,
          input.options ?? (nextType === "single-select" ? this.options(id) : undefined),
        );
        if (this.valueCount(id) > 0) {
          throw new ConflictError(
            typeChanges
              ? `Cannot change the type of field ${id} while values exist`
              : `Cannot replace the options of field ${id} while values exist`,
            { fieldId: id, from: field.value_type, to: nextType },
          );
        }
        this.db.prepare("UPDATE custom_fields SET value_type = ? WHERE id = ?").run(nextType, id);
        this.db.prepare("DELETE FROM custom_field_options WHERE field_id = ?").run(id);
        this.insertOptions(id, options);
      }

      log.info({ id }, "custom field updated");
      return this.withOptions(this.requireField(id));
    });
  }

  /** Removes every value of the field along with it. */
  deleteField(principal: Principal, id: number): void {
    runInTransaction(this.db, () => {
      this.writableField(principal, id);
      const removed = this.valueCount(id);
      this.db.prepare("DELETE FROM custom_fields WHERE id = ?").run(id);
      log.info({ id, values: removed }, "custom field deleted");
    });
  }

  // ── Values ──────────────────────────────────────────────────────────

  listValues(principal: Principal, taskId: number): TaskFieldValue[] {
    this.guard.task(principal, taskId, "read");
    const rows = this.db
      .prepare(
        `SELECT v.*, f.name AS field_name FROM custom_field_values v
         JOIN custom_fields f ON f.id = v.field_id
         WHERE v.task_id = ?
         ORDER BY v.field_id ASC`,
      )
      .all(taskId) as ValueRow[];

    const values: TaskFieldValue[] = [];
    for (const row of rows) {
      const field = this.withOptions(this.requireField(row.field_id));
      const value = fromColumns(field.value_type, row, field.options);
      if (!value) {
        log.error({ taskId, fieldId: row.field_id }, "stored value does not match declared field type");
        continue;
      }
      values.push({ field_id: row.field_id, field_name: row.field_name, value, updated_at: row.updated_at });
    }
    return values;
  }

  /** Upsert: replaces any existing value of the field on the task. */
  setValue(principal: Principal, taskId: number, fieldId: number, payload: unknown): TaskFieldValue {
    return runInTransaction(this.db, () => {
      const scope = this.guard.task(principal, taskId, "write");
      const field = this.fieldForTask(fieldId, scope.project_id);
      const value = parseFieldValue(field, payload);
      const columns = toColumns(value);
      const now = this.clock().toISOString();

      this.db
        .prepare(
          `INSERT INTO custom_field_values
             (task_id, field_id, value_text, value_number, value_date, value_boolean, value_option_id, updated_at)
           VALUES (@task_id, @field_id, @value_text, @value_number, @value_date, @value_boolean, @value_option_id, @updated_at)
           ON CONFLICT(task_id, field_id) DO UPDATE SET
             value_text = excluded.value_text,
             value_number = excluded.value_number,
             value_date = excluded.value_date,
             value_boolean = excluded.value_boolean,
             value_option_id = excluded.value_option_id,
             updated_at = excluded.updated_at`,
        )
        .run({ task_id: taskId, field_id: fieldId, ...columns, updated_at: now });

      log.info({ taskId, fieldId, type: value.type }, "custom field value set");
      return { field_id: fieldId, field_name: field.name, value, updated_at: now };
    });
  }

  /** Idempotent: clearing an unset value succeeds. */
  clearValue(principal: Principal, taskId: number, fieldId: number): void {
    runInTransaction(this.db, () => {
      const scope = this.guard.task(principal, taskId, "write");
      this.fieldForTask(fieldId, scope.project_id);
      const result = this.db
        .prepare("DELETE FROM custom_field_values WHERE task_id = ? AND field_id = ?")
        .run(taskId, fieldId);
      if (result.changes > 0) log.info({ taskId, fieldId }, "custom field value cleared");
    });
  }

  // ── Helpers ─────────────────────────────────────────────────────────

  private fieldForTask(fieldId: number, projectId: number): CustomFieldDefinition {
    const row = this.findField(fieldId);
    if (!row) throw new NotFoundError("Custom field", fieldId);
    if (row.project_id !== projectId) {
      throw new ValidationError(`Custom field ${fieldId} does not belong to the task's project`, {
        fieldId,
        projectId,
      });
    }
    return this.withOptions(row);
  }

  private writableField(principal: Principal, id: number): FieldRow {
    const row = this.findField(id);
    if (!row) throw new NotFoundError("Custom field", id);
    this.guard.project(principal, row.project_id, "write", { entity: "Custom field", id });
    return row;
  }

  private findField(id: number): FieldRow | undefined {
    return this.db.prepare("SELECT * FROM custom_fields WHERE id = ?").get(id) as FieldRow | undefined;
  }

  private requireField(id: number): FieldRow {
    const row = this.findField(id);
    if (!row) throw new Error(`custom field ${id} vanished inside its own transaction`);
    return row;
  }

  private options(fieldId: number): FieldOption[] {
    return this.db
      .prepare("SELECT id, value, color, position FROM custom_field_options WHERE field_id = ? ORDER BY position ASC, id ASC")
      .all(fieldId) as FieldOption[];
  }

  private withOptions(row: FieldRow): CustomFieldDefinition {
    return { ...row, options: row.value_type === "single-select" ? this.options(row.id) : [] };
  }

  private insertOptions(fieldId: number, options: FieldOptionInput[]): void {
    const insert = this.db.prepare(
      "INSERT INTO custom_field_options (field_id, value, color, position) VALUES (?, ?, ?, ?)",
    );
    options.forEach((option, position) => {
      insert.run(fieldId, option.value, option.color ?? null, position);
    });
  }

  private valueCount(fieldId: number): number {
    const row = this.db
      .prepare("SELECT COUNT(*) AS count FROM custom_field_values WHERE field_id = ?")
      .get(fieldId) as { count: number };
    return row.count;
  }
}

/**
 * Options are required and non-empty for single-select and forbidden for
 * every other type. Values are trimmed and must be unique within the field.
 */
export function checkOptions(type: FieldType, options: FieldOptionInput[] | undefined): FieldOptionInput[] {
  if (type !== "single-select") {
    if (options !== undefined && options.length > 0) {
      throw new ValidationError(`Options are only allowed on single-select fields, not '${type}'`, {
        field: "options",
      });
    }
    return [];
  }

  if (!options || options.length === 0) {
    throw new ValidationError("A single-select field needs at least one option", { field: "options" });
  }

  const seen = new Set<string>();
  return options.map((option, i) => {
    const value = requireName(option.value, `options[${i}].value`);
    if (seen.has(value)) {
      throw new ValidationError(`Duplicate option '${value}'`, { field: "options" });
    }
    seen.add(value);
    const color = optionalColor(option.color, `options[${i}].color`);
    return { value, color: color ?? null };
  });
}
