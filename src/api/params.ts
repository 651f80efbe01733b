/**
 * Readers for JSON bodies and query strings. Each one narrows an untyped
 * value to the shape a store input expects or throws a ValidationError that
 * names the offending field.
 */

import type { TaskFilters } from "../tasks/types.js";
import { ValidationError } from "../errors.js";

export type Body = Record<string, unknown>;

function wrongType(key: string, expected: string, value: unknown): ValidationError {
  return new ValidationError(`'${key}' must be ${expected}`, { field: key, value });
}

export function str(body: Body, key: string): string {
  const value = body[key];
  if (typeof value !== "string") throw wrongType(key, "a string", value);
  return value;
}

export function optStr(body: Body, key: string): string | undefined {
  const value = body[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string") throw wrongType(key, "a string", value);
  return value;
}

export function nullableStr(body: Body, key: string): string | null | undefined {
  return body[key] === null ? null : optStr(body, key);
}

export function int(body: Body, key: string): number {
  const value = body[key];
  if (typeof value !== "number" || !Number.isInteger(value)) throw wrongType(key, "an integer", value);
  return value;
}

export function optInt(body: Body, key: string): number | undefined {
  return body[key] === undefined ? undefined : int(body, key);
}

export function nullableInt(body: Body, key: string): number | null | undefined {
  return body[key] === null ? null : optInt(body, key);
}

export function optBool(body: Body, key: string): boolean | undefined {
  const value = body[key];
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") throw wrongType(key, "a boolean", value);
  return value;
}

/** Array of `{ value, color? }` objects, as single-select options arrive. */
export function optOptions(body: Body, key: string): Array<{ value: string; color?: string | null }> | undefined {
  const value = body[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) throw wrongType(key, "an array", value);
  return value.map((item: unknown, i) => {
    if (typeof item !== "object" || item === null || Array.isArray(item)) {
      throw wrongType(`${key}[${i}]`, "an object", item);
    }
    const entry: Body = { ...item };
    return { value: str(entry, "value"), color: nullableStr(entry, "color") };
  });
}

// ── Query strings ───────────────────────────────────────────────────────

function queryInt(params: URLSearchParams, key: string): number | undefined {
  const raw = params.get(key);
  if (raw === null) return undefined;
  if (!/^-?\d+$/.test(raw)) throw wrongType(key, "an integer", raw);
  return Number(raw);
}

function queryBool(params: URLSearchParams, key: string): boolean | undefined {
  const raw = params.get(key);
  if (raw === null) return undefined;
  if (raw !== "true" && raw !== "false") throw wrongType(key, "'true' or 'false'", raw);
  return raw === "true";
}

export function flag(params: URLSearchParams, key: string): boolean {
  return queryBool(params, key) ?? false;
}

/** `GET /api/tasks` query string → TaskFilters. */
export function taskFilters(params: URLSearchParams): TaskFilters {
  const filters: TaskFilters = {
    workspace_id: queryInt(params, "workspace_id"),
    project_id: queryInt(params, "project_id"),
    section_id: queryInt(params, "section_id"),
    tag_id: queryInt(params, "tag_id"),
    completed: queryBool(params, "completed"),
    completed_since: params.get("completed_since") ?? undefined,
    limit: queryInt(params, "limit"),
    offset: queryInt(params, "offset"),
  };

  const parent = params.get("parent_task_id");
  if (parent === "null") {
    filters.parent_task_id = null;
  } else if (parent !== null) {
    filters.parent_task_id = queryInt(params, "parent_task_id");
  }

  const assignee = params.get("assignee");
  if (assignee === "me") {
    filters.assignee = "me";
  } else if (assignee !== null) {
    filters.assignee = queryInt(params, "assignee");
  }

  return filters;
}
