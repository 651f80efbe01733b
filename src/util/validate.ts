import { ValidationError } from "../errors.js";

/** Trimmed, non-empty name or a ValidationError naming the field. */
export function requireName(value: unknown, field = "name"): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new ValidationError(`'${field}' must be a non-empty string`, { field });
  }
  return value.trim();
}

export function requireId(value: unknown, field: string): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`'${field}' must be a positive integer id`, { field, value });
  }
  return value;
}

export function optionalInt(value: unknown, field: string): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new ValidationError(`'${field}' must be an integer`, { field, value });
  }
  return value;
}

/**
 * `YYYY-MM-DD`, or a date-time with an explicit offset. A time without a zone
 * would parse in the host's local time and is refused.
 */
export const ISO_8601 = /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2}))?$/;

/** ISO-8601 instant, normalized to UTC `toISOString()` form. */
export function requireInstant(value: unknown, field: string): string {
  if (typeof value !== "string" || !ISO_8601.test(value) || Number.isNaN(Date.parse(value))) {
    throw new ValidationError(`'${field}' must be an ISO-8601 date or date-time`, { field, value });
  }
  return new Date(value).toISOString();
}

/** Hex colour such as "#ff8800", or null. */
export function optionalColor(value: unknown, field = "color"): string | null | undefined {
  if (value === undefined || value === null) return value;
  if (typeof value !== "string" || !/^#[0-9a-fA-F]{6}$/.test(value)) {
    throw new ValidationError(`'${field}' must be a hex colour like #1a2b3c`, { field, value });
  }
  return value.toLowerCase();
}
