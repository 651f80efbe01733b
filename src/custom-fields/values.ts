/**
 * Typed value codec for custom fields.
 *
 * A payload is checked against the field's *declared* type through the
 * PARSERS table, never by sniffing the payload. Each parsed value populates
 * exactly one storage column.
 */

import type { CustomFieldDefinition, FieldOption, FieldType, FieldValue } from "./types.js";
import { ValidationError } from "../errors.js";
import { ISO_8601 } from "../util/validate.js";

/** The five storage columns of custom_field_values; exactly one is non-null. */
export interface ValueColumns {
  value_text: string | null;
  value_number: number | null;
  value_date: string | null;
  value_boolean: number | null;
  value_option_id: number | null;
}

type Parser<T extends FieldType> = (
  payload: unknown,
  options: FieldOption[],
) => Extract<FieldValue, { type: T }>;

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

function mismatch(type: FieldType, payload: unknown): ValidationError {
  return new ValidationError(`Value does not match field type '${type}'`, {
    expected: type,
    actual: payload === null ? "null" : typeof payload,
  });
}

const PARSERS: { [T in FieldType]: Parser<T> } = {
  text: (payload) => {
    if (typeof payload !== "string") throw mismatch("text", payload);
    return { type: "text", value: payload };
  },

  number: (payload) => {
    if (typeof payload !== "number" || !Number.isFinite(payload)) throw mismatch("number", payload);
    return { type: "number", value: payload };
  },

  // Calendar dates stay as YYYY-MM-DD; instants are normalized to UTC.
  date: (payload) => {
    if (typeof payload !== "string") throw mismatch("date", payload);
    if (DATE_ONLY.test(payload)) {
      const parsed = new Date(`${payload}T00:00:00Z`);
      if (Number.isNaN(parsed.getTime()) || parsed.toISOString().slice(0, 10) !== payload) {
        throw new ValidationError(`'${payload}' is not a calendar date`, { expected: "date" });
      }
      return { type: "date", value: payload };
    }
    const ms = ISO_8601.test(payload) ? Date.parse(payload) : Number.NaN;
    if (Number.isNaN(ms)) {
      throw new ValidationError(`'${payload}' is not an ISO-8601 date or date-time`, { expected: "date" });
    }
    return { type: "date", value: new Date(ms).toISOString() };
  },

  boolean: (payload) => {
    if (typeof payload !== "boolean") throw mismatch("boolean", payload);
    return { type: "boolean", value: payload };
  },

  // An option id, or the option's value.
  "single-select": (payload, options) => {
    let option: FieldOption | undefined;
    if (typeof payload === "number") {
      option = options.find((o) => o.id === payload);
    } else if (typeof payload === "string") {
      option = options.find((o) => o.value === payload);
    } else {
      throw mismatch("single-select", payload);
    }
    if (!option) {
      throw new ValidationError(`'${String(payload)}' is not an option of this field`, {
        expected: options.map((o) => o.value),
      });
    }
    return { type: "single-select", option_id: option.id, value: option.value };
  },
};

export function parseFieldValue(field: CustomFieldDefinition, payload: unknown): FieldValue {
  const parse = PARSERS[field.value_type];
  return parse(payload, field.options);
}

export function toColumns(value: FieldValue): ValueColumns {
  const columns: ValueColumns = {
    value_text: null,
    value_number: null,
    value_date: null,
    value_boolean: null,
    value_option_id: null,
  };
  switch (value.type) {
    case "text":
      columns.value_text = value.value;
      break;
    case "number":
      columns.value_number = value.value;
      break;
    case "date":
      columns.value_date = value.value;
      break;
    case "boolean":
      columns.value_boolean = value.value ? 1 : 0;
      break;
    case "single-select":
      columns.value_option_id = value.option_id;
      break;
  }
  return columns;
}

/**
 * Rebuild the tagged value from its row. Returns undefined when the populated
 * column does not match the declared type, which the store treats as corrupt.
 */
export function fromColumns(type: FieldType, row: ValueColumns, options: FieldOption[]): FieldValue | undefined {
  switch (type) {
    case "text":
      return row.value_text === null ? undefined : { type, value: row.value_text };
    case "number":
      return row.value_number === null ? undefined : { type, value: row.value_number };
    case "date":
      return row.value_date === null ? undefined : { type, value: row.value_date };
    case "boolean":
      return row.value_boolean === null ? undefined : { type, value: row.value_boolean === 1 };
    case "single-select": {
      const option = options.find((o) => o.id === row.value_option_id);
      return option ? { type, option_id: option.id, value: option.value } : undefined;
    }
  }
}
