export const FIELD_TYPES = ["text", "number", "date", "boolean", "single-select"] as const;

export type FieldType = (typeof FIELD_TYPES)[number];

export function isFieldType(value: unknown): value is FieldType {
  return typeof value === "string" && (FIELD_TYPES as readonly string[]).includes(value);
}

export interface FieldOption {
  id: number;
  value: string;
  color: string | null;
  position: number;
}

export interface FieldOptionInput {
  value: string;
  color?: string | null;
}

export interface CustomFieldDefinition {
  id: number;
  name: string;
  value_type: FieldType;
  project_id: number;
  created_at: string;
  /** Ordered by position; empty unless `value_type` is "single-select". */
  options: FieldOption[];
}

export interface DefineFieldInput {
  project_id: number;
  name: string;
  value_type: FieldType;
  options?: FieldOptionInput[];
}

export interface UpdateFieldInput {
  name?: string;
  value_type?: FieldType;
  options?: FieldOptionInput[];
}

/** A stored value, tagged by the type of the field it belongs to. */
export type FieldValue =
  | { type: "text"; value: string }
  | { type: "number"; value: number }
  | { type: "date"; value: string }
  | { type: "boolean"; value: boolean }
  | { type: "single-select"; option_id: number; value: string };

export interface TaskFieldValue {
  field_id: number;
  field_name: string;
  value: FieldValue;
  updated_at: string;
}
