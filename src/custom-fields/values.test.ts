import { describe, it, expect } from "vitest";
import { fromColumns, parseFieldValue, toColumns } from "./values.js";
import type { CustomFieldDefinition, FieldType } from "./types.js";
import { ValidationError } from "../errors.js";

function field(value_type: FieldType): CustomFieldDefinition {
  return {
    id: 1,
    name: "F",
    value_type,
    project_id: 1,
    created_at: "2024-03-01T09:00:00.000Z",
    options:
      value_type === "single-select"
        ? [
            { id: 10, value: "low", color: null, position: 0 },
            { id: 11, value: "high", color: "#ff0000", position: 1 },
          ]
        : [],
  };
}

const EMPTY = { value_text: null, value_number: null, value_date: null, value_boolean: null, value_option_id: null };

describe("parseFieldValue", () => {
  it("checks the payload against the declared type", () => {
    expect(parseFieldValue(field("text"), "hello")).toEqual({ type: "text", value: "hello" });
    expect(parseFieldValue(field("number"), 2.5)).toEqual({ type: "number", value: 2.5 });
    expect(parseFieldValue(field("boolean"), false)).toEqual({ type: "boolean", value: false });

    expect(() => parseFieldValue(field("number"), "12")).toThrow("Value does not match field type 'number'");
    expect(() => parseFieldValue(field("text"), 12)).toThrow("Value does not match field type 'text'");
    expect(() => parseFieldValue(field("boolean"), "true")).toThrow("Value does not match field type 'boolean'");
  });

  it("rejects non-finite numbers", () => {
    expect(() => parseFieldValue(field("number"), Number.NaN)).toThrow("Value does not match field type 'number'");
    expect(() => parseFieldValue(field("number"), Number.POSITIVE_INFINITY)).toThrow(
      "Value does not match field type 'number'",
    );
  });

  it("keeps calendar dates and normalises date-times to UTC", () => {
    expect(parseFieldValue(field("date"), "2024-03-01")).toEqual({ type: "date", value: "2024-03-01" });
    expect(parseFieldValue(field("date"), "2024-03-01T10:00:00+02:00")).toEqual({
      type: "date",
      value: "2024-03-01T08:00:00.000Z",
    });
    expect(() => parseFieldValue(field("date"), "2024-02-30")).toThrow("'2024-02-30' is not a calendar date");
    expect(() => parseFieldValue(field("date"), "soon")).toThrow("'soon' is not an ISO-8601 date or date-time");
  });

  it("rejects date strings that are not ISO-8601", () => {
    for (const payload of ["5", "12/31/2024", "March 7 2024", "2024-03-01T10:00:00", "2024-3-1"]) {
      expect(() => parseFieldValue(field("date"), payload)).toThrow(ValidationError);
    }
    expect(() => parseFieldValue(field("date"), "5")).toThrow("'5' is not an ISO-8601 date or date-time");
  });

  it("accepts a single-select option by value or by id", () => {
    const expected = { type: "single-select", option_id: 11, value: "high" };
    expect(parseFieldValue(field("single-select"), "high")).toEqual(expected);
    expect(parseFieldValue(field("single-select"), 11)).toEqual(expected);
    expect(() => parseFieldValue(field("single-select"), "medium")).toThrow("'medium' is not an option of this field");
    expect(() => parseFieldValue(field("single-select"), true)).toThrow(
      "Value does not match field type 'single-select'",
    );
  });
});

describe("toColumns / fromColumns", () => {
  it("populates exactly one column", () => {
    expect(toColumns({ type: "boolean", value: true })).toEqual({ ...EMPTY, value_boolean: 1 });
    expect(toColumns({ type: "single-select", option_id: 10, value: "low" })).toEqual({
      ...EMPTY,
      value_option_id: 10,
    });
  });

  it("rebuilds the tagged value from its column", () => {
    expect(fromColumns("boolean", { ...EMPTY, value_boolean: 0 }, [])).toEqual({ type: "boolean", value: false });
    expect(fromColumns("single-select", { ...EMPTY, value_option_id: 10 }, field("single-select").options)).toEqual({
      type: "single-select",
      option_id: 10,
      value: "low",
    });
  });

  it("returns undefined when the populated column does not match the type", () => {
    expect(fromColumns("number", { ...EMPTY, value_text: "12" }, [])).toBeUndefined();
  });
});
