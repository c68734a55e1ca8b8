import { describe, expect, it } from "vitest";
import type { Field, SchemaType } from "../src/ast.js";
import {
  escapeIdentifier,
  formatFieldArgs,
  getDefaultFieldValue,
  getDefaultReadValue,
  getFieldConstName,
  getFieldType,
} from "../src/field_descriptor.js";

const I32: SchemaType = { kind: "primitive", primitive: "i32" };
const STRING: SchemaType = { kind: "primitive", primitive: "string" };

function field(overrides: Partial<Field>): Field {
  return {
    id: 1,
    name: "count",
    type: I32,
    requiredness: "default",
    ...overrides,
  };
}

describe("getFieldType", () => {
  it("wraps optional fields in Option", () => {
    expect(getFieldType(field({ requiredness: "optional" }))).toBe(
      "Option[Int]",
    );
  });

  it("keeps the type of other fields", () => {
    expect(getFieldType(field({ requiredness: "required" }))).toBe("Int");
    expect(getFieldType(field({}))).toBe("Int");
  });
});

describe("getDefaultFieldValue", () => {
  it("renders the declared default", () => {
    const f = field({ defaultValue: { kind: "int", value: 7n } });
    expect(getDefaultFieldValue(f)).toBe("7");
  });

  it("wraps the declared default of an optional field in Some", () => {
    const f = field({
      requiredness: "optional",
      defaultValue: { kind: "int", value: 7n },
    });
    expect(getDefaultFieldValue(f)).toBe("Some(7)");
  });

  it("defaults optional fields to None", () => {
    expect(getDefaultFieldValue(field({ requiredness: "optional" }))).toBe(
      "None",
    );
  });

  it("has no default for other fields", () => {
    expect(getDefaultFieldValue(field({ requiredness: "required" }))).toBe(
      undefined,
    );
    expect(getDefaultFieldValue(field({}))).toBe(undefined);
  });
});

describe("formatFieldArgs", () => {
  it("joins parameters with their defaults", () => {
    const fields = [
      field({ name: "id", type: { kind: "primitive", primitive: "i64" } }),
      field({
        name: "label",
        type: STRING,
        requiredness: "optional",
      }),
      field({
        name: "tags",
        type: { kind: "list", element: STRING },
        defaultValue: { kind: "list", elements: [] },
      }),
    ];
    expect(formatFieldArgs(fields)).toBe(
      "id: Long, label: Option[String] = None, tags: Seq[String] = List()",
    );
  });

  it("escapes Scala keywords", () => {
    expect(formatFieldArgs([field({ name: "type" })])).toBe("`type`: Int");
    expect(escapeIdentifier("kind")).toBe("kind");
  });

  it("returns an empty string for no fields", () => {
    expect(formatFieldArgs([])).toBe("");
  });
});

describe("getDefaultReadValue", () => {
  it("is None for optional fields, whatever the declared default", () => {
    const f = field({
      requiredness: "optional",
      defaultValue: { kind: "int", value: 3n },
    });
    expect(getDefaultReadValue(f)).toBe("None");
  });

  it("is the zero value of numeric and boolean fields", () => {
    expect(getDefaultReadValue(field({}))).toBe("0");
    expect(
      getDefaultReadValue(
        field({ type: { kind: "primitive", primitive: "bool" } }),
      ),
    ).toBe("false");
    expect(
      getDefaultReadValue(
        field({ type: { kind: "primitive", primitive: "double" } }),
      ),
    ).toBe("0.0");
  });

  it("ignores the declared default of required fields", () => {
    const f = field({
      requiredness: "required",
      defaultValue: { kind: "int", value: 3n },
    });
    expect(getDefaultReadValue(f)).toBe("0");
  });

  it("is null for other types", () => {
    expect(getDefaultReadValue(field({ type: STRING }))).toBe("null");
    expect(
      getDefaultReadValue(field({ type: { kind: "struct", name: "Point" } })),
    ).toBe("null");
    expect(
      getDefaultReadValue(field({ type: { kind: "enum", name: "Color" } })),
    ).toBe("null");
  });
});

describe("getFieldConstName", () => {
  it("upper-cases the field name", () => {
    expect(getFieldConstName("userId")).toBe("USERID_FIELD_DESC");
  });
});
