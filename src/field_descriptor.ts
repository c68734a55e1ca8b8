import type { Field } from "./ast.js";
import { renderConstant } from "./constant_renderer.js";
import { SCALA_KEYWORDS } from "./keywords.js";
import { getScalaType, getZeroValue } from "./type_speller.js";

/** Declared Scala type of the field: optional fields are wrapped in Option. */
export function getFieldType(field: Field): string {
  const scalaType = getScalaType(field.type);
  return field.requiredness === "optional" ? `Option[${scalaType}]` : scalaType;
}

/**
 * Initializer of the field at its declaration site, or undefined if the
 * caller must supply a value.
 */
export function getDefaultFieldValue(field: Field): string | undefined {
  const isOptional = field.requiredness === "optional";
  if (field.defaultValue) {
    const value = renderConstant(field.defaultValue);
    return isOptional ? `Some(${value})` : value;
  }
  return isOptional ? "None" : undefined;
}

/**
 * The value a field takes when deserializing a struct in which the field is
 * not present. Ignores the default declared in the IDL.
 */
export function getDefaultReadValue(field: Field): string {
  if (field.requiredness === "optional") {
    return "None";
  }
  const { type } = field;
  if (type.kind === "primitive") {
    switch (type.primitive) {
      case "bool":
      case "byte":
      case "i16":
      case "i32":
      case "i64":
      case "double":
        return getZeroValue(type);
    }
  }
  return "null";
}

/** Example: "id: Long, `type`: Option[String] = None" */
export function formatFieldArgs(fields: readonly Field[]): string {
  return fields
    .map((field) => {
      const param = `${escapeIdentifier(field.name)}: ${getFieldType(field)}`;
      const defaultValue = getDefaultFieldValue(field);
      return defaultValue === undefined
        ? param
        : `${param} = ${defaultValue}`;
    })
    .join(", ");
}

export function escapeIdentifier(name: string): string {
  return SCALA_KEYWORDS.has(name) ? `\`${name}\`` : name;
}

/** Name of the companion-object constant describing the field on the wire. */
export function getFieldConstName(fieldName: string): string {
  return `${fieldName.toUpperCase()}_FIELD_DESC`;
}
