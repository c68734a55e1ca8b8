import type { SchemaType } from "./ast.js";
import { InternalError } from "./errors.js";
import { getReadMethod, getWireTag, getWriteMethod } from "./type_speller.js";

// Generated struct codecs read from `_iprot` and write to `_oprot`.
// Container code nests lambdas, so temporaries carry the nesting depth.

/**
 * Returns a one-line Scala expression reading a value of the given type.
 */
export function getReadExpression(type: SchemaType, depth = 0): string {
  switch (type.kind) {
    case "primitive":
      return `_iprot.${getReadMethod(type)}()`;
    case "enum":
      return `${type.name}(_iprot.readI32())`;
    case "struct":
      return `${type.name}.decode(_iprot)`;
    case "list": {
      const item = getReadExpression(type.element, depth + 1);
      return readContainer("List", depth, item, ".toList");
    }
    case "set": {
      const item = getReadExpression(type.element, depth + 1);
      return readContainer("Set", depth, item, ".toSet");
    }
    case "map": {
      const key = getReadExpression(type.key, depth + 1);
      const value = getReadExpression(type.value, depth + 1);
      return readContainer("Map", depth, `(${key}, ${value})`, ".toMap");
    }
    case "void":
    case "named":
      throw new InternalError("readExpression", type.kind);
  }
}

function readContainer(
  container: "List" | "Set" | "Map",
  depth: number,
  item: string,
  conversion: string,
): string {
  const header = `_${container.toLowerCase()}${depth}`;
  const result = `_rv${depth}`;
  return [
    `{ val ${header} = _iprot.read${container}Begin()`,
    `val ${result} = (0 until ${header}.size).map { _ => ${item} }${conversion}`,
    `_iprot.read${container}End()`,
    `${result} }`,
  ].join("; ");
}

/**
 * Returns a one-line Scala statement writing `expression`, a value of the
 * given type.
 */
export function getWriteStatement(
  type: SchemaType,
  expression: string,
  depth = 0,
): string {
  switch (type.kind) {
    case "primitive":
      return `_oprot.${getWriteMethod(type)}(${expression})`;
    case "enum":
      return `_oprot.writeI32(${expression}.value)`;
    case "struct":
      return `${expression}.write(_oprot)`;
    case "list":
    case "set": {
      const container = type.kind === "list" ? "List" : "Set";
      const item = `_e${depth}`;
      const tag = getWireTag(type.element);
      return [
        `_oprot.write${container}Begin(new T${container}(TType.${tag}, ${expression}.size))`,
        `${expression}.foreach { ${item} => ${getWriteStatement(type.element, item, depth + 1)} }`,
        `_oprot.write${container}End()`,
      ].join("; ");
    }
    case "map": {
      const key = `_k${depth}`;
      const value = `_v${depth}`;
      const keyTag = getWireTag(type.key);
      const valueTag = getWireTag(type.value);
      const writeKey = getWriteStatement(type.key, key, depth + 1);
      const writeValue = getWriteStatement(type.value, value, depth + 1);
      return [
        `_oprot.writeMapBegin(new TMap(TType.${keyTag}, TType.${valueTag}, ${expression}.size))`,
        `${expression}.foreach { case (${key}, ${value}) => ${writeKey}; ${writeValue} }`,
        "_oprot.writeMapEnd()",
      ].join("; ");
    }
    case "void":
    case "named":
      throw new InternalError("writeStatement", type.kind);
  }
}
