import type { SchemaType } from "./ast.js";
import { InternalError } from "./errors.js";

/** Name of a `TType` constant of the wire protocol. */
export type WireTag =
  | "VOID"
  | "BOOL"
  | "BYTE"
  | "DOUBLE"
  | "I16"
  | "I32"
  | "I64"
  | "STRING"
  | "STRUCT"
  | "MAP"
  | "SET"
  | "LIST";

/**
 * Transforms a type found in an IDL document into a Scala type.
 */
export function getScalaType(type: SchemaType): string {
  switch (type.kind) {
    case "void":
      return "Unit";
    case "map":
      return `Map[${getScalaType(type.key)}, ${getScalaType(type.value)}]`;
    case "set":
      return `Set[${getScalaType(type.element)}]`;
    case "list":
      return `Seq[${getScalaType(type.element)}]`;
    case "enum":
    case "struct":
    case "named":
      return type.name;
    case "primitive": {
      const { primitive } = type;
      switch (primitive) {
        case "bool":
          return "Boolean";
        case "byte":
          return "Byte";
        case "i16":
          return "Short";
        case "i32":
          return "Int";
        case "i64":
          return "Long";
        case "double":
          return "Double";
        case "string":
          return "String";
        case "binary":
          return "ByteBuffer";
      }
    }
  }
}

export function getWireTag(type: SchemaType): WireTag {
  switch (type.kind) {
    case "void":
      return "VOID";
    case "struct":
      return "STRUCT";
    case "enum":
      // Enums travel as their integer value.
      return "I32";
    case "map":
      return "MAP";
    case "set":
      return "SET";
    case "list":
      return "LIST";
    case "named":
      throw new InternalError("wireTag", describe(type));
    case "primitive": {
      switch (type.primitive) {
        case "bool":
          return "BOOL";
        case "byte":
          return "BYTE";
        case "double":
          return "DOUBLE";
        case "i16":
          return "I16";
        case "i32":
          return "I32";
        case "i64":
          return "I64";
        case "string":
          return "STRING";
        case "binary":
          // Binary payloads travel with the string tag.
          return "STRING";
      }
    }
  }
}

export function getReadMethod(type: SchemaType): string {
  if (type.kind === "primitive") {
    switch (type.primitive) {
      case "bool":
        return "readBool";
      case "byte":
        return "readByte";
      case "i16":
        return "readI16";
      case "i32":
        return "readI32";
      case "i64":
        return "readI64";
      case "double":
        return "readDouble";
      case "string":
        return "readString";
      case "binary":
        return "readBinary";
    }
  }
  throw new InternalError("readMethod", describe(type));
}

export function getWriteMethod(type: SchemaType): string {
  if (type.kind === "primitive") {
    switch (type.primitive) {
      case "bool":
        return "writeBool";
      case "byte":
        return "writeByte";
      case "i16":
        return "writeI16";
      case "i32":
        return "writeI32";
      case "i64":
        return "writeI64";
      case "double":
        return "writeDouble";
      case "string":
        return "writeString";
      case "binary":
        return "writeBinary";
    }
  }
  throw new InternalError("writeMethod", describe(type));
}

/**
 * Zero literal of a primitive type. Does not know about optional fields:
 * see `getDefaultReadValue`.
 */
export function getZeroValue(type: SchemaType): string {
  if (type.kind === "primitive") {
    switch (type.primitive) {
      case "bool":
        return "false";
      case "byte":
      case "i16":
      case "i32":
      case "i64":
        return "0";
      case "double":
        return "0.0";
      case "string":
        return '""';
      case "binary":
        return "ByteBuffer.allocate(0)";
    }
  }
  throw new InternalError("zeroValue", describe(type));
}

function describe(type: SchemaType): string {
  switch (type.kind) {
    case "primitive":
      return type.primitive;
    case "enum":
    case "struct":
    case "named":
      return `${type.kind}(${type.name})`;
    default:
      return type.kind;
  }
}
