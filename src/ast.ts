// Read-only model of a parsed and validated IDL document.

export type Primitive =
  | "bool"
  | "byte"
  | "i16"
  | "i32"
  | "i64"
  | "double"
  | "string"
  | "binary";

export interface PrimitiveType {
  readonly kind: "primitive";
  readonly primitive: Primitive;
}

export type SchemaType =
  | { readonly kind: "void" }
  | PrimitiveType
  | { readonly kind: "list"; readonly element: SchemaType }
  | { readonly kind: "set"; readonly element: SchemaType }
  | {
      readonly kind: "map";
      readonly key: SchemaType;
      readonly value: SchemaType;
    }
  | { readonly kind: "enum"; readonly name: string }
  | { readonly kind: "struct"; readonly name: string }
  /** A reference the validation stage has not resolved to an enum or struct. */
  | { readonly kind: "named"; readonly name: string };

export type Constant =
  | { readonly kind: "null" }
  | { readonly kind: "bool"; readonly value: boolean }
  | { readonly kind: "double"; readonly value: number }
  | { readonly kind: "int"; readonly value: bigint }
  | { readonly kind: "string"; readonly value: string }
  | { readonly kind: "list"; readonly elements: readonly Constant[] }
  | {
      readonly kind: "map";
      readonly entries: ReadonlyArray<readonly [Constant, Constant]>;
    }
  | {
      readonly kind: "enumValue";
      readonly enumName: string;
      readonly valueName: string;
    }
  | { readonly kind: "identifier"; readonly name: string };

export type Requiredness = "required" | "optional" | "default";

export interface Field {
  readonly id: number;
  readonly name: string;
  readonly type: SchemaType;
  readonly requiredness: Requiredness;
  readonly defaultValue?: Constant;
}

export interface EnumValue {
  readonly name: string;
  readonly value: number;
}

export interface Enum {
  readonly name: string;
  /** Declaration order is the output order. */
  readonly values: readonly EnumValue[];
}

export interface Const {
  readonly name: string;
  readonly type: SchemaType;
  readonly value: Constant;
}

export interface StructLike {
  readonly kind: "struct" | "exception";
  readonly name: string;
  readonly fields: readonly Field[];
}

export interface ServiceFunction {
  readonly name: string;
  readonly returnType: SchemaType;
  readonly args: readonly Field[];
  readonly throws: readonly Field[];
}

export interface Service {
  readonly name: string;
  /** Name of the extended service, if any. */
  readonly parent?: string;
  readonly functions: readonly ServiceFunction[];
}

export type Header =
  | {
      readonly kind: "include";
      readonly path: string;
      readonly document: Document;
    }
  | {
      readonly kind: "namespace";
      /** Examples: "scala", "java", "*". */
      readonly scope: string;
      readonly name: string;
    };

export interface Document {
  readonly headers: readonly Header[];
  readonly consts: readonly Const[];
  readonly enums: readonly Enum[];
  readonly structs: readonly StructLike[];
  readonly services: readonly Service[];
}

const NAMESPACE_SCOPES: readonly string[] = ["scala", "java", "*"];

/**
 * Returns the package the generated code for `doc` lives in.
 */
export function targetNamespace(
  doc: Document,
  defaultNamespace: string,
): string {
  for (const scope of NAMESPACE_SCOPES) {
    for (const header of doc.headers) {
      if (header.kind === "namespace" && header.scope === scope) {
        return header.name;
      }
    }
  }
  return defaultNamespace;
}
