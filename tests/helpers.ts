import type {
  Document,
  Enum,
  Primitive,
  SchemaType,
  Service,
  StructLike,
} from "../src/ast.js";
import { FRAGMENT_NAMES, TEMPLATE_PREFIX } from "../src/generator.js";
import { TemplateRegistry } from "../src/template/registry.js";
import {
  BUNDLED_TEMPLATES,
  directoryFragmentSource,
} from "../src/template/sources.js";

export function primitive(name: Primitive): SchemaType {
  return { kind: "primitive", primitive: name };
}

export function loadBundledRegistry(): TemplateRegistry {
  return TemplateRegistry.load(
    directoryFragmentSource(BUNDLED_TEMPLATES),
    TEMPLATE_PREFIX,
    FRAGMENT_NAMES,
  );
}

export function makeDocument(overrides: Partial<Document> = {}): Document {
  return {
    headers: [],
    consts: [],
    enums: [],
    structs: [],
    services: [],
    ...overrides,
  };
}

export const COLOR: Enum = {
  name: "Color",
  values: [
    { name: "RED", value: 1 },
    { name: "GREEN", value: 2 },
  ],
};

export const POINT: StructLike = {
  kind: "struct",
  name: "Point",
  fields: [
    { id: 1, name: "x", type: primitive("i32"), requiredness: "required" },
    {
      id: 2,
      name: "label",
      type: primitive("string"),
      requiredness: "optional",
    },
  ],
};

export const INVALID_SHAPE: StructLike = {
  kind: "exception",
  name: "InvalidShape",
  fields: [
    {
      id: 1,
      name: "message",
      type: primitive("string"),
      requiredness: "default",
    },
  ],
};

export const GEOMETRY: Service = {
  name: "Geometry",
  functions: [
    {
      name: "area",
      returnType: primitive("double"),
      args: [
        {
          id: 1,
          name: "shape",
          type: { kind: "struct", name: "Point" },
          requiredness: "default",
        },
      ],
      throws: [
        {
          id: 1,
          name: "err",
          type: { kind: "struct", name: "InvalidShape" },
          requiredness: "default",
        },
      ],
    },
    {
      name: "reset",
      returnType: { kind: "void" },
      args: [],
      throws: [],
    },
  ],
};
