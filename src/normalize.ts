import {
  type Document,
  type Field,
  type ServiceFunction,
  type StructLike,
  targetNamespace,
} from "./ast.js";

/**
 * Converts a snake_case name into lowerCamel. The first word is kept as is:
 * "user_id" becomes "userId", "URL" stays "URL".
 */
export function camelize(name: string): string {
  const words = name.split("_");
  // Keep leading underscores.
  let prefix = "";
  while (words.length > 1 && words[0] === "") {
    words.shift();
    prefix += "_";
  }
  const [first, ...rest] = words;
  return (
    prefix +
    first +
    rest
      .filter((w) => w !== "")
      .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
      .join("")
  );
}

/**
 * Returns a copy of the document where the names of fields, function
 * arguments and functions are in lowerCamel. Type, enum value and constant
 * names are left untouched.
 */
export function camelizeDocument(doc: Document): Document {
  return {
    ...doc,
    structs: doc.structs.map(camelizeStruct),
    services: doc.services.map((service) => ({
      ...service,
      functions: service.functions.map(camelizeFunction),
    })),
  };
}

function camelizeStruct(struct: StructLike): StructLike {
  return { ...struct, fields: struct.fields.map(camelizeField) };
}

function camelizeFunction(fn: ServiceFunction): ServiceFunction {
  return {
    ...fn,
    name: camelize(fn.name),
    args: fn.args.map(camelizeField),
    throws: fn.throws.map(camelizeField),
  };
}

function camelizeField(field: Field): Field {
  return { ...field, name: camelize(field.name) };
}

/**
 * Namespaces of the included documents, in order of first appearance, with
 * neither duplicates nor the namespace of `doc` itself.
 */
export function getImports(
  doc: Document,
  defaultNamespace: string,
): readonly string[] {
  const ownNamespace = targetNamespace(doc, defaultNamespace);
  const imports = new Set<string>();
  for (const header of doc.headers) {
    if (header.kind !== "include") continue;
    const namespace = targetNamespace(header.document, defaultNamespace);
    if (namespace !== ownNamespace) {
      imports.add(namespace);
    }
  }
  return [...imports];
}
