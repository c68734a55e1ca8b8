import {
  type Const,
  type Document,
  type Enum,
  type Field,
  type Service,
  type ServiceFunction,
  type StructLike,
  targetNamespace,
} from "./ast.js";
import { renderConstant } from "./constant_renderer.js";
import {
  escapeIdentifier,
  formatFieldArgs,
  getDefaultReadValue,
  getFieldConstName,
  getFieldType,
} from "./field_descriptor.js";
import { camelizeDocument, getImports } from "./normalize.js";
import { getReadExpression, getWriteStatement } from "./protocol_speller.js";
import {
  type Dictionary,
  flag,
  list,
  partial,
  text,
} from "./template/dictionary.js";
import type {
  CompiledFragment,
  TemplateRegistry,
} from "./template/registry.js";
import { getScalaType, getWireTag } from "./type_speller.js";

export type ServiceOption =
  | "finagleClient"
  | "finagleService"
  | "ostrichServer";

export interface ScalaGeneratorOptions {
  readonly serviceOptions: readonly ServiceOption[];
  readonly defaultNamespace: string;
}

/** Prefix under which the fragment sources are looked up. */
export const TEMPLATE_PREFIX = "scalagen/";

export const FRAGMENT_NAMES: readonly string[] = [
  "header",
  "consts",
  "enum",
  "enums",
  "struct",
  "service",
];

/**
 * Generates the Scala file for one IDL document, by rendering one fragment
 * per entity of the document.
 */
export class ScalaGenerator {
  constructor(
    registry: TemplateRegistry,
    private readonly options: ScalaGeneratorOptions,
  ) {
    const { defaultNamespace } = options;

    this.headerFragment = registry.fragment("header", (doc: Document) => ({
      scalaNamespace: text(targetNamespace(doc, defaultNamespace)),
      imports: list(
        getImports(doc, defaultNamespace).map((namespace) => ({
          namespace: text(namespace),
        })),
      ),
    }));

    const enumFragment = registry.fragment("enum", (e: Enum) => ({
      enum_name: text(e.name),
      values: list(
        e.values.map((value) => ({
          name: text(value.name),
          nameLowerCase: text(value.name.toLowerCase()),
          value: text(`${value.value}`),
        })),
      ),
      valueNames: text(e.values.map((value) => value.name).join(", ")),
    }));
    this.enumFragment = enumFragment;

    this.enumsFragment = registry.fragment(
      "enums",
      (enums: readonly Enum[]) => {
        const enumDictionaries = enums.map(enumFragment.unpacker);
        return {
          hasEnums: flag(enumDictionaries.length > 0),
          enums: list(enumDictionaries),
          enum: partial(enumFragment.template),
        };
      },
    );

    this.constsFragment = registry.fragment(
      "consts",
      (consts: readonly Const[]) => {
        const constants = consts.map((c) => ({
          name: text(c.name),
          type: text(getScalaType(c.type)),
          value: text(renderConstant(c.value)),
        }));
        return {
          hasConstants: flag(constants.length > 0),
          constants: list(constants),
        };
      },
    );

    const structFragment = registry.fragment("struct", structToDictionary);
    this.structFragment = structFragment;

    this.serviceFragment = registry.fragment("service", (service: Service) => {
      const serviceOptions = new Set(this.options.serviceOptions);
      const internalStructs = service.functions.flatMap((fn) =>
        [getArgsStruct(fn), getResultStruct(fn)].map(structFragment.unpacker),
      );
      return {
        name: text(service.name),
        hasParent: flag(service.parent !== undefined),
        parent: text(service.parent ?? ""),
        functions: list(service.functions.map(functionToDictionary)),
        internalStructs: list(internalStructs),
        struct: partial(structFragment.template),
        withFinagleClient: flag(serviceOptions.has("finagleClient")),
        withFinagleService: flag(serviceOptions.has("finagleService")),
        withOstrichServer: flag(serviceOptions.has("ostrichServer")),
      };
    });
  }

  renderHeader(doc: Document): string {
    return this.headerFragment.render(doc);
  }

  renderEnum(e: Enum): string {
    return this.enumFragment.render(e);
  }

  renderEnums(enums: readonly Enum[]): string {
    return this.enumsFragment.render(enums);
  }

  renderConsts(consts: readonly Const[]): string {
    return this.constsFragment.render(consts);
  }

  renderStruct(struct: StructLike): string {
    return this.structFragment.render(struct);
  }

  renderService(service: Service): string {
    return this.serviceFragment.render(service);
  }

  // Per-entity output, for testing one fragment at a time. The document is
  // not normalized.

  /** @deprecated Use `generate`. */
  generateEnum(doc: Document, e: Enum): string {
    return this.renderHeader(doc) + this.renderEnum(e);
  }

  /** @deprecated Use `generate`. */
  generateConsts(doc: Document, consts: readonly Const[]): string {
    return this.renderHeader(doc) + this.renderConsts(consts);
  }

  /** @deprecated Use `generate`. */
  generateStruct(doc: Document, struct: StructLike): string {
    return this.renderHeader(doc) + this.renderStruct(struct);
  }

  /** @deprecated Use `generate`. */
  generateService(doc: Document, service: Service): string {
    return this.renderHeader(doc) + this.renderService(service);
  }

  /**
   * Returns the contents of the Scala file generated for `inDoc`: header,
   * constants, enums, structs and services, in this order.
   */
  generate(inDoc: Document): string {
    const doc = camelizeDocument(inDoc);
    const structSection = doc.structs
      .map((s) => this.renderStruct(s))
      .join("\n");
    const serviceSection = doc.services
      .map((s) => this.renderService(s))
      .join("\n");
    const code = [
      this.renderHeader(doc),
      "\n",
      this.renderConsts(doc.consts),
      this.renderEnums(doc.enums),
      structSection,
      "\n",
      serviceSection,
    ].join("");
    return (
      code
        // Coalesce consecutive empty lines.
        .replace(/\n\n\n+/g, "\n\n")
        .replace(/\n+$/, "\n")
    );
  }

  private readonly headerFragment: CompiledFragment<Document>;
  private readonly enumFragment: CompiledFragment<Enum>;
  private readonly enumsFragment: CompiledFragment<readonly Enum[]>;
  private readonly constsFragment: CompiledFragment<readonly Const[]>;
  private readonly structFragment: CompiledFragment<StructLike>;
  private readonly serviceFragment: CompiledFragment<Service>;
}

function structToDictionary(struct: StructLike): Dictionary {
  const fields = struct.fields.map(fieldToDictionary);
  return {
    name: text(struct.name),
    isException: flag(struct.kind === "exception"),
    fieldArgs: text(formatFieldArgs(struct.fields)),
    constructorArgs: text(
      struct.fields.map((field) => getVarName(field)).join(", "),
    ),
    fields: list(fields),
  };
}

function fieldToDictionary(field: Field): Dictionary {
  const isOptional = field.requiredness === "optional";
  const defaultReadValue = getDefaultReadValue(field);
  const read = getReadExpression(field.type);
  return {
    name: text(field.name),
    escapedName: text(escapeIdentifier(field.name)),
    id: text(`${field.id}`),
    fieldConst: text(getFieldConstName(field.name)),
    wireTag: text(getWireTag(field.type)),
    fieldType: text(getFieldType(field)),
    defaultReadValue: text(defaultReadValue),
    varName: text(getVarName(field)),
    readValue: text(isOptional ? `Some(${read})` : read),
    writeValue: text(getWriteStatement(field.type, "_value")),
    optional: flag(isOptional),
    nullable: flag(defaultReadValue === "null"),
  };
}

// Local variables of the generated decoder. The decoder's own locals
// (`_done`, `_field`, `_iprot`) never start with `_f_`.
function getVarName(field: Field): string {
  return `_f_${field.name}`;
}

function functionToDictionary(fn: ServiceFunction): Dictionary {
  const hasReturn = fn.returnType.kind !== "void";
  const resultStruct = getResultStruct(fn).name;
  const argNames = fn.args.map((arg) => escapeIdentifier(arg.name));
  return {
    name: text(fn.name),
    fieldArgs: text(formatFieldArgs(fn.args)),
    returnType: text(getScalaType(fn.returnType)),
    hasReturn: flag(hasReturn),
    throws: list(
      fn.throws.map((field) => ({
        exceptionType: text(getScalaType(field.type)),
        escapedName: text(escapeIdentifier(field.name)),
      })),
    ),
    argsStruct: text(getArgsStruct(fn).name),
    resultStruct: text(resultStruct),
    argNames: text(argNames.join(", ")),
    argAccessors: text(argNames.map((name) => `_args.${name}`).join(", ")),
    resultWrap: text(
      hasReturn
        ? `_value => ${resultStruct}(success = Some(_value))`
        : `_ => ${resultStruct}()`,
    ),
  };
}

function getArgsStruct(fn: ServiceFunction): StructLike {
  return { kind: "struct", name: `${fn.name}_args`, fields: fn.args };
}

/**
 * Holds either the return value, in field 0, or one of the declared
 * exceptions. Every field is optional.
 */
function getResultStruct(fn: ServiceFunction): StructLike {
  const fields: Field[] = [];
  if (fn.returnType.kind !== "void") {
    fields.push({
      id: 0,
      name: "success",
      type: fn.returnType,
      requiredness: "optional",
    });
  }
  for (const field of fn.throws) {
    fields.push({
      ...field,
      requiredness: "optional",
      defaultValue: undefined,
    });
  }
  return { kind: "struct", name: `${fn.name}_result`, fields: fields };
}
