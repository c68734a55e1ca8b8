import { z } from "zod";
import { type Document, targetNamespace } from "./ast.js";
import {
  FRAGMENT_NAMES,
  ScalaGenerator,
  TEMPLATE_PREFIX,
} from "./generator.js";
import { TemplateRegistry } from "./template/registry.js";
import {
  BUNDLED_TEMPLATES,
  type FragmentSource,
  directoryFragmentSource,
} from "./template/sources.js";

const Config = z.object({
  serviceOptions: z
    .array(z.enum(["finagleClient", "finagleService", "ostrichServer"]))
    .default([]),
  defaultNamespace: z.string().min(1).default("thrift"),
});

type Config = z.infer<typeof Config>;

export interface SourceDocument {
  /** Path of the IDL file, e.g. "shapes/geometry.thrift". */
  readonly path: string;
  readonly document: Document;
}

export interface GeneratorInput {
  readonly documents: readonly SourceDocument[];
  /** Parsed against the generator's config schema. */
  readonly config?: unknown;
}

export interface OutputFile {
  readonly path: string;
  readonly code: string;
}

export interface GeneratorOutput {
  readonly files: readonly OutputFile[];
}

export class ScalaCodeGenerator {
  readonly id = "scala";
  readonly configType = Config;
  readonly version = "1.0.0";

  constructor(
    private readonly fragmentSource: FragmentSource = directoryFragmentSource(
      BUNDLED_TEMPLATES,
    ),
  ) {}

  generateCode(input: GeneratorInput): GeneratorOutput {
    const config: Config = Config.parse(input.config ?? {});
    // One registry per call: fragments are loaded and compiled once for all
    // the documents.
    const registry = TemplateRegistry.load(
      this.fragmentSource,
      TEMPLATE_PREFIX,
      FRAGMENT_NAMES,
    );
    const generator = new ScalaGenerator(registry, config);

    const files: OutputFile[] = [];
    for (const { path, document } of input.documents) {
      files.push({
        path: getOutputPath(path, document, config.defaultNamespace),
        code: generator.generate(document),
      });
    }
    return { files: files };
  }
}

/** Example: "a/b/geometry.scala" for "shapes/geometry.thrift" in package a.b. */
export function getOutputPath(
  path: string,
  document: Document,
  defaultNamespace: string,
): string {
  const directory = targetNamespace(document, defaultNamespace).replace(
    /\./g,
    "/",
  );
  const basename = path
    .slice(path.lastIndexOf("/") + 1)
    .replace(/\.[^.]*$/, "");
  return `${directory}/${basename}.scala`;
}

export const GENERATOR = new ScalaCodeGenerator();

export type * from "./ast.js";
export { targetNamespace } from "./ast.js";
export { renderConstant, quote } from "./constant_renderer.js";
export { InternalError, TemplateError } from "./errors.js";
export {
  escapeIdentifier,
  formatFieldArgs,
  getDefaultFieldValue,
  getDefaultReadValue,
  getFieldType,
} from "./field_descriptor.js";
export {
  FRAGMENT_NAMES,
  ScalaGenerator,
  type ScalaGeneratorOptions,
  type ServiceOption,
  TEMPLATE_PREFIX,
} from "./generator.js";
export { camelize, camelizeDocument, getImports } from "./normalize.js";
export {
  getReadMethod,
  getScalaType,
  getWireTag,
  getWriteMethod,
  getZeroValue,
} from "./type_speller.js";
export * from "./template/dictionary.js";
export { CompiledFragment, TemplateRegistry } from "./template/registry.js";
export {
  BUNDLED_TEMPLATES,
  type FragmentSource,
  directoryFragmentSource,
  memoryFragmentSource,
} from "./template/sources.js";
export { Template } from "./template/template.js";
