import { TemplateError } from "../errors.js";
import type { Dictionary } from "./dictionary.js";
import type { FragmentSource } from "./sources.js";
import { Template } from "./template.js";

/**
 * A fragment bound to the function which turns a model into the dictionary
 * the fragment is rendered with.
 */
export class CompiledFragment<Model> {
  constructor(
    readonly template: Template,
    /**
     * The model-to-dictionary function alone, for embedding the dictionary
     * of one model in the dictionary of another fragment.
     */
    readonly unpacker: (model: Model) => Dictionary,
  ) {}

  render(model: Model): string {
    return this.template.render(this.unpacker(model));
  }
}

/**
 * The fragments of one generation session, compiled once when the registry
 * is loaded.
 */
export class TemplateRegistry {
  private constructor(
    readonly prefix: string,
    private readonly templates: ReadonlyMap<string, Template>,
  ) {}

  static load(
    source: FragmentSource,
    prefix: string,
    names: readonly string[],
  ): TemplateRegistry {
    const templates = new Map<string, Template>();
    for (const name of names) {
      templates.set(name, Template.compile(name, source.load(prefix, name)));
    }
    return new TemplateRegistry(prefix, templates);
  }

  get(name: string): Template {
    const template = this.templates.get(name);
    if (!template) {
      throw new TemplateError(name, undefined, `not loaded from ${this.prefix}`);
    }
    return template;
  }

  fragment<Model>(
    name: string,
    unpacker: (model: Model) => Dictionary,
  ): CompiledFragment<Model> {
    return new CompiledFragment(this.get(name), unpacker);
  }
}
