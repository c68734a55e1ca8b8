import { TemplateError } from "../errors.js";
import type { Dictionary, DictionaryValue } from "./dictionary.js";
import { type TemplateNode, parseTemplate } from "./parser.js";

/**
 * A compiled fragment source. Rendering looks keys up in the innermost
 * dictionary first, then in the enclosing ones.
 */
export class Template {
  private constructor(
    readonly name: string,
    private readonly nodes: readonly TemplateNode[],
  ) {}

  static compile(name: string, source: string): Template {
    return new Template(name, parseTemplate(name, source));
  }

  render(dictionary: Dictionary): string {
    return this.renderNodes(this.nodes, [dictionary]);
  }

  private renderNodes(
    nodes: readonly TemplateNode[],
    scopes: readonly Dictionary[],
  ): string {
    let result = "";
    for (const node of nodes) {
      switch (node.kind) {
        case "text":
          result += node.text;
          break;
        case "variable": {
          const value = this.lookUp(node.key, scopes);
          if (value.kind !== "text") {
            throw this.shapeError(node.key, "text", value);
          }
          result += value.text;
          break;
        }
        case "section":
          result += node.inverted
            ? this.renderInvertedSection(node.key, node.children, scopes)
            : this.renderSection(node.key, node.children, scopes);
          break;
        case "partial": {
          const value = this.lookUp(node.key, scopes);
          if (value.kind !== "partial") {
            throw this.shapeError(node.key, "partial", value);
          }
          result += value.template.renderNodes(value.template.nodes, scopes);
          break;
        }
      }
    }
    return result;
  }

  private renderSection(
    key: string,
    children: readonly TemplateNode[],
    scopes: readonly Dictionary[],
  ): string {
    const value = this.lookUp(key, scopes);
    switch (value.kind) {
      case "list":
        return value.items
          .map((item) => this.renderNodes(children, [...scopes, item]))
          .join("");
      case "flag":
        return value.flag ? this.renderNodes(children, scopes) : "";
      case "nested":
        return this.renderNodes(children, [...scopes, value.dictionary]);
      case "text":
      case "partial":
        throw this.shapeError(key, "list, flag or nested", value);
    }
  }

  private renderInvertedSection(
    key: string,
    children: readonly TemplateNode[],
    scopes: readonly Dictionary[],
  ): string {
    const value = this.lookUp(key, scopes);
    switch (value.kind) {
      case "list":
        return value.items.length ? "" : this.renderNodes(children, scopes);
      case "flag":
        return value.flag ? "" : this.renderNodes(children, scopes);
      case "nested":
        return "";
      case "text":
      case "partial":
        throw this.shapeError(key, "list, flag or nested", value);
    }
  }

  private lookUp(key: string, scopes: readonly Dictionary[]): DictionaryValue {
    for (let i = scopes.length - 1; i >= 0; --i) {
      const scope = scopes[i];
      if (Object.hasOwn(scope, key)) {
        return scope[key];
      }
    }
    throw new TemplateError(this.name, key, "missing key");
  }

  private shapeError(
    key: string,
    expected: string,
    actual: DictionaryValue,
  ): TemplateError {
    return new TemplateError(
      this.name,
      key,
      `expected ${expected}, got ${actual.kind}`,
    );
  }
}
