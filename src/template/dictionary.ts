import type { Template } from "./template.js";

export type DictionaryValue =
  | { readonly kind: "text"; readonly text: string }
  | { readonly kind: "flag"; readonly flag: boolean }
  | { readonly kind: "nested"; readonly dictionary: Dictionary }
  | { readonly kind: "list"; readonly items: readonly Dictionary[] }
  /** A compiled fragment a `{{>key}}` tag can include. */
  | { readonly kind: "partial"; readonly template: Template };

/** The data a fragment is rendered with. */
export interface Dictionary {
  readonly [key: string]: DictionaryValue;
}

export function text(value: string): DictionaryValue {
  return { kind: "text", text: value };
}

export function flag(value: boolean): DictionaryValue {
  return { kind: "flag", flag: value };
}

export function nested(dictionary: Dictionary): DictionaryValue {
  return { kind: "nested", dictionary: dictionary };
}

export function list(items: readonly Dictionary[]): DictionaryValue {
  return { kind: "list", items: items };
}

export function partial(template: Template): DictionaryValue {
  return { kind: "partial", template: template };
}
