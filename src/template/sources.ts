import { readFileSync } from "node:fs";
import { TemplateError } from "../errors.js";

/** Returns the raw text of the fragment `name` found under `prefix`. */
export interface FragmentSource {
  load(prefix: string, name: string): string;
}

export const TEMPLATE_EXTENSION = ".mustache";

/** Directory holding the fragments shipped with this package. */
export const BUNDLED_TEMPLATES = new URL("../../templates/", import.meta.url);

/**
 * Reads `<root>/<prefix><name>.mustache`.
 */
export function directoryFragmentSource(root: URL): FragmentSource {
  return {
    load(prefix: string, name: string): string {
      const url = new URL(`${prefix}${name}${TEMPLATE_EXTENSION}`, root);
      return readFileSync(url, "utf-8");
    },
  };
}

/** Serves fragments keyed by `<prefix><name>`. */
export function memoryFragmentSource(
  fragments: Readonly<Record<string, string>>,
): FragmentSource {
  return {
    load(prefix: string, name: string): string {
      const path = `${prefix}${name}`;
      if (!Object.hasOwn(fragments, path)) {
        throw new TemplateError(name, undefined, `no fragment at ${path}`);
      }
      return fragments[path];
    },
  };
}
