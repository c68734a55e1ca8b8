import { TemplateError } from "../errors.js";

export type TemplateNode =
  | { readonly kind: "text"; readonly text: string }
  | { readonly kind: "variable"; readonly key: string }
  | {
      readonly kind: "section";
      readonly key: string;
      readonly inverted: boolean;
      readonly children: readonly TemplateNode[];
    }
  | { readonly kind: "partial"; readonly key: string };

interface OpenSection {
  readonly key: string;
  readonly inverted: boolean;
  readonly children: TemplateNode[];
}

const TAG = /\{\{([#^/>!]?)\s*([^}]*?)\s*\}\}/g;

/**
 * Compiles fragment source into a tree of nodes.
 *
 * Grammar: `{{key}}`, `{{#key}}...{{/key}}`, `{{^key}}...{{/key}}`,
 * `{{>key}}` and `{{! comment}}`. A section, partial or comment tag which is
 * alone on its line removes the whole line from the output.
 */
export function parseTemplate(
  fragment: string,
  source: string,
): readonly TemplateNode[] {
  const root: TemplateNode[] = [];
  const stack: OpenSection[] = [];
  const current = (): TemplateNode[] => stack.at(-1)?.children ?? root;

  let cursor = 0;
  for (const match of source.matchAll(TAG)) {
    const [tag, sigil, key] = match;
    const start = match.index ?? 0;
    let textEnd = start;
    let next = start + tag.length;
    if (sigil !== "") {
      const standalone = getStandaloneBounds(source, start, next);
      if (standalone) {
        textEnd = standalone.lineStart;
        next = standalone.lineEnd;
      }
    }
    if (textEnd > cursor) {
      current().push({ kind: "text", text: source.slice(cursor, textEnd) });
    }
    cursor = next;

    if (sigil === "!") continue;
    if (key === "") {
      throw new TemplateError(fragment, undefined, `empty tag at ${start}`);
    }
    switch (sigil) {
      case "":
        current().push({ kind: "variable", key: key });
        break;
      case ">":
        current().push({ kind: "partial", key: key });
        break;
      case "#":
      case "^":
        stack.push({ key: key, inverted: sigil === "^", children: [] });
        break;
      case "/": {
        const section = stack.pop();
        if (!section) {
          throw new TemplateError(fragment, key, "closing an unopened section");
        }
        if (section.key !== key) {
          throw new TemplateError(
            fragment,
            key,
            `closing section "${section.key}"`,
          );
        }
        current().push({
          kind: "section",
          key: section.key,
          inverted: section.inverted,
          children: section.children,
        });
        break;
      }
    }
  }
  const unclosed = stack.at(-1);
  if (unclosed) {
    throw new TemplateError(fragment, unclosed.key, "unclosed section");
  }
  if (cursor < source.length) {
    root.push({ kind: "text", text: source.slice(cursor) });
  }
  return root;
}

/**
 * If the tag between `start` and `end` is the only thing on its line
 * besides whitespace, returns the bounds of the line, line break included.
 */
function getStandaloneBounds(
  source: string,
  start: number,
  end: number,
): { lineStart: number; lineEnd: number } | undefined {
  const lineStart = source.lastIndexOf("\n", start - 1) + 1;
  if (!/^[ \t]*$/.test(source.slice(lineStart, start))) {
    return undefined;
  }
  const trailing = /^[ \t]*(\r?\n|$)/.exec(source.slice(end));
  if (!trailing) {
    return undefined;
  }
  return { lineStart: lineStart, lineEnd: end + trailing[0].length };
}
