import type { Constant } from "./ast.js";

/**
 * Renders a constant as a Scala literal. Names of enums, enum values and
 * identifiers are emitted as they are: they are not checked against Scala
 * keywords.
 */
export function renderConstant(constant: Constant): string {
  switch (constant.kind) {
    case "null":
      return "null";
    case "string":
      return quote(constant.value);
    case "double":
      return doubleToLiteral(constant.value);
    case "int":
      return constant.value.toString();
    case "bool":
      return constant.value ? "true" : "false";
    case "list": {
      const elements = constant.elements.map(renderConstant);
      return `List(${elements.join(", ")})`;
    }
    case "map": {
      const entries = constant.entries.map(
        ([k, v]) => `${renderConstant(k)} -> ${renderConstant(v)}`,
      );
      return `Map(${entries.join(", ")})`;
    }
    case "enumValue":
      return `${constant.enumName}.${constant.valueName}`;
    case "identifier":
      return constant.name;
  }
}

/** Wraps `value` in double quotes, with C-style escapes. */
export function quote(value: string): string {
  let result = '"';
  for (const char of value) {
    const escaped = ESCAPES.get(char);
    if (escaped !== undefined) {
      result += escaped;
      continue;
    }
    const code = char.codePointAt(0) ?? 0;
    if (code < 0x20 || code === 0x7f) {
      result += "\\u" + code.toString(16).padStart(4, "0");
    } else {
      result += char;
    }
  }
  return result + '"';
}

const ESCAPES: ReadonlyMap<string, string> = new Map([
  ['"', '\\"'],
  ["\\", "\\\\"],
  ["\n", "\\n"],
  ["\r", "\\r"],
  ["\t", "\\t"],
  ["\b", "\\b"],
  ["\f", "\\f"],
]);

// Scala reads "1" as an Int: a Double literal needs a fraction or an
// exponent.
function doubleToLiteral(value: number): string {
  // `${-0}` is "0".
  const text = Object.is(value, -0) ? "-0" : `${value}`;
  const [mantissa, exponent] = text.split("e");
  const fraction = mantissa.includes(".") ? mantissa : `${mantissa}.0`;
  if (exponent === undefined) {
    return fraction;
  }
  return `${fraction}E${exponent.replace("+", "")}`;
}
