import { describe, expect, it } from "vitest";
import type { Constant } from "../src/ast.js";
import { quote, renderConstant } from "../src/constant_renderer.js";

const int = (value: number): Constant => ({ kind: "int", value: BigInt(value) });
const str = (value: string): Constant => ({ kind: "string", value: value });

describe("renderConstant", () => {
  it("renders scalars", () => {
    expect(renderConstant({ kind: "null" })).toBe("null");
    expect(renderConstant({ kind: "bool", value: true })).toBe("true");
    expect(renderConstant(int(-42))).toBe("-42");
    expect(
      renderConstant({ kind: "int", value: 9007199254740993n }),
    ).toBe("9007199254740993");
  });

  it("renders doubles with a fraction or an exponent", () => {
    expect(renderConstant({ kind: "double", value: 1 })).toBe("1.0");
    expect(renderConstant({ kind: "double", value: 2.5 })).toBe("2.5");
    expect(renderConstant({ kind: "double", value: 1.5e21 })).toBe("1.5E21");
    expect(renderConstant({ kind: "double", value: 1e-7 })).toBe("1.0E-7");
  });

  it("keeps the sign of negative zero", () => {
    expect(renderConstant({ kind: "double", value: -0 })).toBe("-0.0");
    expect(renderConstant({ kind: "double", value: 0 })).toBe("0.0");
    expect(renderConstant({ kind: "double", value: -1 })).toBe("-1.0");
  });

  it("renders lists in order", () => {
    expect(
      renderConstant({ kind: "list", elements: [int(1), int(2)] }),
    ).toBe("List(1, 2)");
    expect(renderConstant({ kind: "list", elements: [] })).toBe("List()");
  });

  it("renders maps as pairs", () => {
    expect(
      renderConstant({ kind: "map", entries: [[str("a"), int(1)]] }),
    ).toBe('Map("a" -> 1)');
  });

  it("renders nested containers", () => {
    const constant: Constant = {
      kind: "map",
      entries: [
        [str("xs"), { kind: "list", elements: [int(1)] }],
        [str("ys"), { kind: "list", elements: [] }],
      ],
    };
    expect(renderConstant(constant)).toBe(
      'Map("xs" -> List(1), "ys" -> List())',
    );
  });

  it("qualifies enum values and keeps identifiers verbatim", () => {
    expect(
      renderConstant({ kind: "enumValue", enumName: "Color", valueName: "RED" }),
    ).toBe("Color.RED");
    expect(renderConstant({ kind: "identifier", name: "MAX_SIZE" })).toBe(
      "MAX_SIZE",
    );
  });
});

describe("quote", () => {
  it("escapes quotes and backslashes", () => {
    expect(quote('say "hi" \\o/')).toBe('"say \\"hi\\" \\\\o/"');
  });

  it("escapes control characters", () => {
    expect(quote("a\nb\tc\r")).toBe('"a\\nb\\tc\\r"');
    expect(quote("\u0001")).toBe('"\\u0001"');
  });

  it("keeps non-ASCII characters", () => {
    expect(quote("café")).toBe('"café"');
  });

  it("produces a literal which reads back as the original value", () => {
    const value = 'x"\\\n\t\u0002y';
    // A JSON string literal reads \uXXXX and the other escapes the same way.
    expect(JSON.parse(quote(value))).toBe(value);
  });
});
