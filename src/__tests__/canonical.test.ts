import { canonicalStringify, encodeCanonical } from "../canonical.js";
import { SerializationError } from "../errors.js";

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected function to throw");
}

describe("canonicalStringify", () => {
  it("sorts object keys recursively and writes no whitespace", () => {
    const value = { b: 1, a: [3, 1, { d: true, c: null }] };
    expect(canonicalStringify(value)).toBe('{"a":[3,1,{"c":null,"d":true}],"b":1}');
  });

  it("is independent of key insertion order", () => {
    const first: Record<string, string> = {};
    first["s:zeta"] = "func zeta()";
    first["s:alpha"] = "func alpha()";
    first["s:mid"] = "var mid: Int";

    const second: Record<string, string> = {};
    second["s:mid"] = "var mid: Int";
    second["s:alpha"] = "func alpha()";
    second["s:zeta"] = "func zeta()";

    expect(canonicalStringify({ symbols: first, target: "Mod" })).toBe(
      canonicalStringify({ target: "Mod", symbols: second })
    );
  });

  it("orders keys by code unit, uppercase before lowercase", () => {
    expect(canonicalStringify({ b: 1, B: 2, a: 3 })).toBe('{"B":2,"a":3,"b":1}');
  });

  it("keeps array order", () => {
    expect(canonicalStringify(["b", "a", "c"])).toBe('["b","a","c"]');
  });

  it("escapes quotes, backslashes and control characters", () => {
    const input = 'a"b\\c\n\t\u0001';
    const encoded = canonicalStringify(input);
    expect(encoded).toBe('"a\\"b\\\\c\\n\\t\\u0001"');
    expect(JSON.parse(encoded)).toBe(input);
  });

  it("leaves non-ASCII text unescaped", () => {
    expect(canonicalStringify("café → ✓")).toBe('"café → ✓"');
  });

  it("escapes unpaired surrogates and keeps pairs", () => {
    const input = "a\ud800b\udc00😀";
    const bytes = encodeCanonical(input);
    expect(bytes.toString("utf-8")).toBe('"a\\ud800b\\udc00😀"');
    expect(JSON.parse(bytes.toString("utf-8"))).toBe(input);
  });

  it("writes numbers in a fixed form", () => {
    expect(canonicalStringify([0, -0, 1.5, 1e21, -3])).toBe("[0,0,1.5,1e+21,-3]");
  });

  it("writes booleans and null", () => {
    expect(canonicalStringify({ t: true, f: false, n: null })).toBe('{"f":false,"n":null,"t":true}');
  });

  it("rejects undefined values with their path", () => {
    const error = thrownBy(() => canonicalStringify({ a: { b: undefined } }));
    expect(error).toBeInstanceOf(SerializationError);
    expect(error).toMatchObject({
      kind: "SerializationError",
      path: "$.a.b",
      valueType: "undefined",
    });
  });

  it("rejects non-finite numbers", () => {
    expect(() => canonicalStringify([NaN])).toThrow("Unsupported JSON value at $[0]: NaN");
    expect(() => canonicalStringify({ x: Infinity })).toThrow(
      "Unsupported JSON value at $.x: Infinity"
    );
  });

  it("rejects values outside the JSON universe", () => {
    expect(() => canonicalStringify(new Map())).toThrow("Unsupported JSON value at $: Map");
    expect(() => canonicalStringify({ d: new Date(0) })).toThrow(
      "Unsupported JSON value at $.d: Date"
    );
    expect(() => canonicalStringify(() => 1)).toThrow("Unsupported JSON value at $: function");
    expect(() => canonicalStringify(BigInt(1))).toThrow("Unsupported JSON value at $: bigint");
  });

  it("rejects sparse arrays", () => {
    const sparse = new Array<number>(3);
    sparse[0] = 1;
    sparse[2] = 2;
    expect(() => canonicalStringify(sparse)).toThrow("Unsupported JSON value at $[1]: hole");
  });
});

describe("encodeCanonical", () => {
  it("returns identical bytes for repeated encodings", () => {
    const value = { target: "Mod", symbols: { "s:b": "func b()", "s:a": "func a()" } };
    const first = encodeCanonical(value);
    const second = encodeCanonical(value);
    expect(first.equals(second)).toBe(true);
    expect(first.toString("utf8")).toBe(
      '{"symbols":{"s:a":"func a()","s:b":"func b()"},"target":"Mod"}'
    );
  });

  it("encodes as UTF-8", () => {
    expect([...encodeCanonical("é")]).toEqual([0x22, 0xc3, 0xa9, 0x22]);
  });
});
