import { describe, expect, it } from "vitest";

import { canonicalBytes, canonicalize, DEFAULT_MAX_DEPTH } from "../../src/canonical";
import { InvalidInputError } from "../../src/errors";

function failure(fn: () => unknown): InvalidInputError {
  try {
    fn();
  } catch (err) {
    if (err instanceof InvalidInputError) return err;
    throw err;
  }
  throw new Error("expected InvalidInputError");
}

function nested(depth: number): unknown {
  let value: unknown = 1;
  for (let i = 0; i < depth; i++) value = [value];
  return value;
}

describe("canonical.ts", () => {
  describe("canonicalize", () => {
    it("should sort keys and keep array order", () => {
      expect(canonicalize({ b: 1, a: [3, 1, 2] })).toBe('{"a":[3,1,2],"b":1}');
    });

    it("should format numbers by value", () => {
      const payload = {
        timestamp: 1678886400,
        cost: 100.5,
        confidence: 0.95,
        result: null,
        is_valid: false,
      };
      expect(canonicalize(payload)).toBe(
        '{"confidence":0.95,"cost":100.5,"is_valid":false,"result":null,"timestamp":1678886400}'
      );
      expect(canonicalize({ cost: Number("0100.50") })).toBe('{"cost":100.5}');
    });

    it("should escape non-ASCII characters", () => {
      const message = "über €";
      expect(canonicalize({ message })).toBe('{"message":"\\u00fcber \\u20ac"}');
    });

    it("should sort nested objects at every depth", () => {
      const complex = { z: [3, 2, 1], a: { c: 3, b: 2, a: 1 }, m: null };
      expect(canonicalize(complex)).toBe('{"a":{"a":1,"b":2,"c":3},"m":null,"z":[3,2,1]}');
    });

    it("should serialize primitives", () => {
      expect(canonicalize(null)).toBe("null");
      expect(canonicalize(true)).toBe("true");
      expect(canonicalize(false)).toBe("false");
      expect(canonicalize(-0)).toBe("0");
      expect(canonicalize("test")).toBe('"test"');
    });

    it("should accept null-prototype objects", () => {
      const bare: Record<string, unknown> = Object.create(null);
      bare.k = "v";
      expect(canonicalize(bare)).toBe('{"k":"v"}');
    });

    it("should not mutate the input", () => {
      const input = { b: [2, 1], a: { d: 1, c: 2 } };
      canonicalize(input);
      expect(Object.keys(input)).toEqual(["b", "a"]);
      expect(Object.keys(input.a)).toEqual(["d", "c"]);
      expect(input.b).toEqual([2, 1]);
    });

    it("should allow shared references that are not cycles", () => {
      const shared = { x: 1 };
      expect(canonicalize({ a: shared, b: [shared, shared] })).toBe(
        '{"a":{"x":1},"b":[{"x":1},{"x":1}]}'
      );
    });

    it("should format bigints like the double they equal", () => {
      expect(canonicalize({ n: 10n })).toBe('{"n":10}');
      expect(canonicalize(2n ** 64n)).toBe("18446744073709552000");
      expect(canonicalize(2n ** 64n + 1n)).toBe("18446744073709551617");
    });

    it("should reject non-finite numbers with their path", () => {
      const err = failure(() => canonicalize({ value: NaN }));
      expect(err.reason).toBe("non-finite-number");
      expect(err.path).toBe("$.value");
      expect(err.message).toBe("Non-finite number NaN at $.value");

      expect(failure(() => canonicalize([1, Infinity])).path).toBe("$[1]");
    });

    it("should reject cycles", () => {
      const a: Record<string, unknown> = {};
      a.self = a;
      const err = failure(() => canonicalize(a));
      expect(err.reason).toBe("cycle");
      expect(err.path).toBe("$.self");

      const list: unknown[] = [];
      list.push({ back: list });
      expect(failure(() => canonicalize(list)).path).toBe("$[0].back");
    });

    it("should reject foreign types in strict mode", () => {
      expect(failure(() => canonicalize({ a: undefined })).message).toBe(
        "Unsupported type undefined at $.a"
      );
      expect(failure(() => canonicalize(new Date(0))).message).toBe(
        "Unsupported type Date at $"
      );
      expect(failure(() => canonicalize(new Map())).reason).toBe("unsupported-type");
      expect(failure(() => canonicalize(() => 1)).reason).toBe("unsupported-type");
      expect(failure(() => canonicalize([Symbol("s")])).path).toBe("$[0]");
    });

    it("should reject symbol keys", () => {
      const err = failure(() => canonicalize({ [Symbol("s")]: 1 }));
      expect(err.reason).toBe("non-string-key");
    });

    it("should quote odd keys in error paths", () => {
      const err = failure(() => canonicalize({ "odd key": [NaN] }));
      expect(err.path).toBe('$["odd key"][0]');
    });

    it("should convert host values in lenient mode", () => {
      const value = {
        skipped: undefined,
        date: new Date(0),
        map: new Map<string, unknown>([
          ["k", 1],
          ["gone", undefined],
        ]),
        list: [undefined, 1],
      };
      expect(canonicalize(value, { mode: "lenient" })).toBe(
        '{"date":"1970-01-01T00:00:00.000Z","list":[null,1],"map":{"k":1}}'
      );
    });

    it("should reject non-string map keys and invalid dates in lenient mode", () => {
      expect(
        failure(() => canonicalize(new Map([[1, "a"]]), { mode: "lenient" })).reason
      ).toBe("non-string-key");
      expect(
        failure(() => canonicalize({ d: new Date(NaN) }, { mode: "lenient" })).message
      ).toBe("Invalid Date at $.d");
    });

    it("should reject array holes in strict mode", () => {
      // eslint-disable-next-line no-sparse-arrays
      const err = failure(() => canonicalize([1, , 3]));
      expect(err.reason).toBe("unsupported-type");
      expect(err.message).toBe("Unsupported type undefined at $[1]");
      expect(failure(() => canonicalize(new Array(3))).path).toBe("$[0]");
    });

    it("should write array holes as null in lenient mode", () => {
      // eslint-disable-next-line no-sparse-arrays
      expect(canonicalize([1, , 3], { mode: "lenient" })).toBe("[1,null,3]");
      expect(canonicalize(new Array(3), { mode: "lenient" })).toBe("[null,null,null]");
      expect(canonicalize({ list: new Array(1) }, { mode: "lenient" })).toBe(
        '{"list":[null]}'
      );
    });

    it("should still detect cycles through lenient copies", () => {
      const list: unknown[] = [undefined];
      list.push(list);
      const err = failure(() => canonicalize(list, { mode: "lenient" }));
      expect(err.reason).toBe("cycle");
      expect(err.path).toBe("$[1]");
    });
  });

  describe("depth limit", () => {
    it("should count containers against maxDepth", () => {
      expect(canonicalize(nested(3), { maxDepth: 3 })).toBe("[[[1]]]");

      const err = failure(() => canonicalize(nested(4), { maxDepth: 3 }));
      expect(err.reason).toBe("depth-exceeded");
      expect(err.path).toBe("$[0][0][0]");
      expect(err.message).toBe("Nesting depth exceeds 3 at $[0][0][0]");
    });

    it("should allow scalars at depth zero", () => {
      expect(canonicalize("x", { maxDepth: 0 })).toBe('"x"');
      expect(failure(() => canonicalize({}, { maxDepth: 0 })).path).toBe("$");
    });

    it("should apply the default limit", () => {
      expect(() => canonicalize(nested(DEFAULT_MAX_DEPTH))).not.toThrow();
      expect(failure(() => canonicalize(nested(DEFAULT_MAX_DEPTH + 1))).reason).toBe(
        "depth-exceeded"
      );
    });

    it("should turn a stack overflow into depth-exceeded", () => {
      const err = failure(() =>
        canonicalize(nested(200_000), { maxDepth: Number.MAX_SAFE_INTEGER })
      );
      expect(err.reason).toBe("depth-exceeded");
      expect(err.path).toBe("$");
    });

    it("should reject an invalid maxDepth option", () => {
      expect(() => canonicalize(1, { maxDepth: -1 })).toThrow(RangeError);
      expect(() => canonicalize(1, { maxDepth: 1.5 })).toThrow(RangeError);
    });
  });

  describe("canonicalBytes", () => {
    it("should return one byte per character", () => {
      expect(Array.from(canonicalBytes([]))).toEqual([0x5b, 0x5d]);

      const bytes = canonicalBytes({ message: "über" });
      expect(bytes.length).toBe(canonicalize({ message: "über" }).length);
      expect(bytes.every((b) => b < 0x80)).toBe(true);
    });
  });
});
