/**
 * @module canonical
 * @description Canonical serializer. Produces the one compact string a
 * JSON value is allowed to have:
 * - `null` / `true` / `false` literals
 * - ASCII-only strings (see {@link escapeString})
 * - value-based numbers (see {@link formatNumber})
 * - arrays in their original order
 * - object members sorted by key code point, at every depth
 * - no whitespace anywhere
 *
 * Every call is pure: the input is never mutated, nothing is cached.
 */

import { InvalidInputError } from "./errors";
import { formatNumber } from "./number";
import { compareCodePoints, escapeString } from "./string";
import type { CanonicalMode, CanonicalizeOptions } from "./types";
import { classify, indexPath, memberPath, type ValueNode } from "./value";

/** Default nesting limit; deep enough for real documents, far below the JS stack */
export const DEFAULT_MAX_DEPTH = 512;

interface Context {
  readonly maxDepth: number;
  readonly mode: CanonicalMode;
  readonly safeIntegers: boolean;
  /** containers on the current descent path, for cycle detection */
  readonly ancestors: Set<object>;
}

function resolveContext(options: CanonicalizeOptions): Context {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  if (!Number.isInteger(maxDepth) || maxDepth < 0) {
    throw new RangeError(`maxDepth must be a non-negative integer, got ${maxDepth}`);
  }
  return {
    maxDepth,
    mode: options.mode ?? "strict",
    safeIntegers: options.safeIntegers ?? false,
    ancestors: new Set(),
  };
}

function assertNever(node: never): never {
  throw new Error(`Unhandled value node ${JSON.stringify(node)}`);
}

function enter(container: object, path: string, depth: number, ctx: Context): void {
  if (depth > ctx.maxDepth) {
    throw new InvalidInputError(
      "depth-exceeded",
      path,
      `Nesting depth exceeds ${ctx.maxDepth}`
    );
  }
  if (ctx.ancestors.has(container)) {
    throw new InvalidInputError("cycle", path, "Cyclic reference");
  }
  ctx.ancestors.add(container);
}

function serializeArray(
  node: Extract<ValueNode, { kind: "array" }>,
  path: string,
  depth: number,
  ctx: Context
): string {
  enter(node.source, path, depth, ctx);
  // indexed loop: a hole reaches classify as undefined
  const parts: string[] = [];
  for (let i = 0; i < node.items.length; i++) {
    parts.push(serialize(node.items[i], indexPath(path, i), depth, ctx));
  }
  ctx.ancestors.delete(node.source);
  return `[${parts.join(",")}]`;
}

function serializeObject(
  node: Extract<ValueNode, { kind: "object" }>,
  path: string,
  depth: number,
  ctx: Context
): string {
  enter(node.source, path, depth, ctx);
  // new sorted list; the caller's object is left untouched
  const sorted = [...node.entries].sort(([a], [b]) => compareCodePoints(a, b));
  const parts = sorted.map(
    ([key, member]) =>
      `${escapeString(key)}:${serialize(member, memberPath(path, key), depth, ctx)}`
  );
  ctx.ancestors.delete(node.source);
  return `{${parts.join(",")}}`;
}

/**
 * @param depth number of containers enclosing `value`
 */
function serialize(value: unknown, path: string, depth: number, ctx: Context): string {
  const node = classify(value, path, ctx.mode);

  switch (node.kind) {
    case "null":
      return "null";
    case "boolean":
      return node.value ? "true" : "false";
    case "number":
      return formatNumber(node.value, path, ctx);
    case "string":
      return escapeString(node.value);
    case "array":
      return serializeArray(node, path, depth + 1, ctx);
    case "object":
      return serializeObject(node, path, depth + 1, ctx);
    default:
      return assertNever(node);
  }
}

function isStackOverflow(err: unknown): boolean {
  return err instanceof RangeError && /call stack/i.test(err.message);
}

/**
 * Canonical form of a JSON value.
 *
 * @throws {InvalidInputError} for non-finite numbers, foreign types,
 *   non-string keys, cycles and nesting beyond `maxDepth`
 *
 * @example
 * ```typescript
 * canonicalize({ b: 1, a: [3, 1, 2] })     // '{"a":[3,1,2],"b":1}'
 * canonicalize({ confidence: 0.950 })      // '{"confidence":0.95}'
 * canonicalize({ message: "über €" })      // '{"message":"\\u00fcber \\u20ac"}'
 * ```
 */
export function canonicalize(value: unknown, options: CanonicalizeOptions = {}): string {
  const ctx = resolveContext(options);
  try {
    return serialize(value, "$", 0, ctx);
  } catch (err) {
    if (isStackOverflow(err)) {
      throw new InvalidInputError(
        "depth-exceeded",
        "$",
        "Nesting too deep for the call stack"
      );
    }
    throw err;
  }
}

/**
 * UTF-8 bytes of {@link canonicalize}. The canonical form is pure ASCII,
 * so this is one byte per character.
 */
export function canonicalBytes(
  value: unknown,
  options: CanonicalizeOptions = {}
): Uint8Array {
  return new TextEncoder().encode(canonicalize(value, options));
}
