/**
 * @module normalize
 * @description Optional Unicode pre-normalisation. Runs before
 * canonicalization, never inside it: the serializer escapes code units
 * exactly as given, so two spellings of "é" (U+00E9 vs U+0065 U+0301)
 * only hash alike when both sides normalise first.
 */

import { DEFAULT_MAX_DEPTH } from "./canonical";
import { InvalidInputError } from "./errors";
import type { NormalizationForm } from "./types";
import { indexPath, isPlainObject, memberPath } from "./value";

function walk(
  value: unknown,
  form: NormalizationForm,
  path: string,
  depth: number,
  maxDepth: number
): unknown {
  if (typeof value === "string") return value.normalize(form);
  if (value === null || typeof value !== "object") return value;

  // anything else (Date, Map, class instances) is left for canonicalize to judge
  if (!Array.isArray(value) && !isPlainObject(value)) return value;

  if (depth >= maxDepth) {
    throw new InvalidInputError(
      "depth-exceeded",
      path,
      `Nesting depth exceeds ${maxDepth}`
    );
  }

  if (Array.isArray(value)) {
    return Array.from(value, (item: unknown, i) =>
      walk(item, form, indexPath(path, i), depth + 1, maxDepth)
    );
  }

  const out: Record<string, unknown> = {};
  for (const [key, member] of Object.entries(value)) {
    const normalizedKey = key.normalize(form);
    if (Object.prototype.hasOwnProperty.call(out, normalizedKey)) {
      throw new InvalidInputError(
        "duplicate-key",
        memberPath(path, normalizedKey),
        `Keys collide after ${form} normalisation`
      );
    }
    // defineProperty keeps an own "__proto__" key as data
    Object.defineProperty(out, normalizedKey, {
      value: walk(member, form, memberPath(path, key), depth + 1, maxDepth),
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }
  return out;
}

/**
 * Return a copy of `value` with every string and object key in the given
 * Unicode normalisation form. Arrays and plain objects are copied; other
 * values pass through untouched. The input is not modified.
 *
 * @throws {InvalidInputError} `duplicate-key` when two keys normalise to the
 *   same string, `depth-exceeded` past `maxDepth`
 *
 * @example
 * ```typescript
 * normalizeStrings({ name: "e\u0301" })  // { name: "\u00e9" }
 * ```
 */
export function normalizeStrings(
  value: unknown,
  form: NormalizationForm = "NFC",
  maxDepth = DEFAULT_MAX_DEPTH
): unknown {
  return walk(value, form, "$", 0, maxDepth);
}
