/**
 * @module value
 * @description Value Model adapter. Turns whatever the host JSON parser
 * produced into one of six tagged nodes so the serializer can match on a
 * closed union instead of inspecting runtime types itself.
 *
 * Only one level is classified per call; children stay as host values
 * until the serializer descends into them.
 */

import { InvalidInputError } from "./errors";
import type { CanonicalMode } from "./types";

export type ValueNode =
  | { kind: "null" }
  | { kind: "boolean"; value: boolean }
  | { kind: "number"; value: number | bigint }
  | { kind: "string"; value: string }
  | { kind: "array"; source: object; items: readonly unknown[] }
  | {
      kind: "object";
      source: object;
      entries: ReadonlyArray<readonly [string, unknown]>;
    };

export type ValueKind = ValueNode["kind"];

const IDENTIFIER_RX = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/** `$.a`, `$["odd key"]` */
export function memberPath(parent: string, key: string): string {
  return IDENTIFIER_RX.test(key)
    ? `${parent}.${key}`
    : `${parent}[${JSON.stringify(key)}]`;
}

/** `$[3]` */
export function indexPath(parent: string, index: number): string {
  return `${parent}[${index}]`;
}

/** Object literal or null-prototype object */
export function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function describe(value: unknown): string {
  if (value === undefined) return "undefined";
  if (typeof value === "object" && value !== null) {
    return value.constructor?.name ?? "object";
  }
  return typeof value;
}

function objectEntries(
  obj: object,
  path: string,
  mode: CanonicalMode
): Array<readonly [string, unknown]> {
  const symbols = Object.getOwnPropertySymbols(obj);
  if (symbols.length > 0) {
    throw new InvalidInputError(
      "non-string-key",
      path,
      `Symbol key ${String(symbols[0])}`
    );
  }
  const entries = Object.entries(obj);
  return mode === "lenient"
    ? entries.filter(([, v]) => v !== undefined)
    : entries;
}

function mapEntries(
  map: Map<unknown, unknown>,
  path: string
): Array<readonly [string, unknown]> {
  const entries: Array<readonly [string, unknown]> = [];
  for (const [key, val] of map) {
    if (typeof key !== "string") {
      throw new InvalidInputError(
        "non-string-key",
        path,
        `Map key of type ${describe(key)}`
      );
    }
    if (val !== undefined) entries.push([key, val]);
  }
  return entries;
}

/**
 * Classify a single host value.
 *
 * In `lenient` mode, `Date` becomes its ISO-8601 string, `Map` with string
 * keys becomes an object, `undefined` members are dropped and `undefined`
 * array slots (holes included) become `null`. Strict mode rejects all of
 * those.
 *
 * @throws {InvalidInputError} `unsupported-type` or `non-string-key`
 */
export function classify(
  value: unknown,
  path: string,
  mode: CanonicalMode = "strict"
): ValueNode {
  if (value === null) return { kind: "null" };
  if (typeof value === "boolean") return { kind: "boolean", value };
  if (typeof value === "number" || typeof value === "bigint") {
    return { kind: "number", value };
  }
  if (typeof value === "string") return { kind: "string", value };
  if (typeof value !== "object") {
    throw new InvalidInputError(
      "unsupported-type",
      path,
      `Unsupported type ${describe(value)}`
    );
  }

  if (Array.isArray(value)) {
    // Array.from reads holes as undefined; map would keep them
    const items: readonly unknown[] =
      mode === "lenient"
        ? Array.from(value, (item: unknown) => (item === undefined ? null : item))
        : value;
    return { kind: "array", source: value, items };
  }

  if (isPlainObject(value)) {
    return {
      kind: "object",
      source: value,
      entries: objectEntries(value, path, mode),
    };
  }

  if (mode === "lenient") {
    if (value instanceof Date) {
      if (Number.isNaN(value.getTime())) {
        throw new InvalidInputError("unsupported-type", path, "Invalid Date");
      }
      return { kind: "string", value: value.toISOString() };
    }
    if (value instanceof Map) {
      return {
        kind: "object",
        source: value,
        entries: mapEntries(value, path),
      };
    }
  }

  throw new InvalidInputError(
    "unsupported-type",
    path,
    `Unsupported type ${describe(value)}`
  );
}
