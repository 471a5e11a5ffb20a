/* ------------------------------------------------------------------
 * types.ts  •  Centralised TypeScript types for canonical-digest
 * ------------------------------------------------------------------ */

/**
 * Any value a standard JSON parser can hand us.
 *
 * `bigint` is admitted as an integral number so that callers who parse
 * large integers losslessly can still canonicalize them.
 *
 * @example
 * ```typescript
 * const doc: JSONValue = { b: [3, 1, 2], a: { nested: null } };
 * ```
 */
export type JSONValue =
  | string
  | number
  | bigint
  | boolean
  | null
  | JSONValue[]
  | { [key: string]: JSONValue };

/** Object shape of {@link JSONValue}, used where only a mapping makes sense */
export type JSONObject = { [key: string]: JSONValue };

/**
 * How strictly foreign host values are treated.
 * - `strict`  – anything outside the six JSON variants is rejected
 * - `lenient` – `Date` becomes its ISO string and `undefined` members are
 *   dropped, the same way `JSON.stringify` treats them
 */
export type CanonicalMode = "strict" | "lenient";

/** Unicode normalisation forms accepted by {@link normalizeStrings} */
export type NormalizationForm = "NFC" | "NFD" | "NFKC" | "NFKD";

/** Digest algorithm. Only `sha256` is interoperable. */
export type HashAlgo = "sha256" | "blake3";

/** Options shared by every canonicalizing entry point */
export interface CanonicalizeOptions {
  /** Deepest allowed nesting of arrays/objects (default: 512) */
  maxDepth?: number;

  /** Host-value policy (default: 'strict') */
  mode?: CanonicalMode;

  /** Reject integral doubles beyond Number.MAX_SAFE_INTEGER (default: false) */
  safeIntegers?: boolean;
}

/** Options for {@link hash} and {@link verify} */
export interface HashOptions extends CanonicalizeOptions {
  /** Digest algorithm (default: 'sha256') */
  algorithm?: HashAlgo;
}

/**
 * 64 lowercase hex characters. Branded so a free-form string cannot be
 * passed where a computed digest is expected.
 */
export type Digest = string & { readonly __brand: "Digest" };
