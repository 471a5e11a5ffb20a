/* ------------------------------------------------------------------
 * digest.ts  •  Canonical JSON digests for canonical-digest
 * ------------------------------------------------------------------
 *  ▸ digest(payload)          – SHA-256 (default) or BLAKE3 hex digest
 *  ▸ hash(value)              – canonicalize → UTF-8 → digest
 *  ▸ verify(value, expected)  – recompute and compare
 *  ▸ canonicallyEqual(a, b)   – compare canonical forms
 *
 *  Notes
 *  -----
 *  • The wire contract is canonical form + SHA-256 + lowercase hex.
 *    BLAKE3 is for local fingerprints only and never leaves the process.
 *  • @napi-rs/blake-hash returns a Buffer → .toString('hex')
 * ------------------------------------------------------------------ */

import { createHash, timingSafeEqual } from "node:crypto";
import { blake3 } from "@napi-rs/blake-hash";

import { canonicalize } from "./canonical";
import { isInvalidInput } from "./errors";
import type { CanonicalizeOptions, Digest, HashAlgo, HashOptions } from "./types";

export const HASH_ALGORITHM: HashAlgo = "sha256";

/** 64 lowercase hex characters, as stored alongside the canonical form */
export const DIGEST_PATTERN = /^[a-f0-9]{64}$/;

export function isDigest(value: unknown): value is Digest {
  return typeof value === "string" && DIGEST_PATTERN.test(value);
}

/* ---------- 1. Digest primitive ----------------------------------- */

export function digest(
  payload: string | Uint8Array,
  algo: HashAlgo = HASH_ALGORITHM
): Digest {
  const hex =
    algo === "blake3"
      ? blake3(typeof payload === "string" ? payload : Buffer.from(payload)).toString("hex")
      : createHash("sha256").update(payload).digest("hex");

  if (!isDigest(hex)) {
    throw new Error(`[canonical-digest] ${algo} produced a malformed digest`);
  }
  return hex;
}

/* ---------- 2. Value digests -------------------------------------- */

/**
 * Digest of a value's canonical form.
 *
 * @throws {InvalidInputError} when the value cannot be canonicalized
 *
 * @example
 * ```typescript
 * hash({ b: 2, a: 1 }) === hash({ a: 1, b: 2 })  // true
 * ```
 */
export function hash(value: unknown, options: HashOptions = {}): Digest {
  const { algorithm, ...canonOpts } = options;
  return digest(canonicalize(value, canonOpts), algorithm);
}

/**
 * Recompute the digest of `value` and compare it with `expected`.
 * `expected` is compared case-insensitively; anything that is not 64 hex
 * characters is simply a mismatch.
 *
 * @throws {InvalidInputError} when `value` cannot be canonicalized
 */
export function verify(
  value: unknown,
  expected: string,
  options: HashOptions = {}
): boolean {
  const wanted = expected.toLowerCase();
  if (!isDigest(wanted)) return false;

  const actual = hash(value, options);
  return timingSafeEqual(Buffer.from(actual, "hex"), Buffer.from(wanted, "hex"));
}

/* ---------- 3. Canonical equality --------------------------------- */

type Attempt = { ok: true; canonical: string } | { ok: false };

function attempt(value: unknown, options: CanonicalizeOptions): Attempt {
  try {
    return { ok: true, canonical: canonicalize(value, options) };
  } catch (err) {
    if (isInvalidInput(err)) return { ok: false };
    throw err;
  }
}

/**
 * True iff both values share a canonical form. Fails closed: when either
 * side is not canonicalizable the result is `false`, unless both sides are
 * the very same value (`Object.is`).
 *
 * @example
 * ```typescript
 * canonicallyEqual({ z: 1, a: 2 }, { a: 2, z: 1 })  // true
 * canonicallyEqual(NaN, NaN)                        // true
 * canonicallyEqual(NaN, Infinity)                   // false
 * ```
 */
export function canonicallyEqual(
  a: unknown,
  b: unknown,
  options: CanonicalizeOptions = {}
): boolean {
  const left = attempt(a, options);
  const right = attempt(b, options);

  if (left.ok && right.ok) return left.canonical === right.canonical;
  if (!left.ok && !right.ok) return Object.is(a, b);
  return false;
}
