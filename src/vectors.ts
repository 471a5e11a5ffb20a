/**
 * @module vectors
 * @description Runs cross-implementation test vectors against this
 * implementation. A vector passes when every value it pins (canonical form,
 * SHA-256 digest, or failure reason) matches what we compute.
 */

import * as fs from "node:fs";

import { canonicalize } from "./canonical";
import { digest } from "./digest";
import { errorMessage, isInvalidInput, type InvalidInputReason } from "./errors";
import { normalizeStrings } from "./normalize";
import { VectorSuiteSchema, type Vector, type VectorSuite } from "./schema/vector";
import { zodIssues } from "./schema/issues";
import type { CanonicalizeOptions } from "./types";
import { log } from "./utils/logger";

export interface VectorOutcome {
  canonical?: string;
  sha256?: string;
  error?: InvalidInputReason;
}

export interface VectorResult {
  name: string;
  ok: boolean;
  expected: VectorOutcome;
  actual: VectorOutcome;
}

/** Raised when a vector file cannot be read or does not match the schema */
export class VectorFileError extends Error {
  constructor(
    public readonly file: string,
    message: string
  ) {
    super(`${file}: ${message}`);
    this.name = "VectorFileError";
  }
}

function expectedOf(vector: Vector): VectorOutcome {
  const expected: VectorOutcome = {};
  if (vector.canonical !== undefined) expected.canonical = vector.canonical;
  if (vector.sha256 !== undefined) expected.sha256 = vector.sha256;
  if (vector.error !== undefined) expected.error = vector.error;
  return expected;
}

function compute(vector: Vector, base: CanonicalizeOptions): VectorOutcome {
  const { normalize, ...overrides } = vector.options ?? {};
  const options: CanonicalizeOptions = { ...base, ...overrides };
  try {
    const input = normalize
      ? normalizeStrings(vector.input, normalize, options.maxDepth)
      : vector.input;
    const canonical = canonicalize(input, options);
    return { canonical, sha256: digest(canonical, "sha256") };
  } catch (err) {
    if (isInvalidInput(err)) return { error: err.reason };
    throw err;
  }
}

function matches(expected: VectorOutcome, actual: VectorOutcome): boolean {
  if (expected.error !== undefined) return actual.error === expected.error;
  if (actual.error !== undefined) return false;
  return (
    (expected.canonical === undefined || expected.canonical === actual.canonical) &&
    (expected.sha256 === undefined || expected.sha256 === actual.sha256)
  );
}

export function runVector(
  vector: Vector,
  options: CanonicalizeOptions = {}
): VectorResult {
  const expected = expectedOf(vector);
  const actual = compute(vector, options);
  return { name: vector.name, ok: matches(expected, actual), expected, actual };
}

/**
 * Run every vector of an already-parsed suite. Vector-level options
 * override `options`.
 */
export function runVectorSuite(
  suite: VectorSuite,
  options: CanonicalizeOptions = {}
): VectorResult[] {
  return suite.vectors.map((vector) => {
    const result = runVector(vector, options);
    if (result.ok) {
      log.debug(`vector ${result.name} ok`);
    } else {
      log.warn(
        `vector ${result.name} failed: expected ${JSON.stringify(result.expected)}, got ${JSON.stringify(result.actual)}`
      );
    }
    return result;
  });
}

/** Parse and validate vector-file text */
export function parseVectorSuite(text: string, file = "<input>"): VectorSuite {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new VectorFileError(file, `not valid JSON (${errorMessage(err)})`);
  }

  const parsed = VectorSuiteSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = zodIssues(parsed.error).join("; ");
    throw new VectorFileError(file, issues);
  }
  return parsed.data;
}

/**
 * Read a vector file and run it.
 *
 * @throws {VectorFileError} when the file is unreadable or malformed
 */
export function runVectors(
  file: string,
  options: CanonicalizeOptions = {}
): VectorResult[] {
  let text: string;
  try {
    text = fs.readFileSync(file, "utf8");
  } catch (err) {
    throw new VectorFileError(file, errorMessage(err));
  }

  const results = runVectorSuite(parseVectorSuite(text, file), options);
  const failed = results.filter((r) => !r.ok).length;
  log.info(`${file}: ${results.length - failed}/${results.length} vectors passed`);
  return results;
}
