export { canonicalize, canonicalBytes, DEFAULT_MAX_DEPTH } from "./canonical";
export {
  digest,
  hash,
  verify,
  canonicallyEqual,
  isDigest,
  DIGEST_PATTERN,
  HASH_ALGORITHM,
} from "./digest";
export {
  formatNumber,
  isIntegral,
  MIN_PLAIN_EXPONENT,
  MAX_PLAIN_EXPONENT,
  MAX_SAFE_INTEGER,
} from "./number";
export { escapeString, compareCodePoints } from "./string";
export { classify } from "./value";
export { normalizeStrings } from "./normalize";
export {
  InvalidInputError,
  ConfigError,
  INVALID_INPUT_REASONS,
  isInvalidInput,
} from "./errors";
export {
  hashableContent,
  reproduceEntryHash,
  reproduceEntries,
} from "./entry";
export {
  runVector,
  runVectorSuite,
  runVectors,
  parseVectorSuite,
  VectorFileError,
} from "./vectors";
export { ArchiveEntrySchema } from "./schema/archive-entry";
export { JSONValueSchema } from "./schema/json";
export { VectorSuiteSchema, VectorSchema } from "./schema/vector";
export { ConfigManager, loadConfig, DEFAULT_CONFIG } from "./config";
export { log } from "./utils/logger";

export type {
  JSONValue,
  JSONObject,
  CanonicalMode,
  CanonicalizeOptions,
  HashOptions,
  HashAlgo,
  NormalizationForm,
  Digest,
} from "./types";
export type { InvalidInputReason } from "./errors";
export type { ValueNode, ValueKind } from "./value";
export type { EntryReproduction, ReproductionReport, ReproductionSummary } from "./entry";
export type { VectorResult, VectorOutcome } from "./vectors";
export type { Vector, VectorSuite, VectorOptions } from "./schema/vector";
export type { ArchiveEntry } from "./schema/archive-entry";
export type { CanonicalDigestConfig, CanonicalDigestInit } from "./config";
export type { LogLevel } from "./utils/logger";
