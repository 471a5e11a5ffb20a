/**
 * @module vector
 * @description Schema for cross-implementation test-vector files.
 *
 * A vector pins the canonical form and/or SHA-256 digest of an input, or
 * the reason canonicalization must fail. Every implementation runs the
 * same file.
 */

import { z } from "zod";
import { DIGEST_PATTERN } from "../digest";
import { INVALID_INPUT_REASONS } from "../errors";
import { JSONValueSchema } from "./json";

export const VectorOptionsSchema = z
  .object({
    maxDepth: z.number().int().nonnegative().optional(),
    safeIntegers: z.boolean().optional(),
    normalize: z.enum(["NFC", "NFD", "NFKC", "NFKD"]).optional(),
  })
  .strict();

export const VectorSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().optional(),
    // validated only; the runner gets the parsed value by reference
    input: z
      .unknown()
      .refine((v) => JSONValueSchema.safeParse(v).success, { message: "must be a JSON value" }),
    options: VectorOptionsSchema.optional(),
    canonical: z.string().optional(),
    sha256: z.string().regex(DIGEST_PATTERN).optional(),
    error: z.enum(INVALID_INPUT_REASONS).optional(),
  })
  .strict()
  .refine(
    (v) => v.canonical !== undefined || v.sha256 !== undefined || v.error !== undefined,
    { message: "vector must pin canonical, sha256 or error" }
  )
  .refine((v) => v.error === undefined || (v.canonical === undefined && v.sha256 === undefined), {
    message: "an error vector cannot also pin canonical or sha256",
  });

export const VectorSuiteSchema = z
  .object({
    version: z.literal(1),
    description: z.string().optional(),
    vectors: z.array(VectorSchema).min(1),
  })
  .strict();

export type VectorOptions = z.infer<typeof VectorOptionsSchema>;
export type Vector = z.infer<typeof VectorSchema>;
export type VectorSuite = z.infer<typeof VectorSuiteSchema>;
