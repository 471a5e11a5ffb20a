/**
 * @module json
 * @description Zod schema for plain JSON values, i.e. what `JSON.parse`
 * returns. Used to type file input before it reaches the canonicalizer.
 */

import { z } from "zod";
import type { JSONValue } from "../types";

const literalSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const JSONValueSchema: z.ZodType<JSONValue> = z.lazy(() =>
  z.union([literalSchema, z.array(JSONValueSchema), z.record(JSONValueSchema)])
);
