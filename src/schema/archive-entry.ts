/**
 * @module archive-entry
 * @description Schema for archive entries whose semantic hash we reproduce.
 * Only the fields that take part in hashing are typed; everything else an
 * archive row carries (signatures, state hashes, ids) passes through
 * untouched.
 */

import { z } from "zod";
import { DIGEST_PATTERN } from "../digest";

/**
 * Zod schema for an archive entry as read back from storage or an export.
 *
 * @property {string} entry_id - Archive identifier, used in reports
 * @property {string} agent_id - Acting agent
 * @property {string} action_type - e.g. "contract_proposal"
 * @property {unknown} content - JSON value, or a string that may hold JSON
 * @property {string[]} evidence_pointers - Evidence references (default: [])
 * @property {string} constitutional_citation - Cited article
 * @property {string|number} timestamp - As stored
 * @property {string} semantic_hash - 64 lowercase hex SHA-256 digest
 *
 * @example
 * ```typescript
 * const entry = ArchiveEntrySchema.parse({
 *   entry_id: "0000001",
 *   agent_id: "agent-7",
 *   action_type: "contract_proposal",
 *   content: { claim: "The initial cost is $500" },
 *   evidence_pointers: ["archive://0000000"],
 *   constitutional_citation: "Article IV.1",
 *   timestamp: "2025-11-20T14:30:00Z",
 *   semantic_hash: "…64 hex…",
 * });
 * ```
 */
export const ArchiveEntrySchema = z
  .object({
    entry_id: z.string().min(1),
    agent_id: z.string().nullish(),
    action_type: z.string().nullish(),
    content: z.unknown(),
    evidence_pointers: z.array(z.string()).nullish(),
    constitutional_citation: z.string().nullish(),
    timestamp: z.union([z.string(), z.number()]).nullish(),
    semantic_hash: z.string().regex(DIGEST_PATTERN, "must be 64 lowercase hex characters"),
  })
  .passthrough();

/**
 * Type definition for a validated archive entry.
 * Inferred from the Zod schema so type and runtime validation match.
 */
export type ArchiveEntry = z.infer<typeof ArchiveEntrySchema>;
