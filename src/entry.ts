/**
 * @module entry
 * @description Reproduce the semantic hash recorded on archive entries.
 *
 * The hashed content of an entry is the six-field projection
 * `action_type, agent_id, content, evidence_pointers,
 * constitutional_citation, timestamp`. Missing fields hash as `null`,
 * except `evidence_pointers`, which defaults to `[]`. String `content` that
 * holds JSON is hashed as the parsed value.
 */

import { hash } from "./digest";
import { errorMessage, isInvalidInput } from "./errors";
import { ArchiveEntrySchema, type ArchiveEntry } from "./schema/archive-entry";
import { zodIssues } from "./schema/issues";
import type { CanonicalizeOptions, Digest } from "./types";
import { log } from "./utils/logger";

export interface EntryReproduction {
  entryId: string | null;
  valid: boolean;
  originalHash: string | null;
  reproducedHash: Digest | null;
  error: string | null;
}

export interface ReproductionSummary {
  total: number;
  valid: number;
  invalid: number;
}

export interface ReproductionReport {
  results: EntryReproduction[];
  summary: ReproductionSummary;
}

function parseContent(content: unknown): unknown {
  if (typeof content !== "string") return content ?? null;
  try {
    return JSON.parse(content);
  } catch {
    // not JSON: the string itself is the content
    return content;
  }
}

/** The object whose digest an entry's `semantic_hash` records */
export function hashableContent(entry: ArchiveEntry): Record<string, unknown> {
  return {
    action_type: entry.action_type ?? null,
    agent_id: entry.agent_id ?? null,
    content: parseContent(entry.content),
    evidence_pointers:
      entry.evidence_pointers === undefined ? [] : entry.evidence_pointers,
    constitutional_citation: entry.constitutional_citation ?? null,
    timestamp: entry.timestamp ?? null,
  };
}

function entryIdOf(raw: unknown): string | null {
  if (typeof raw === "object" && raw !== null && "entry_id" in raw) {
    return typeof raw.entry_id === "string" ? raw.entry_id : null;
  }
  return null;
}

/**
 * Validate one entry and recompute its hash. Bad data never throws: it
 * comes back as `valid: false` with the reason in `error`.
 */
export function reproduceEntryHash(
  raw: unknown,
  options: CanonicalizeOptions = {}
): EntryReproduction {
  const parsed = ArchiveEntrySchema.safeParse(raw);
  if (!parsed.success) {
    const issues = zodIssues(parsed.error).join("; ");
    return {
      entryId: entryIdOf(raw),
      valid: false,
      originalHash: null,
      reproducedHash: null,
      error: `Invalid entry: ${issues}`,
    };
  }

  const entry = parsed.data;
  let reproduced: Digest;
  try {
    reproduced = hash(hashableContent(entry), options);
  } catch (err) {
    if (!isInvalidInput(err)) throw err;
    return {
      entryId: entry.entry_id,
      valid: false,
      originalHash: entry.semantic_hash,
      reproducedHash: null,
      error: `Hash reproduction failed: ${errorMessage(err)}`,
    };
  }

  const valid = reproduced === entry.semantic_hash;
  return {
    entryId: entry.entry_id,
    valid,
    originalHash: entry.semantic_hash,
    reproducedHash: reproduced,
    error: valid ? null : "Hash mismatch",
  };
}

/**
 * Reproduce a batch of entries and summarise. Mismatches are logged at
 * warn, the summary at info.
 */
export function reproduceEntries(
  entries: readonly unknown[],
  options: CanonicalizeOptions = {}
): ReproductionReport {
  const results = entries.map((raw) => reproduceEntryHash(raw, options));

  for (const r of results) {
    if (!r.valid) {
      log.warn(`entry ${r.entryId ?? "<unknown>"}: ${r.error ?? "invalid"}`);
    }
  }

  const valid = results.filter((r) => r.valid).length;
  const summary: ReproductionSummary = {
    total: results.length,
    valid,
    invalid: results.length - valid,
  };
  log.info(
    `reproduced ${summary.total} entries: ${summary.valid} valid, ${summary.invalid} invalid`
  );

  return { results, summary };
}
