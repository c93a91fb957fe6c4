/**
 * Snapshot Serialization
 *
 * serializeSnapshot() produces the canonical bytes that are hashed and
 * stored. parseSnapshot() validates stored bytes back into a typed snapshot.
 */

import { z } from 'zod';
import type { NormalizedSnapshot } from '../core/types/snapshot.js';
import { canonicalStringify } from '../core/utils/canonical-json.js';

const IntegerSchema = z.number().int('Counts must be integers');

export const NormalizedSnapshotSchema = z
  .object({
    source_id: z.string().min(1),
    election_level: z.string(),
    geography: z.object({ code: z.string(), name: z.string() }).strict(),
    timestamp_source: z.string().nullable(),
    timestamp_observed: z.string().min(1),
    totals: z
      .object({
        valid_votes: IntegerSchema,
        null_votes: IntegerSchema,
        blank_votes: IntegerSchema,
        total_votes: IntegerSchema,
      })
      .strict(),
    candidates: z.array(
      z
        .object({
          slot: IntegerSchema,
          votes: IntegerSchema,
          candidate_id: z.string().optional(),
          name: z.string().optional(),
          party: z.string().optional(),
        })
        .strict()
    ),
    progress: z
      .object({
        processed_units: IntegerSchema.optional(),
        total_units: IntegerSchema.optional(),
        registered_voters: IntegerSchema.optional(),
      })
      .strict(),
    metadata: z.record(z.unknown()),
  })
  .strict()
  .refine(
    (snapshot) => new Set(snapshot.candidates.map((c) => c.slot)).size === snapshot.candidates.length,
    { message: 'Candidate slots must be unique', path: ['candidates'] }
  );

/**
 * Canonical JSON of a snapshot (sorted keys, no whitespace)
 */
export function serializeSnapshot(snapshot: NormalizedSnapshot): string {
  return canonicalStringify(snapshot);
}

/**
 * Parse and validate a stored snapshot
 */
export function parseSnapshot(
  json: string
): { success: true; data: NormalizedSnapshot } | { success: false; error: string } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    return {
      success: false,
      error: `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  const result = NormalizedSnapshotSchema.safeParse(parsed);
  if (!result.success) {
    const errorMsg = result.error.errors
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    return { success: false, error: errorMsg };
  }

  return { success: true, data: result.data };
}
