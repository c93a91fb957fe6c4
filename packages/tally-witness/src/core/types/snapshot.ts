/**
 * Snapshot Types
 *
 * The raw observation handed over by the fetch collaborator and the canonical
 * snapshot derived from it. Field names are snake_case because these records
 * are the persisted, hashed wire format.
 *
 * INVARIANT: every numeric field is an integer. Percentages are never read
 * from a source; they are recomputed from integer counters where needed.
 */

/**
 * Unmodified document retrieved from a source at a point in time
 */
export interface RawDocument {
  readonly source_id: string;
  /** ISO-8601 instant of retrieval */
  readonly retrieved_at: string;
  readonly content_type: string;
  /** HTTP/transport status, null when not fetched over HTTP */
  readonly transport_status: number | null;
  /** Document body exactly as received */
  readonly body: string;
}

export interface Geography {
  /** Country-subdivision code (e.g. "08") */
  readonly code: string;
  readonly name: string;
}

export interface Totals {
  readonly valid_votes: number;
  readonly null_votes: number;
  readonly blank_votes: number;
  readonly total_votes: number;
}

export interface CandidateResult {
  /** Unique position identifier, not necessarily contiguous */
  readonly slot: number;
  readonly votes: number;
  readonly candidate_id?: string;
  readonly name?: string;
  readonly party?: string;
}

/**
 * Optional integer counters describing tallying progress
 */
export interface ProgressCounters {
  /** Tally sheets (actas) processed so far */
  readonly processed_units?: number;
  /** Tally sheets expected in total */
  readonly total_units?: number;
  /** Registered electorate */
  readonly registered_voters?: number;
}

export type SnapshotMetadata = Readonly<Record<string, unknown>>;

export interface NormalizedSnapshot {
  readonly source_id: string;
  readonly election_level: string;
  readonly geography: Geography;
  /** As reported by the source; never validated */
  readonly timestamp_source: string | null;
  /** ISO-8601 instant of the observation */
  readonly timestamp_observed: string;
  readonly totals: Totals;
  readonly candidates: readonly CandidateResult[];
  readonly progress: ProgressCounters;
  readonly metadata: SnapshotMetadata;
}

/**
 * Identifier of a snapshot: "<source_id>/<geography code>/<timestamp_observed>"
 */
export type SnapshotRef = string;

export function snapshotRef(snapshot: NormalizedSnapshot): SnapshotRef {
  return `${snapshot.source_id}/${snapshot.geography.code}/${snapshot.timestamp_observed}`;
}

/**
 * Series identifier; each series owns one hash chain
 */
export function chainIdFor(snapshot: NormalizedSnapshot): string {
  return `${snapshot.source_id}/${snapshot.geography.code}`;
}

/**
 * Entry recorded in metadata.coercion_warnings
 */
export interface CoercionWarning {
  readonly field: string;
  readonly value: string;
  readonly reason: 'not_numeric' | 'missing' | 'duplicate_slot' | 'non_finite';
}
