/**
 * Hash-Chain Ledger Types
 *
 * CRITICAL: HashRecords are append-only. The validity proof of a chain depends
 * on records never being mutated or deleted after creation.
 */

export interface HashRecord {
  /** Series the record belongs to ("<source_id>/<geography code>") */
  readonly chain_id: string;
  readonly sequence_index: number;
  /** SHA-256 of the canonical snapshot serialization */
  readonly snapshot_hash: string;
  /** SHA-256 over previous_hash || the canonical chained fields; the link target of the next record */
  readonly content_hash: string;
  /** content_hash of record N-1, or GENESIS_HASH for N = 0 */
  readonly previous_hash: string;
  readonly snapshot_ref: string;
  /** ISO-8601 instant */
  readonly created_at: string;
}

export interface ChainState {
  readonly chain_id: string;
  readonly next_index: number;
  readonly tip_hash: string;
}

export type ChainBreakReason =
  | 'genesis_mismatch'
  | 'sequence_gap'
  | 'previous_hash_mismatch'
  | 'content_hash_mismatch'
  | 'chain_id_mismatch'
  | 'snapshot_hash_mismatch'
  | 'snapshot_ref_mismatch'
  | 'snapshot_missing'
  | 'snapshot_unchained';

export interface VerificationResult {
  readonly valid: boolean;
  readonly first_break_index: number | null;
  readonly reason?: ChainBreakReason;
  readonly checked: number;
}

/**
 * Chain tip exposed to downstream collaborators (anchoring, dashboards)
 */
export interface ChainTip {
  readonly chain_id: string;
  readonly sequence_index: number;
  readonly content_hash: string;
}
