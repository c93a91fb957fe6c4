/**
 * Hash Chain
 *
 * Pure functions over HashRecords. Each record binds a snapshot digest to the
 * content hash of its predecessor:
 *
 *   snapshot_hash = SHA256(canonical(snapshot))
 *   content_hash  = SHA256(previous_hash ||
 *                     canonical({ chain_id, sequence_index, snapshot_hash,
 *                                 snapshot_ref, created_at }))
 *
 * The genesis record links to GENESIS_HASH. Editing, deleting or reordering
 * any field of a record changes its content hash or sequence index, so
 * verification reports the break exactly where the alteration happened.
 */

import type { NormalizedSnapshot, SnapshotRef } from '../core/types/snapshot.js';
import { snapshotRef, chainIdFor } from '../core/types/snapshot.js';
import type {
  ChainBreakReason,
  ChainState,
  HashRecord,
  VerificationResult,
} from '../core/types/ledger.js';
import { GENESIS_HASH } from '../core/constants.js';
import { canonicalStringify, sha256Hex } from '../core/utils/canonical-json.js';
import { serializeSnapshot } from '../normalization/serialize.js';

export function computeSnapshotHash(snapshot: NormalizedSnapshot): string {
  return sha256Hex(serializeSnapshot(snapshot));
}

/**
 * Record fields bound into content_hash
 */
export type ChainedFields = Pick<
  HashRecord,
  'chain_id' | 'sequence_index' | 'snapshot_hash' | 'snapshot_ref' | 'created_at'
>;

export function computeChainHash(previousHash: string, fields: ChainedFields): string {
  return sha256Hex(
    previousHash +
      canonicalStringify({
        chain_id: fields.chain_id,
        sequence_index: fields.sequence_index,
        snapshot_hash: fields.snapshot_hash,
        snapshot_ref: fields.snapshot_ref,
        created_at: fields.created_at,
      })
  );
}

/**
 * State of a chain that has no records yet
 */
export function emptyChainState(chainId: string): ChainState {
  return { chain_id: chainId, next_index: 0, tip_hash: GENESIS_HASH };
}

/**
 * State after the last record of a verified chain
 */
export function chainStateAfter(chainId: string, records: readonly HashRecord[]): ChainState {
  const last = records[records.length - 1];
  if (last === undefined) {
    return emptyChainState(chainId);
  }
  return { chain_id: chainId, next_index: last.sequence_index + 1, tip_hash: last.content_hash };
}

export interface AppendOptions {
  /** ISO-8601 creation instant; injected so append stays pure */
  readonly createdAt: string;
}

/**
 * Build the next record of a chain
 *
 * @throws Error if the snapshot belongs to a different series than the state
 */
export function append(
  snapshot: NormalizedSnapshot,
  state: ChainState,
  options: AppendOptions
): { record: HashRecord; state: ChainState } {
  const chainId = chainIdFor(snapshot);
  if (chainId !== state.chain_id) {
    throw new Error(`Snapshot series ${chainId} cannot be appended to chain ${state.chain_id}`);
  }

  const fields: ChainedFields = {
    chain_id: state.chain_id,
    sequence_index: state.next_index,
    snapshot_hash: computeSnapshotHash(snapshot),
    snapshot_ref: snapshotRef(snapshot),
    created_at: options.createdAt,
  };
  const record: HashRecord = {
    ...fields,
    content_hash: computeChainHash(state.tip_hash, fields),
    previous_hash: state.tip_hash,
  };

  return {
    record,
    state: {
      chain_id: state.chain_id,
      next_index: state.next_index + 1,
      tip_hash: record.content_hash,
    },
  };
}

function broken(index: number, reason: ChainBreakReason): VerificationResult {
  return { valid: false, first_break_index: index, reason, checked: index };
}

function checkLink(
  record: HashRecord,
  index: number,
  expectedPrevious: string,
  chainId: string
): ChainBreakReason | null {
  if (record.chain_id !== chainId) {
    return 'chain_id_mismatch';
  }
  if (record.sequence_index !== index) {
    return 'sequence_gap';
  }
  if (record.previous_hash !== expectedPrevious) {
    return index === 0 ? 'genesis_mismatch' : 'previous_hash_mismatch';
  }
  if (computeChainHash(record.previous_hash, record) !== record.content_hash) {
    return 'content_hash_mismatch';
  }
  return null;
}

/**
 * Verify the links of a chain, in stored order
 *
 * `checked` counts the records verified before the first break (all of them
 * for a valid chain). An empty chain is valid.
 */
export function verifyChain(records: readonly HashRecord[]): VerificationResult {
  const first = records[0];
  if (first === undefined) {
    return { valid: true, first_break_index: null, checked: 0 };
  }

  let expectedPrevious = GENESIS_HASH;
  for (const [index, record] of records.entries()) {
    const reason = checkLink(record, index, expectedPrevious, first.chain_id);
    if (reason !== null) {
      return broken(index, reason);
    }
    expectedPrevious = record.content_hash;
  }

  return { valid: true, first_break_index: null, checked: records.length };
}

/**
 * Verify links and recompute every snapshot_hash from the stored snapshots
 */
export function verifyChainAgainstSnapshots(
  records: readonly HashRecord[],
  snapshotsByRef: ReadonlyMap<SnapshotRef, NormalizedSnapshot>
): VerificationResult {
  const links = verifyChain(records);
  const limit = links.first_break_index ?? records.length;

  for (const [index, record] of records.slice(0, limit).entries()) {
    const snapshot = snapshotsByRef.get(record.snapshot_ref);
    if (snapshot === undefined) {
      return broken(index, 'snapshot_missing');
    }
    if (snapshotRef(snapshot) !== record.snapshot_ref || chainIdFor(snapshot) !== record.chain_id) {
      return broken(index, 'snapshot_ref_mismatch');
    }
    if (computeSnapshotHash(snapshot) !== record.snapshot_hash) {
      return broken(index, 'snapshot_hash_mismatch');
    }
  }

  return links;
}

/**
 * Stored snapshots of a series that no record points at
 */
export function findUnchainedSnapshots(
  records: readonly HashRecord[],
  snapshots: readonly NormalizedSnapshot[]
): NormalizedSnapshot[] {
  const chained = new Set(records.map((record) => record.snapshot_ref));
  return snapshots.filter((snapshot) => !chained.has(snapshotRef(snapshot)));
}

/**
 * Deep verification of one series against its stored snapshots
 *
 * Beyond verifyChainAgainstSnapshots, every stored snapshot of the series
 * must be covered by a record; an uncovered one is reported at the index the
 * next record would take.
 */
export function verifySeries(
  records: readonly HashRecord[],
  snapshots: readonly NormalizedSnapshot[]
): VerificationResult {
  const byRef = new Map(snapshots.map((snapshot) => [snapshotRef(snapshot), snapshot]));
  const result = verifyChainAgainstSnapshots(records, byRef);
  if (!result.valid) {
    return result;
  }
  if (findUnchainedSnapshots(records, snapshots).length > 0) {
    return broken(records.length, 'snapshot_unchained');
  }
  return result;
}
