/**
 * Hash-Chain Ledger Service
 *
 * Owns the append path for every series. A chain is verified the first time
 * it is touched in a process; a broken chain raises ChainIntegrityError and
 * stays halted for every later append in that process.
 */

import type { NormalizedSnapshot } from '../core/types/snapshot.js';
import { chainIdFor } from '../core/types/snapshot.js';
import type { ChainState, ChainTip, HashRecord, VerificationResult } from '../core/types/ledger.js';
import { ChainIntegrityError } from '../core/errors.js';
import { logger as defaultLogger, type Logger } from '../core/utils/logger.js';
import type { HashChainStore } from '../persistence/hash-chain-store.js';
import { append, chainStateAfter, verifyChain } from './hash-chain.js';

export interface HashChainLedgerOptions {
  readonly store: HashChainStore;
  readonly logger?: Logger;
  /** Clock for created_at; injectable for deterministic tests */
  readonly now?: () => Date;
}

export class HashChainLedger {
  private readonly store: HashChainStore;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly verified = new Map<string, ChainState>();
  private readonly halted = new Map<string, ChainIntegrityError>();

  constructor(options: HashChainLedgerOptions) {
    this.store = options.store;
    this.log = (options.logger ?? defaultLogger).child('ledger');
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Append a snapshot to its series' chain
   *
   * @throws ChainIntegrityError if the stored chain fails verification
   */
  append(snapshot: NormalizedSnapshot): HashRecord {
    const chainId = chainIdFor(snapshot);
    const state = this.stateFor(chainId);

    const { record, state: nextState } = append(snapshot, state, {
      createdAt: this.now().toISOString(),
    });

    this.store.appendRecord(record);
    this.verified.set(chainId, nextState);

    this.log.debug('Appended hash record', {
      chainId,
      sequenceIndex: record.sequence_index,
      contentHash: record.content_hash,
    });

    return record;
  }

  /**
   * Verify one chain from its stored records
   */
  verify(chainId: string): VerificationResult {
    return verifyChain(this.store.listRecords(chainId));
  }

  /**
   * Verify every stored chain, keyed by chain id
   */
  verifyAll(): Map<string, VerificationResult> {
    const results = new Map<string, VerificationResult>();
    for (const chainId of this.store.listChainIds()) {
      results.set(chainId, this.verify(chainId));
    }
    return results;
  }

  tip(chainId: string): ChainTip | null {
    const record = this.store.tip(chainId);
    if (record === null) {
      return null;
    }
    return {
      chain_id: record.chain_id,
      sequence_index: record.sequence_index,
      content_hash: record.content_hash,
    };
  }

  /**
   * Verify a chain (once per process) without appending
   *
   * @throws ChainIntegrityError if the stored chain is broken
   */
  assertAppendable(chainId: string): void {
    this.stateFor(chainId);
  }

  isHalted(chainId: string): boolean {
    return this.halted.has(chainId);
  }

  private stateFor(chainId: string): ChainState {
    const halted = this.halted.get(chainId);
    if (halted) {
      throw halted;
    }

    const cached = this.verified.get(chainId);
    if (cached) {
      return cached;
    }

    const records = this.store.listRecords(chainId);
    const error = integrityErrorFor(chainId, verifyChain(records));
    if (error) {
      this.halted.set(chainId, error);
      this.log.error('Hash chain verification failed; appends halted', {
        chainId,
        atIndex: error.atIndex,
        reason: error.reason,
      });
      throw error;
    }

    const state = chainStateAfter(chainId, records);
    this.verified.set(chainId, state);
    return state;
  }
}

/**
 * Convert a failed verification into the error the ledger raises
 */
export function integrityErrorFor(
  chainId: string,
  result: VerificationResult
): ChainIntegrityError | null {
  if (result.valid) {
    return null;
  }
  return new ChainIntegrityError(
    result.reason === 'genesis_mismatch'
      ? 'GenesisMismatch'
      : result.reason === 'snapshot_unchained'
        ? 'UnchainedSnapshot'
        : 'BrokenLink',
    chainId,
    result.first_break_index ?? 0,
    result.reason ?? 'unknown'
  );
}
