/**
 * Hash-Chain Ledger Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { HashChainLedger, integrityErrorFor } from '../../../ledger/ledger.js';
import type { HashChainStore } from '../../../persistence/hash-chain-store.js';
import { ChainIntegrityError } from '../../../core/errors.js';
import type { HashRecord } from '../../../core/types/ledger.js';
import { buildSeries, buildSnapshot, quietLogger } from '../../utils/builders.js';

const FIXED_NOW = new Date('2025-11-30T21:00:00Z');

/**
 * Store whose records can be rewritten after the fact
 */
class TamperableStore implements HashChainStore {
  private readonly chains = new Map<string, HashRecord[]>();

  appendRecord(record: HashRecord): void {
    const records = this.chains.get(record.chain_id) ?? [];
    records.push(record);
    this.chains.set(record.chain_id, records);
  }

  listRecords(chainId: string): HashRecord[] {
    return [...(this.chains.get(chainId) ?? [])];
  }

  listChainIds(): string[] {
    return [...this.chains.keys()].sort();
  }

  tip(chainId: string): HashRecord | null {
    return this.listRecords(chainId).at(-1) ?? null;
  }

  close(): void {}

  tamper(chainId: string, index: number, patch: Partial<HashRecord>): void {
    const records = this.chains.get(chainId) ?? [];
    records[index] = { ...records[index], ...patch };
  }
}

describe('HashChainLedger', () => {
  let store: TamperableStore;
  let ledger: HashChainLedger;

  beforeEach(() => {
    store = new TamperableStore();
    ledger = new HashChainLedger({ store, logger: quietLogger(), now: () => FIXED_NOW });
  });

  it('appends one chain per series', () => {
    const [a, b] = buildSeries([
      [1, 1],
      [2, 2],
    ]);
    const other = buildSnapshot({ geography: { code: '02', name: 'SUR' } });

    ledger.append(a);
    ledger.append(b);
    ledger.append(other);

    expect(store.listChainIds()).toEqual(['test-source/01', 'test-source/02']);
    expect(store.listRecords('test-source/01').map((r) => r.sequence_index)).toEqual([0, 1]);
    expect(store.listRecords('test-source/01')[0].created_at).toBe('2025-11-30T21:00:00.000Z');
  });

  it('exposes the chain tip', () => {
    expect(ledger.tip('test-source/01')).toBeNull();

    const record = ledger.append(buildSnapshot());

    expect(ledger.tip('test-source/01')).toEqual({
      chain_id: 'test-source/01',
      sequence_index: 0,
      content_hash: record.content_hash,
    });
  });

  it('verifies every stored chain', () => {
    ledger.append(buildSnapshot());
    ledger.append(buildSnapshot({ geography: { code: '02', name: 'SUR' } }));

    const results = ledger.verifyAll();

    expect([...results.keys()]).toEqual(['test-source/01', 'test-source/02']);
    expect([...results.values()].every((r) => r.valid)).toBe(true);
  });

  it('halts appends to a broken chain', () => {
    const series = buildSeries([
      [1, 1],
      [2, 2],
      [3, 3],
    ]);
    const writer = new HashChainLedger({ store, logger: quietLogger() });
    writer.append(series[0]);
    writer.append(series[1]);

    store.tamper('test-source/01', 1, { snapshot_hash: 'b'.repeat(64) });

    // A fresh process verifies the stored chain before its first append
    expect(() => ledger.append(series[2])).toThrow(ChainIntegrityError);
    expect(ledger.isHalted('test-source/01')).toBe(true);
    expect(() => ledger.assertAppendable('test-source/01')).toThrow(
      'Chain test-source/01: broken link at index 1 (content_hash_mismatch)'
    );
    expect(store.listRecords('test-source/01')).toHaveLength(2);
  });

  it('keeps other chains appendable', () => {
    const first = buildSnapshot();
    ledger.append(first);
    const fresh = new HashChainLedger({ store, logger: quietLogger() });
    store.tamper('test-source/01', 0, { previous_hash: 'c'.repeat(64) });

    expect(() => fresh.assertAppendable('test-source/01')).toThrow(ChainIntegrityError);
    expect(() => fresh.append(buildSnapshot({ geography: { code: '02', name: 'SUR' } }))).not.toThrow();
  });
});

describe('integrityErrorFor', () => {
  it('returns null for a valid result', () => {
    expect(integrityErrorFor('x/01', { valid: true, first_break_index: null, checked: 3 })).toBeNull();
  });

  it('distinguishes genesis failures', () => {
    const error = integrityErrorFor('x/01', {
      valid: false,
      first_break_index: 0,
      reason: 'genesis_mismatch',
      checked: 0,
    });

    expect(error?.kind).toBe('GenesisMismatch');
    expect(error?.atIndex).toBe(0);
  });

  it('maps other failures to broken links', () => {
    const error = integrityErrorFor('x/01', {
      valid: false,
      first_break_index: 4,
      reason: 'sequence_gap',
      checked: 4,
    });

    expect(error?.kind).toBe('BrokenLink');
    expect(error?.message).toBe('Chain x/01: broken link at index 4 (sequence_gap)');
  });

  it('names stored snapshots without a hash record', () => {
    const error = integrityErrorFor('x/01', {
      valid: false,
      first_break_index: 2,
      reason: 'snapshot_unchained',
      checked: 2,
    });

    expect(error?.kind).toBe('UnchainedSnapshot');
    expect(error?.message).toBe('Chain x/01: stored snapshot has no hash record (snapshot_unchained)');
  });
});
