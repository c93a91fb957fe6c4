/**
 * Evidence Pipeline
 *
 * Orchestrates normalization, storage, chaining and auditing. Built once
 * from resolved settings and stores; holds no global state.
 *
 * ORDER OF EFFECTS (ingest):
 * 1. Raw document stored (evidence of what was published, even if it fails
 *    to normalize). A different body under a taken stamp is a conflict and
 *    stops here.
 * 2. Normalization; a failure is recorded under failures/ for later audits
 * 3. Chain checked for integrity (a broken chain halts before any write)
 * 4. Normalized snapshot stored; identical bytes are a duplicate, different
 *    bytes a conflict
 * 5. Hash record appended; if that fails the snapshot file is removed again
 */

import type { NormalizedSnapshot, RawDocument, Geography } from '../core/types/snapshot.js';
import { chainIdFor, snapshotRef } from '../core/types/snapshot.js';
import type { HashRecord, VerificationResult, ChainTip } from '../core/types/ledger.js';
import type { AuditReport, NormalizationFailure } from '../core/types/report.js';
import type { NormalizationError } from '../core/errors.js';
import { logger as defaultLogger, type Logger } from '../core/utils/logger.js';
import type { FieldMapConfig } from '../normalization/field-map.js';
import { normalize, type NormalizeResult } from '../normalization/normalizer.js';
import { verifySeries } from '../ledger/hash-chain.js';
import { HashChainLedger, integrityErrorFor } from '../ledger/ledger.js';
import type { RuleConfig } from '../rules/config.js';
import { groupBySeries, runAudit } from '../audit/aggregator.js';
import { writeAuditReport } from '../audit/report-writer.js';
import { canonicalStringify } from '../core/utils/canonical-json.js';
import type { FileSnapshotStore } from '../persistence/file-store.js';
import type { HashChainStore } from '../persistence/hash-chain-store.js';

// ============================================================================
// Types
// ============================================================================

export interface SourceSettings {
  readonly geography?: Geography;
  readonly electionLevel?: string;
  /** Field map for this source, already merged over the global one */
  readonly fieldMap?: FieldMapConfig;
}

export interface PipelineSettings {
  readonly fieldMap: FieldMapConfig;
  readonly sources: Readonly<Record<string, SourceSettings>>;
  readonly candidateCount?: number;
  readonly rules: RuleConfig;
}

export interface EvidencePipelineOptions {
  readonly settings: PipelineSettings;
  readonly snapshotStore: FileSnapshotStore;
  readonly chainStore: HashChainStore;
  readonly logger?: Logger;
  readonly now?: () => Date;
}

export type IngestResult =
  | { readonly status: 'stored'; readonly snapshot: NormalizedSnapshot; readonly record: HashRecord }
  | { readonly status: 'duplicate'; readonly snapshot: NormalizedSnapshot; readonly path: string }
  | {
      readonly status: 'conflict';
      /** Path already holding different bytes */
      readonly path: string;
      /** Where the conflicting raw body was kept, when the raw body conflicted */
      readonly conflictPath: string | null;
      readonly message: string;
    }
  | {
      readonly status: 'normalization_failed';
      readonly error: NormalizationError;
      readonly failure: NormalizationFailure;
    };

export interface VerifyOptions {
  readonly chainId?: string;
  /** Also recompute snapshot hashes from stored snapshots */
  readonly deep?: boolean;
}

export interface PipelineAuditOptions {
  readonly sourceId?: string;
  /** Rule ids to run; defaults to every enabled rule */
  readonly rules?: readonly string[];
  /** Failures to report beside the ones recorded under failures/ */
  readonly normalizationFailures?: readonly NormalizationFailure[];
  /** Report destination; defaults to the store's reports directory */
  readonly outPath?: string;
  /** Set generated_at (default true) */
  readonly timestamped?: boolean;
}

export interface PipelineAuditResult {
  readonly report: AuditReport;
  readonly reportPath: string;
  readonly failureCount: number;
}

/**
 * Normalize a raw document with the field map and defaults of its source
 */
export function normalizeWithSettings(raw: RawDocument, settings: PipelineSettings): NormalizeResult {
  const source = settings.sources[raw.source_id];
  return normalize(raw, source?.fieldMap ?? settings.fieldMap, {
    candidateCount: settings.candidateCount,
    defaults: {
      geography: source?.geography,
      electionLevel: source?.electionLevel,
    },
  });
}

function mergeFailures(
  recorded: readonly NormalizationFailure[],
  extra: readonly NormalizationFailure[]
): NormalizationFailure[] {
  const seen = new Set<string>();
  return [...recorded, ...extra].filter((failure) => {
    const key = canonicalStringify(failure);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

// ============================================================================
// Service
// ============================================================================

export class EvidencePipeline {
  private readonly settings: PipelineSettings;
  private readonly snapshotStore: FileSnapshotStore;
  private readonly chainStore: HashChainStore;
  private readonly ledger: HashChainLedger;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(options: EvidencePipelineOptions) {
    this.settings = options.settings;
    this.snapshotStore = options.snapshotStore;
    this.chainStore = options.chainStore;
    this.log = (options.logger ?? defaultLogger).child('pipeline');
    this.now = options.now ?? (() => new Date());
    this.ledger = new HashChainLedger({
      store: options.chainStore,
      logger: options.logger,
      now: this.now,
    });
  }

  /**
   * Normalize with the settings of the document's source
   */
  normalize(raw: RawDocument): NormalizeResult {
    return normalizeWithSettings(raw, this.settings);
  }

  /**
   * Store, normalize and chain one raw document
   *
   * @throws ChainIntegrityError if the target chain is broken
   */
  async ingest(raw: RawDocument): Promise<IngestResult> {
    const rawFile = await this.snapshotStore.putRawDocument(raw);
    if (rawFile.outcome === 'conflict') {
      const message = `A different body is already stored for ${raw.source_id} at ${raw.retrieved_at}`;
      this.log.error(message, { path: rawFile.path, conflictPath: rawFile.conflictPath });
      return { status: 'conflict', path: rawFile.path, conflictPath: rawFile.conflictPath, message };
    }
    if (rawFile.outcome === 'identical') {
      this.log.debug('Raw document already stored', { path: rawFile.path });
    }

    const result = this.normalize(raw);
    if (!result.success) {
      const failure: NormalizationFailure = {
        source_id: raw.source_id,
        retrieved_at: raw.retrieved_at,
        kind: result.error.kind,
        message: result.error.message,
      };
      await this.snapshotStore.putNormalizationFailure(failure);
      this.log.warn('Normalization failed', { ...failure });
      return { status: 'normalization_failed', error: result.error, failure };
    }

    const snapshot = result.snapshot;
    this.ledger.assertAppendable(chainIdFor(snapshot));

    const stored = await this.snapshotStore.putNormalizedSnapshot(snapshot);
    if (stored.outcome === 'identical') {
      this.log.info('Observation already recorded; not re-chained', { path: stored.path });
      return { status: 'duplicate', snapshot, path: stored.path };
    }
    if (stored.outcome === 'conflict') {
      const message = `A different snapshot is already stored as ${snapshotRef(snapshot)}`;
      this.log.error(message, { path: stored.path });
      return { status: 'conflict', path: stored.path, conflictPath: null, message };
    }

    let record: HashRecord;
    try {
      record = this.ledger.append(snapshot);
    } catch (error) {
      await this.snapshotStore.discardNormalizedSnapshot(snapshot);
      throw error;
    }

    this.log.info('Snapshot stored', {
      chainId: record.chain_id,
      sequenceIndex: record.sequence_index,
      contentHash: record.content_hash,
    });

    return { status: 'stored', snapshot, record };
  }

  /**
   * Verify one chain, or every stored chain
   *
   * Deep verification also recomputes snapshot hashes and reports stored
   * snapshots that no record covers.
   */
  async verify(options: VerifyOptions = {}): Promise<Map<string, VerificationResult>> {
    const series = options.deep
      ? groupBySeries(await this.snapshotStore.listNormalizedSnapshots())
      : null;
    const chainIds =
      options.chainId !== undefined
        ? [options.chainId]
        : [...new Set([...this.chainStore.listChainIds(), ...(series?.keys() ?? [])])].sort();

    const results = new Map<string, VerificationResult>();
    for (const chainId of chainIds) {
      const result = series
        ? verifySeries(this.chainStore.listRecords(chainId), series.get(chainId) ?? [])
        : this.ledger.verify(chainId);
      results.set(chainId, result);

      if (!result.valid) {
        this.log.error('Chain verification failed', {
          chainId,
          firstBreakIndex: result.first_break_index,
          reason: result.reason,
        });
      }
    }
    return results;
  }

  tip(chainId: string): ChainTip | null {
    return this.ledger.tip(chainId);
  }

  /**
   * Verify, then audit, the stored snapshots
   *
   * Normalization failures recorded by earlier ingests are reported in the
   * run metadata together with any passed in.
   *
   * @throws ChainIntegrityError if any chain covering the snapshots is broken
   *   or a stored snapshot has no hash record
   * @throws ConfigurationError for unknown rule ids or an empty rule set
   */
  async audit(options: PipelineAuditOptions = {}): Promise<PipelineAuditResult> {
    const snapshots = await this.snapshotStore.listNormalizedSnapshots(options.sourceId);

    for (const [chainId, members] of groupBySeries(snapshots)) {
      const error = integrityErrorFor(
        chainId,
        verifySeries(this.chainStore.listRecords(chainId), members)
      );
      if (error) {
        this.log.error('Audit aborted: chain integrity failure', {
          chainId,
          atIndex: error.atIndex,
          reason: error.reason,
        });
        throw error;
      }
    }

    const failures = mergeFailures(
      await this.snapshotStore.listNormalizationFailures(options.sourceId),
      options.normalizationFailures ?? []
    );
    const report = runAudit(snapshots, options.rules, this.settings.rules, {
      normalizationFailures: failures,
      now: options.timestamped === false ? undefined : this.now,
      logger: this.log,
    });

    let reportPath: string;
    if (options.outPath !== undefined) {
      await writeAuditReport(report, options.outPath);
      reportPath = options.outPath;
    } else {
      reportPath = await this.snapshotStore.writeReport(report);
    }

    return { report, reportPath, failureCount: failures.length };
  }

  close(): void {
    this.chainStore.close();
  }
}
