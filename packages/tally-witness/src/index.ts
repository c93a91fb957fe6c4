/**
 * tally-witness
 *
 * Canonical normalization of published election results, per-series hash
 * chains and integrity rules over the recorded snapshots.
 *
 * @packageDocumentation
 */

// Core types
export * from './core/types/index.js';
export {
  NormalizationError,
  ChainIntegrityError,
  RuleExecutionError,
  ConfigurationError,
  type NormalizationErrorKind,
  type ChainIntegrityErrorKind,
  type ConfigurationErrorKind,
} from './core/errors.js';
export { GENESIS_HASH, REPORT_VERSION } from './core/constants.js';
export { canonicalStringify, sha256Hex } from './core/utils/canonical-json.js';
export { createLogger, Logger, type LogLevel } from './core/utils/logger.js';

// Normalization
export { normalize, type NormalizeOptions, type NormalizeResult } from './normalization/normalizer.js';
export {
  DEFAULT_FIELD_MAP,
  IDENTITY_FIELD_MAP,
  mergeFieldMap,
  type FieldMapConfig,
  type FieldMapOverride,
} from './normalization/field-map.js';
export { serializeSnapshot, parseSnapshot, NormalizedSnapshotSchema } from './normalization/serialize.js';

// Ledger
export {
  append,
  verifyChain,
  verifyChainAgainstSnapshots,
  verifySeries,
  findUnchainedSnapshots,
  computeSnapshotHash,
  computeChainHash,
  emptyChainState,
} from './ledger/hash-chain.js';
export { HashChainLedger, type HashChainLedgerOptions } from './ledger/ledger.js';

// Rules and audit
export {
  buildRuleConfig,
  DEFAULT_RULE_CONFIG,
  type RuleConfig,
  type RuleConfigInput,
  type RuleId,
} from './rules/config.js';
export { RULE_REGISTRY, RULE_IDS, resolveEnabledRules } from './rules/registry.js';
export type { Rule } from './rules/types.js';
export { RuleEngine, type EvaluationResult } from './audit/rule-engine.js';
export { runAudit, type AuditOptions } from './audit/aggregator.js';

// Persistence and orchestration
export {
  SqliteHashChainStore,
  MemoryHashChainStore,
  StaleChainTipError,
  type HashChainStore,
} from './persistence/hash-chain-store.js';
export {
  FileSnapshotStore,
  SnapshotStoreError,
  type StoreOutcome,
  type StoredFile,
  type StoredRawFile,
} from './persistence/file-store.js';
export {
  EvidencePipeline,
  normalizeWithSettings,
  type PipelineSettings,
  type SourceSettings,
  type IngestResult,
} from './services/evidence-pipeline.js';
