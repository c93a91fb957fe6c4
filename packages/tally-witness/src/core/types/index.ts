/**
 * Core Types - Barrel Export
 *
 * Single import point for the evidence pipeline's record types.
 */

export {
  type JsonPrimitive,
  type JsonValue,
  type JsonObject,
  type JsonArray,
  isJsonObject,
  isJsonArray,
  isJsonValue,
} from './json.js';

export {
  type RawDocument,
  type Geography,
  type Totals,
  type CandidateResult,
  type ProgressCounters,
  type SnapshotMetadata,
  type NormalizedSnapshot,
  type SnapshotRef,
  type CoercionWarning,
  snapshotRef,
  chainIdFor,
} from './snapshot.js';

export type {
  HashRecord,
  ChainState,
  ChainBreakReason,
  VerificationResult,
  ChainTip,
} from './ledger.js';

export {
  type Severity,
  type Alert,
  type RuleDiagnostic,
  SEVERITIES,
} from './alerts.js';

export type {
  NormalizationFailure,
  AuditSummary,
  AuditOutcome,
  AuditMetadata,
  AuditReport,
} from './report.js';
