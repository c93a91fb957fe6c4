/**
 * Audit Report Types
 */

import type { Alert, RuleDiagnostic, Severity } from './alerts.js';

export interface NormalizationFailure {
  readonly source_id: string;
  readonly retrieved_at: string;
  readonly kind: string;
  readonly message: string;
}

export interface AuditSummary {
  readonly total: number;
  readonly by_severity: Readonly<Record<Severity, number>>;
  readonly by_rule: Readonly<Record<string, number>>;
}

export type AuditOutcome = 'alerts_found' | 'no_alerts';

export interface AuditMetadata {
  readonly rule_set_version: string;
  readonly config_hash: string;
  readonly enabled_rules: readonly string[];
  readonly snapshot_count: number;
  readonly series_count: number;
  readonly time_range: { readonly from: string; readonly to: string } | null;
  readonly normalization_failures: readonly NormalizationFailure[];
  readonly outcome: AuditOutcome;
  readonly generated_at?: string;
}

export interface AuditReport {
  readonly report_version: 1;
  readonly alerts: readonly Alert[];
  readonly summary: AuditSummary;
  readonly diagnostics: readonly RuleDiagnostic[];
  readonly metadata: AuditMetadata;
}
