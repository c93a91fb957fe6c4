/**
 * Anomaly Aggregator
 *
 * Runs the enabled rules over every series in a batch and folds the results
 * into an AuditReport. Identical inputs produce byte-identical reports:
 * series are processed in chain-id order, alerts are deduplicated and sorted,
 * and `generated_at` is only set when the caller supplies a clock.
 */

import type { Alert, RuleDiagnostic, Severity } from '../core/types/alerts.js';
import type {
  AuditMetadata,
  AuditReport,
  AuditSummary,
  NormalizationFailure,
} from '../core/types/report.js';
import type { NormalizedSnapshot } from '../core/types/snapshot.js';
import { chainIdFor } from '../core/types/snapshot.js';
import { REPORT_VERSION } from '../core/constants.js';
import { canonicalStringify, sha256Hex } from '../core/utils/canonical-json.js';
import { logger as defaultLogger, type Logger } from '../core/utils/logger.js';
import { compareObserved } from '../core/utils/timestamps.js';
import type { RuleConfig } from '../rules/config.js';
import { registryIndex, resolveEnabledRules } from '../rules/registry.js';
import { RuleEngine } from './rule-engine.js';

export interface AuditOptions {
  /** Documents that failed normalization in this run */
  readonly normalizationFailures?: readonly NormalizationFailure[];
  /** Sets metadata.generated_at when given */
  readonly now?: () => Date;
  readonly logger?: Logger;
}

interface RankedAlert {
  readonly alert: Alert;
  readonly sourceId: string;
  readonly observedAt: string;
}

/**
 * Group snapshots by series, preserving input order within a series
 */
export function groupBySeries(
  snapshots: readonly NormalizedSnapshot[]
): Map<string, NormalizedSnapshot[]> {
  const series = new Map<string, NormalizedSnapshot[]>();
  for (const snapshot of snapshots) {
    const chainId = chainIdFor(snapshot);
    const list = series.get(chainId) ?? [];
    list.push(snapshot);
    series.set(chainId, list);
  }
  return new Map([...series.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

function alertKey(alert: Alert): string {
  return canonicalStringify([
    alert.rule_id,
    alert.type,
    alert.snapshot_ref,
    alert.department ?? null,
    alert.justification,
  ]);
}

function dedupeAndSort(ranked: readonly RankedAlert[]): Alert[] {
  const seen = new Set<string>();
  const unique = ranked.filter(({ alert }) => {
    const key = alertKey(alert);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });

  return [...unique]
    .sort((a, b) => {
      if (a.sourceId !== b.sourceId) {
        return a.sourceId < b.sourceId ? -1 : 1;
      }
      const byTime = compareObserved(a.observedAt, b.observedAt);
      if (byTime !== 0) {
        return byTime;
      }
      return registryIndex(a.alert.rule_id) - registryIndex(b.alert.rule_id);
    })
    .map(({ alert }) => alert);
}

export function summarize(alerts: readonly Alert[], ruleIds: readonly string[]): AuditSummary {
  const bySeverity: Record<Severity, number> = { High: 0, Medium: 0, Low: 0 };
  const byRule: Record<string, number> = Object.fromEntries(ruleIds.map((id) => [id, 0]));

  for (const alert of alerts) {
    bySeverity[alert.severity] += 1;
    byRule[alert.rule_id] = (byRule[alert.rule_id] ?? 0) + 1;
  }

  return { total: alerts.length, by_severity: bySeverity, by_rule: byRule };
}

/**
 * SHA-256 of the canonical rule configuration
 */
export function configHash(config: RuleConfig): string {
  return sha256Hex(canonicalStringify(config));
}

function timeRange(
  snapshots: readonly NormalizedSnapshot[]
): { from: string; to: string } | null {
  if (snapshots.length === 0) {
    return null;
  }
  const sorted = snapshots
    .map((s) => s.timestamp_observed)
    .sort(compareObserved);
  return { from: sorted[0], to: sorted[sorted.length - 1] };
}

/**
 * Run the enabled rules over a batch of snapshots
 *
 * @param enabledRules - Rule ids to run; undefined runs every rule the
 *   configuration enables
 * @throws ConfigurationError for unknown rule ids or an empty rule set
 */
export function runAudit(
  snapshots: readonly NormalizedSnapshot[],
  enabledRules: readonly string[] | undefined,
  config: RuleConfig,
  options: AuditOptions = {}
): AuditReport {
  const log = (options.logger ?? defaultLogger).child('audit');
  const rules = resolveEnabledRules(config, enabledRules);
  const engine = new RuleEngine({ rules, config, logger: options.logger });

  const ranked: RankedAlert[] = [];
  const diagnostics: RuleDiagnostic[] = [];
  const series = groupBySeries(snapshots);

  for (const [chainId, members] of series) {
    members.forEach((current, index) => {
      const history = members.slice(0, index);
      const previous = history[history.length - 1] ?? null;
      const result = engine.evaluate(current, previous, history);

      for (const alert of result.alerts) {
        ranked.push({
          alert,
          sourceId: current.source_id,
          observedAt: current.timestamp_observed,
        });
      }
      diagnostics.push(...result.diagnostics);
    });

    log.debug('Series evaluated', { chainId, snapshots: members.length });
  }

  const alerts = dedupeAndSort(ranked);
  const failures = options.normalizationFailures ?? [];

  const metadata: AuditMetadata = {
    rule_set_version: config.rule_set_version,
    config_hash: configHash(config),
    enabled_rules: engine.ruleIds,
    snapshot_count: snapshots.length,
    series_count: series.size,
    time_range: timeRange(snapshots),
    normalization_failures: failures,
    outcome: alerts.length > 0 ? 'alerts_found' : 'no_alerts',
    ...(options.now ? { generated_at: options.now().toISOString() } : {}),
  };

  log.info('Audit complete', {
    alerts: alerts.length,
    diagnostics: diagnostics.length,
    snapshots: snapshots.length,
    series: series.size,
    normalizationFailures: failures.length,
  });

  return {
    report_version: REPORT_VERSION,
    alerts,
    summary: summarize(alerts, engine.ruleIds),
    diagnostics,
    metadata,
  };
}
