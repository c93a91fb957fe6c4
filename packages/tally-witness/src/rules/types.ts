/**
 * Rule Contract
 *
 * A rule is a pure function of (current, previous, config, history). Rules
 * return an empty list for expected degenerate input: no baseline, zero
 * denominators, unparsable timestamps. They never log and never throw on
 * purpose; the engine still wraps every call in an error boundary.
 */

import type { Alert, Severity } from '../core/types/alerts.js';
import type { NormalizedSnapshot } from '../core/types/snapshot.js';
import { snapshotRef } from '../core/types/snapshot.js';
import type { RuleConfig, RuleId } from './config.js';

export interface Rule {
  readonly id: RuleId;
  readonly name: string;
  readonly description: string;
  readonly severity: Severity;
  /** True when the rule can only fire with a previous snapshot */
  readonly requiresBaseline: boolean;
  /**
   * @param history - Earlier snapshots of the same series, oldest first
   */
  apply(
    current: NormalizedSnapshot,
    previous: NormalizedSnapshot | null,
    config: RuleConfig,
    history: readonly NormalizedSnapshot[]
  ): Alert[];
}

/**
 * Build an alert attributed to a rule and the snapshot it was raised on
 *
 * @param severity - Graded severity; defaults to the rule's own
 */
export function createAlert(
  rule: Pick<Rule, 'id' | 'severity'>,
  snapshot: NormalizedSnapshot,
  type: string,
  justification: string,
  severity: Severity = rule.severity
): Alert {
  return {
    type,
    severity,
    justification,
    department: snapshot.geography.name,
    rule_id: rule.id,
    snapshot_ref: snapshotRef(snapshot),
  };
}

/**
 * Votes per slot
 */
export function votesBySlot(snapshot: NormalizedSnapshot): Map<number, number> {
  return new Map(snapshot.candidates.map((c) => [c.slot, c.votes]));
}

export function candidateVoteSum(snapshot: NormalizedSnapshot): number {
  return snapshot.candidates.reduce((sum, c) => sum + c.votes, 0);
}

/**
 * Completion percentage recomputed from integer counters; null when unknown
 */
export function completionPct(snapshot: NormalizedSnapshot): number | null {
  const { processed_units: processed, total_units: total } = snapshot.progress;
  if (processed === undefined || total === undefined || total <= 0) {
    return null;
  }
  return (processed / total) * 100;
}

/**
 * Fixed-decimal rendering for ratios in justifications
 */
export function fixed(value: number, decimals = 2): string {
  return value.toFixed(decimals);
}
