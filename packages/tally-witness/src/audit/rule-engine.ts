/**
 * Rule Engine
 *
 * Runs a fixed, ordered set of rules against one snapshot and its baseline.
 * Every invocation is wrapped in an error boundary: a throwing rule produces
 * a diagnostic, never an alert, and never stops the remaining rules.
 */

import type { Alert, RuleDiagnostic } from '../core/types/alerts.js';
import type { NormalizedSnapshot } from '../core/types/snapshot.js';
import { snapshotRef } from '../core/types/snapshot.js';
import { RuleExecutionError } from '../core/errors.js';
import { logger as defaultLogger, type Logger } from '../core/utils/logger.js';
import type { RuleConfig } from '../rules/config.js';
import type { Rule } from '../rules/types.js';

export interface RuleEngineOptions {
  readonly rules: readonly Rule[];
  readonly config: RuleConfig;
  readonly logger?: Logger;
}

export interface EvaluationResult {
  readonly alerts: Alert[];
  readonly diagnostics: RuleDiagnostic[];
}

export class RuleEngine {
  private readonly rules: readonly Rule[];
  private readonly config: RuleConfig;
  private readonly log: Logger;

  constructor(options: RuleEngineOptions) {
    this.rules = options.rules;
    this.config = options.config;
    this.log = (options.logger ?? defaultLogger).child('rule-engine');
  }

  get ruleIds(): string[] {
    return this.rules.map((rule) => rule.id);
  }

  /**
   * @param history - Earlier snapshots of the series, oldest first, ending
   *   with `previous` when there is one
   */
  evaluate(
    current: NormalizedSnapshot,
    previous: NormalizedSnapshot | null,
    history: readonly NormalizedSnapshot[] = previous === null ? [] : [previous]
  ): EvaluationResult {
    const alerts: Alert[] = [];
    const diagnostics: RuleDiagnostic[] = [];
    const ref = snapshotRef(current);

    for (const rule of this.rules) {
      if (rule.requiresBaseline && previous === null) {
        continue;
      }

      try {
        alerts.push(...rule.apply(current, previous, this.config, history));
      } catch (cause) {
        const error = new RuleExecutionError(rule.id, ref, cause);
        this.log.warn('Rule execution failed', {
          ruleId: rule.id,
          snapshotRef: ref,
          error: error.message,
        });
        diagnostics.push({ rule_id: rule.id, snapshot_ref: ref, message: error.message });
      }
    }

    return { alerts, diagnostics };
  }
}
