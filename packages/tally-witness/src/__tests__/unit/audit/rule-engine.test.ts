/**
 * Rule Engine Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { RuleEngine } from '../../../audit/rule-engine.js';
import { DEFAULT_RULE_CONFIG } from '../../../rules/config.js';
import { RULE_REGISTRY } from '../../../rules/registry.js';
import { totalsDiscrepancy } from '../../../rules/totals-discrepancy.js';
import type { Rule } from '../../../rules/types.js';
import { buildSnapshot, quietLogger } from '../../utils/builders.js';

const throwingRule: Rule = {
  id: 'scrutiny_jump',
  name: 'Throwing rule',
  description: 'Always fails',
  severity: 'Low',
  requiresBaseline: false,
  apply() {
    throw new Error('boom');
  },
};

describe('RuleEngine', () => {
  it('turns a throwing rule into a diagnostic and keeps going', () => {
    const engine = new RuleEngine({
      rules: [throwingRule, totalsDiscrepancy],
      config: DEFAULT_RULE_CONFIG,
      logger: quietLogger(),
    });
    const snapshot = buildSnapshot({
      totals: { valid_votes: 950, null_votes: 30, blank_votes: 20, total_votes: 990 },
    });

    const result = engine.evaluate(snapshot, null);

    expect(result.diagnostics).toEqual([
      {
        rule_id: 'scrutiny_jump',
        snapshot_ref: 'test-source/01/2025-11-30T20:00:05Z',
        message: 'Rule scrutiny_jump failed on test-source/01/2025-11-30T20:00:05Z: boom',
      },
    ]);
    expect(result.alerts.map((a) => a.rule_id)).toEqual(['totals_discrepancy']);
  });

  it('does not call baseline rules without a previous snapshot', () => {
    const apply = vi.fn(() => []);
    const baselineRule: Rule = { ...throwingRule, requiresBaseline: true, apply };
    const engine = new RuleEngine({
      rules: [baselineRule],
      config: DEFAULT_RULE_CONFIG,
      logger: quietLogger(),
    });

    engine.evaluate(buildSnapshot(), null);
    expect(apply).not.toHaveBeenCalled();

    const previous = buildSnapshot({ timestamp_observed: '2025-11-30T19:55:00Z' });
    engine.evaluate(buildSnapshot(), previous);
    expect(apply).toHaveBeenCalledTimes(1);
  });

  it('passes the previous snapshot as history by default', () => {
    const apply = vi.fn(() => []);
    const spy: Rule = { ...throwingRule, apply };
    const engine = new RuleEngine({ rules: [spy], config: DEFAULT_RULE_CONFIG, logger: quietLogger() });
    const previous = buildSnapshot({ timestamp_observed: '2025-11-30T19:55:00Z' });
    const current = buildSnapshot();

    engine.evaluate(current, previous);

    expect(apply).toHaveBeenCalledWith(current, previous, DEFAULT_RULE_CONFIG, [previous]);
  });

  it('reports its rule ids in order', () => {
    const engine = new RuleEngine({ rules: RULE_REGISTRY, config: DEFAULT_RULE_CONFIG });
    expect(engine.ruleIds).toHaveLength(14);
    expect(engine.ruleIds[0]).toBe('accumulated_count_integrity');
  });
});
