/**
 * Rule Registry and Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import {
  isRuleId,
  registryIndex,
  resolveEnabledRules,
  RULE_IDS,
} from '../../../rules/registry.js';
import {
  buildRuleConfig,
  DEFAULT_RULE_CONFIG,
  isRuleEnabled,
  RuleConfigSchema,
} from '../../../rules/config.js';
import { ConfigurationError } from '../../../core/errors.js';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('RULE_REGISTRY', () => {
  it('lists the reference rules in evaluation order', () => {
    expect(RULE_IDS).toEqual([
      'accumulated_count_integrity',
      'temporal_monotonicity',
      'arithmetic_consistency',
      'atypical_variation',
      'implicit_rewrite',
      'relative_variation',
      'scrutiny_jump',
      'totals_discrepancy',
      'snapshot_jump',
      'turnout_impossible',
      'processing_speed',
      'null_blank_share',
      'benford_first_digit',
      'last_digit_uniformity',
    ]);
  });

  it('indexes rules by id', () => {
    expect(registryIndex('accumulated_count_integrity')).toBe(0);
    expect(registryIndex('processing_speed')).toBe(10);
    expect(registryIndex('last_digit_uniformity')).toBe(13);
    expect(registryIndex('unknown')).toBe(14);
    expect(isRuleId('scrutiny_jump')).toBe(true);
    expect(isRuleId('scrutiny')).toBe(false);
  });
});

describe('resolveEnabledRules', () => {
  it('returns every rule by default', () => {
    expect(resolveEnabledRules(DEFAULT_RULE_CONFIG)).toHaveLength(14);
  });

  it('keeps registry order for a requested subset', () => {
    const rules = resolveEnabledRules(DEFAULT_RULE_CONFIG, [
      'totals_discrepancy',
      'accumulated_count_integrity',
    ]);
    expect(rules.map((r) => r.id)).toEqual(['accumulated_count_integrity', 'totals_discrepancy']);
  });

  it('drops rules disabled in configuration', () => {
    const config = buildRuleConfig({ rules: { snapshot_jump: { enabled: false } } });
    const ids = resolveEnabledRules(config).map((r) => r.id);

    expect(ids).toHaveLength(13);
    expect(ids).not.toContain('snapshot_jump');
  });

  it('rejects unknown rule ids', () => {
    const error = captureError(() => resolveEnabledRules(DEFAULT_RULE_CONFIG, ['bogus']));

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error instanceof ConfigurationError && error.kind).toBe('UnknownRule');
  });

  it('rejects an empty rule set', () => {
    const disabled = buildRuleConfig({ global_enabled: false });
    const error = captureError(() => resolveEnabledRules(disabled));

    expect(error instanceof ConfigurationError && error.kind).toBe('NoEnabledRules');

    const onlyDisabled = buildRuleConfig({ rules: { implicit_rewrite: { enabled: false } } });
    const second = captureError(() => resolveEnabledRules(onlyDisabled, ['implicit_rewrite']));
    expect(second instanceof ConfigurationError && second.kind).toBe('NoEnabledRules');
  });
});

describe('rule configuration', () => {
  it('applies documented defaults', () => {
    expect(DEFAULT_RULE_CONFIG.global_enabled).toBe(true);
    expect(DEFAULT_RULE_CONFIG.rule_set_version).toBe('1.0.0');
    expect(DEFAULT_RULE_CONFIG.rules.atypical_variation).toEqual({
      enabled: true,
      z_threshold: 3,
      min_history: 3,
    });
    expect(DEFAULT_RULE_CONFIG.rules.snapshot_jump).toEqual({
      enabled: true,
      max_change_pct: 5,
      max_minutes: 10,
    });
    expect(DEFAULT_RULE_CONFIG.rules.null_blank_share).toEqual({
      enabled: true,
      warning_pct: 8,
      critical_pct: 12,
    });
    expect(DEFAULT_RULE_CONFIG.rules.benford_first_digit).toEqual({
      enabled: true,
      min_samples: 15,
      mad_warning: 0.008,
      mad_critical: 0.015,
      chi_square_critical: 20.09,
    });
    expect(DEFAULT_RULE_CONFIG.rules.last_digit_uniformity).toEqual({
      enabled: true,
      min_samples: 20,
      chi_square_critical: 27.877,
    });
  });

  it('gates every rule on the global switch', () => {
    const config = buildRuleConfig({ global_enabled: false });
    expect(isRuleEnabled(config, 'totals_discrepancy')).toBe(false);
  });

  it('rejects negative or inconsistent thresholds', () => {
    expect(
      RuleConfigSchema.safeParse({ rules: { scrutiny_jump: { max_delta_pp: -1 } } }).success
    ).toBe(false);
    expect(
      RuleConfigSchema.safeParse({
        rules: { turnout_impossible: { min_turnout_pct: 80, max_turnout_pct: 50 } },
      }).success
    ).toBe(false);
    expect(RuleConfigSchema.safeParse({ rules: { made_up_rule: {} } }).success).toBe(false);
  });
});
