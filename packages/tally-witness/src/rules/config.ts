/**
 * Rule Configuration
 *
 * Thresholds are merged over documented defaults and validated once at
 * startup. Negative or non-finite thresholds are rejected rather than
 * silently replaced.
 */

import { z } from 'zod';

const threshold = z.number().finite().nonnegative();
const enabled = z.boolean().default(true);

export const RuleSettingsSchema = z
  .object({
    accumulated_count_integrity: z.object({ enabled }).strict().default({}),
    temporal_monotonicity: z.object({ enabled }).strict().default({}),
    arithmetic_consistency: z
      .object({ enabled, tolerance: threshold.default(0) })
      .strict()
      .default({}),
    atypical_variation: z
      .object({
        enabled,
        z_threshold: threshold.default(3),
        min_history: z.number().int().positive().default(3),
      })
      .strict()
      .default({}),
    implicit_rewrite: z.object({ enabled }).strict().default({}),
    relative_variation: z
      .object({ enabled, max_share_change_pp: threshold.default(5) })
      .strict()
      .default({}),
    scrutiny_jump: z
      .object({ enabled, max_delta_pp: threshold.default(10) })
      .strict()
      .default({}),
    totals_discrepancy: z
      .object({ enabled, tolerance: threshold.default(0) })
      .strict()
      .default({}),
    snapshot_jump: z
      .object({
        enabled,
        max_change_pct: threshold.default(5),
        max_minutes: threshold.default(10),
      })
      .strict()
      .default({}),
    turnout_impossible: z
      .object({
        enabled,
        min_turnout_pct: threshold.default(0),
        max_turnout_pct: threshold.default(100),
      })
      .strict()
      .refine((c) => c.min_turnout_pct <= c.max_turnout_pct, {
        message: 'min_turnout_pct must not exceed max_turnout_pct',
      })
      .default({}),
    processing_speed: z
      .object({ enabled, max_units_per_15min: threshold.default(500) })
      .strict()
      .default({}),
    null_blank_share: z
      .object({
        enabled,
        warning_pct: threshold.default(8),
        critical_pct: threshold.default(12),
      })
      .strict()
      .refine((c) => c.warning_pct <= c.critical_pct, {
        message: 'warning_pct must not exceed critical_pct',
      })
      .default({}),
    benford_first_digit: z
      .object({
        enabled,
        min_samples: z.number().int().positive().default(15),
        mad_warning: threshold.default(0.008),
        mad_critical: threshold.default(0.015),
        // 1% critical value, 8 degrees of freedom
        chi_square_critical: threshold.default(20.09),
      })
      .strict()
      .refine((c) => c.mad_warning <= c.mad_critical, {
        message: 'mad_warning must not exceed mad_critical',
      })
      .default({}),
    last_digit_uniformity: z
      .object({
        enabled,
        min_samples: z.number().int().positive().default(20),
        // 0.1% critical value, 9 degrees of freedom
        chi_square_critical: threshold.default(27.877),
      })
      .strict()
      .default({}),
  })
  .strict();

export const RuleConfigSchema = z
  .object({
    global_enabled: z.boolean().default(true),
    rule_set_version: z.string().min(1).default('1.0.0'),
    rules: RuleSettingsSchema.default({}),
  })
  .strict();

export type RuleSettings = z.output<typeof RuleSettingsSchema>;
export type RuleConfig = z.output<typeof RuleConfigSchema>;
export type RuleConfigInput = z.input<typeof RuleConfigSchema>;

/**
 * Identifier of a reference rule
 */
export type RuleId = keyof RuleSettings;

export const DEFAULT_RULE_CONFIG: RuleConfig = RuleConfigSchema.parse({});

/**
 * Build a rule config from a partial one, applying defaults
 *
 * @throws ZodError on invalid thresholds
 */
export function buildRuleConfig(input: RuleConfigInput = {}): RuleConfig {
  return RuleConfigSchema.parse(input);
}

export function isRuleEnabled(config: RuleConfig, id: RuleId): boolean {
  return config.global_enabled && config.rules[id].enabled;
}
