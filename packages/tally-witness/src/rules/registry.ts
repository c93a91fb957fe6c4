/**
 * Rule Registry
 *
 * Explicit, ordered list of reference rules. Order is part of the output
 * contract: alerts for one snapshot are reported in registry order.
 */

import { ConfigurationError } from '../core/errors.js';
import { accumulatedCountIntegrity } from './accumulated-count-integrity.js';
import { arithmeticConsistency } from './arithmetic-consistency.js';
import { atypicalVariation } from './atypical-variation.js';
import { benfordFirstDigit } from './benford-first-digit.js';
import type { RuleConfig, RuleId } from './config.js';
import { isRuleEnabled } from './config.js';
import { implicitRewrite } from './implicit-rewrite.js';
import { lastDigitUniformity } from './last-digit-uniformity.js';
import { nullBlankShare } from './null-blank-share.js';
import { processingSpeed } from './processing-speed.js';
import { relativeVariation } from './relative-variation.js';
import { scrutinyJump } from './scrutiny-jump.js';
import { snapshotJump } from './snapshot-jump.js';
import { temporalMonotonicity } from './temporal-monotonicity.js';
import { totalsDiscrepancy } from './totals-discrepancy.js';
import { turnoutImpossible } from './turnout-impossible.js';
import type { Rule } from './types.js';

export const RULE_REGISTRY: readonly Rule[] = [
  accumulatedCountIntegrity,
  temporalMonotonicity,
  arithmeticConsistency,
  atypicalVariation,
  implicitRewrite,
  relativeVariation,
  scrutinyJump,
  totalsDiscrepancy,
  snapshotJump,
  turnoutImpossible,
  processingSpeed,
  nullBlankShare,
  benfordFirstDigit,
  lastDigitUniformity,
];

export const RULE_IDS: readonly RuleId[] = RULE_REGISTRY.map((rule) => rule.id);

export function isRuleId(value: string): value is RuleId {
  return RULE_REGISTRY.some((rule) => rule.id === value);
}

/**
 * Position of a rule in the registry (used to order alerts)
 */
export function registryIndex(id: string): number {
  const index = RULE_REGISTRY.findIndex((rule) => rule.id === id);
  return index === -1 ? RULE_REGISTRY.length : index;
}

/**
 * Rules to run, in registry order
 *
 * With `requested`, only those ids are considered (and must exist); the
 * configuration's enabled flags still apply.
 *
 * @throws ConfigurationError for unknown ids (kind UnknownRule) or when no
 *   rule remains enabled (kind NoEnabledRules)
 */
export function resolveEnabledRules(
  config: RuleConfig,
  requested?: readonly string[]
): Rule[] {
  if (requested !== undefined) {
    const unknown = requested.filter((id) => !isRuleId(id));
    if (unknown.length > 0) {
      throw new ConfigurationError(
        `Unknown rule id(s): ${unknown.join(', ')}`,
        unknown.map((id) => `${id}: not in registry (${RULE_IDS.join(', ')})`),
        'UnknownRule'
      );
    }
  }

  const wanted = requested === undefined ? null : new Set(requested);
  const rules = RULE_REGISTRY.filter(
    (rule) => (wanted === null || wanted.has(rule.id)) && isRuleEnabled(config, rule.id)
  );

  if (rules.length === 0) {
    throw new ConfigurationError('No rules enabled', [], 'NoEnabledRules');
  }

  return rules;
}
