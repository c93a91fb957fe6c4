/**
 * Scrutiny Jump
 *
 * Completion is recomputed from processed/total units; the percentage a
 * source publishes is never trusted.
 */

import { completionPct, createAlert, fixed, type Rule } from './types.js';

export const scrutinyJump: Rule = {
  id: 'scrutiny_jump',
  name: 'Scrutiny jump',
  description: 'Completion percentage must not jump between snapshots',
  severity: 'Medium',
  requiresBaseline: true,

  apply(current, previous, config) {
    if (previous === null) {
      return [];
    }

    const now = completionPct(current);
    const before = completionPct(previous);
    if (now === null || before === null) {
      return [];
    }

    const { max_delta_pp: maxDelta } = config.rules.scrutiny_jump;
    const delta = Math.abs(now - before);
    if (delta <= maxDelta) {
      return [];
    }

    return [
      createAlert(
        this,
        current,
        'scrutiny_jump',
        `Completion moved from ${fixed(before)}% to ${fixed(now)}% (${fixed(delta)} pp, threshold ${maxDelta} pp)`
      ),
    ];
  },
};
