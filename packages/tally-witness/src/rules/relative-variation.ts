/**
 * Relative Variation
 *
 * Flags candidates whose share of the candidate vote moves more than a
 * configured number of percentage points between snapshots.
 */

import type { Alert } from '../core/types/alerts.js';
import type { NormalizedSnapshot } from '../core/types/snapshot.js';
import { candidateVoteSum, createAlert, fixed, type Rule } from './types.js';

function sharesBySlot(snapshot: NormalizedSnapshot): Map<number, number> | null {
  const sum = candidateVoteSum(snapshot);
  if (sum <= 0) {
    return null;
  }
  return new Map(snapshot.candidates.map((c) => [c.slot, (c.votes / sum) * 100]));
}

export const relativeVariation: Rule = {
  id: 'relative_variation',
  name: 'Relative variation',
  description: 'Candidate vote share must not shift abruptly between snapshots',
  severity: 'Medium',
  requiresBaseline: true,

  apply(current, previous, config) {
    if (previous === null) {
      return [];
    }

    const sharesNow = sharesBySlot(current);
    const sharesBefore = sharesBySlot(previous);
    if (sharesNow === null || sharesBefore === null) {
      return [];
    }

    const { max_share_change_pp: maxChange } = config.rules.relative_variation;
    const alerts: Alert[] = [];

    for (const [slot, share] of sharesNow) {
      const prior = sharesBefore.get(slot);
      if (prior === undefined) continue;

      const delta = Math.abs(share - prior);
      if (delta > maxChange) {
        alerts.push(
          createAlert(
            this,
            current,
            'share_shift',
            `Slot ${slot}: share moved from ${fixed(prior)}% to ${fixed(share)}% (${fixed(delta)} pp, threshold ${maxChange} pp)`
          )
        );
      }
    }

    return alerts;
  },
};
