/**
 * Accumulated Count Integrity
 *
 * Published counts are cumulative. A slot whose votes go down between two
 * consecutive snapshots of the same series means votes were removed.
 */

import type { Alert } from '../core/types/alerts.js';
import { createAlert, votesBySlot, type Rule } from './types.js';

export const accumulatedCountIntegrity: Rule = {
  id: 'accumulated_count_integrity',
  name: 'Accumulated count integrity',
  description: 'Per-slot vote counts must never decrease between snapshots',
  severity: 'High',
  requiresBaseline: true,

  apply(current, previous) {
    if (previous === null) {
      return [];
    }

    const before = votesBySlot(previous);
    const alerts: Alert[] = [];

    for (const candidate of current.candidates) {
      const prior = before.get(candidate.slot);
      if (prior !== undefined && candidate.votes < prior) {
        alerts.push(
          createAlert(
            this,
            current,
            'vote_decrease',
            `Slot ${candidate.slot}: votes decreased from ${prior} to ${candidate.votes} (-${prior - candidate.votes})`
          )
        );
      }
    }

    return alerts;
  },
};
