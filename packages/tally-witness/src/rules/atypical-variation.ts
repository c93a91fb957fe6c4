/**
 * Atypical Variation
 *
 * Compares each slot's latest vote delta with the deltas observed earlier in
 * the same series. A delta more than `z_threshold` standard deviations from
 * the historical mean is flagged.
 */

import type { Alert } from '../core/types/alerts.js';
import type { NormalizedSnapshot } from '../core/types/snapshot.js';
import { createAlert, fixed, votesBySlot, type Rule } from './types.js';

/**
 * Consecutive per-slot deltas across a series, oldest first
 */
function slotDeltas(series: readonly NormalizedSnapshot[]): Map<number, number[]> {
  const deltas = new Map<number, number[]>();

  for (let i = 1; i < series.length; i++) {
    const before = votesBySlot(series[i - 1]);
    for (const candidate of series[i].candidates) {
      const prior = before.get(candidate.slot);
      if (prior === undefined) continue;
      const list = deltas.get(candidate.slot) ?? [];
      list.push(candidate.votes - prior);
      deltas.set(candidate.slot, list);
    }
  }

  return deltas;
}

function meanAndStd(values: readonly number[]): { mean: number; std: number } {
  const mean = values.reduce((a, b) => a + b, 0) / values.length;
  const variance = values.reduce((acc, v) => acc + (v - mean) ** 2, 0) / values.length;
  return { mean, std: Math.sqrt(variance) };
}

export const atypicalVariation: Rule = {
  id: 'atypical_variation',
  name: 'Atypical variation',
  description: 'Per-slot vote deltas must stay within the historical distribution',
  severity: 'Medium',
  requiresBaseline: true,

  apply(current, previous, config, history) {
    if (previous === null) {
      return [];
    }

    const earlier =
      history[history.length - 1] === previous ? history : [...history, previous];
    const historical = slotDeltas(earlier);
    const before = votesBySlot(previous);
    const { z_threshold: zThreshold, min_history: minHistory } =
      config.rules.atypical_variation;

    const alerts: Alert[] = [];

    for (const candidate of current.candidates) {
      const prior = before.get(candidate.slot);
      const deltas = historical.get(candidate.slot);
      if (prior === undefined || deltas === undefined || deltas.length < minHistory) {
        continue;
      }

      const { mean, std } = meanAndStd(deltas);
      if (std === 0) continue;

      const delta = candidate.votes - prior;
      const z = (delta - mean) / std;
      if (Math.abs(z) > zThreshold) {
        alerts.push(
          createAlert(
            this,
            current,
            'atypical_vote_delta',
            `Slot ${candidate.slot}: delta ${delta} vs historical mean ${fixed(mean)} (std ${fixed(std)}, z=${fixed(z)}, threshold ${zThreshold}, ${deltas.length} deltas)`
          )
        );
      }
    }

    return alerts;
  },
};
