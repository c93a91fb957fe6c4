/**
 * Implicit Rewrite
 *
 * Votes can only legitimately change when more tally sheets are processed.
 * Changed counts with a flat or shrinking processed-unit counter indicate
 * already-published results were rewritten.
 */

import { createAlert, votesBySlot, type Rule } from './types.js';

export const implicitRewrite: Rule = {
  id: 'implicit_rewrite',
  name: 'Implicit rewrite',
  description: 'Votes must not change unless processed units increase',
  severity: 'High',
  requiresBaseline: true,

  apply(current, previous) {
    if (previous === null) {
      return [];
    }

    const processedNow = current.progress.processed_units;
    const processedBefore = previous.progress.processed_units;
    if (processedNow === undefined || processedBefore === undefined) {
      return [];
    }
    if (processedNow > processedBefore) {
      return [];
    }

    const before = votesBySlot(previous);
    const changes = current.candidates
      .filter((c) => {
        const prior = before.get(c.slot);
        return prior !== undefined && prior !== c.votes;
      })
      .map((c) => `${c.slot} (${before.get(c.slot) ?? 0} -> ${c.votes})`);

    if (changes.length === 0) {
      return [];
    }

    return [
      createAlert(
        this,
        current,
        'implicit_rewrite',
        `Votes changed in slots ${changes.join(', ')} while processed units went from ${processedBefore} to ${processedNow}`
      ),
    ];
  },
};
