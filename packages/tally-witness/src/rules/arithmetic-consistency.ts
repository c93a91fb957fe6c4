/**
 * Arithmetic Consistency
 *
 * Candidate votes must add up to the reported valid votes.
 */

import { candidateVoteSum, createAlert, type Rule } from './types.js';

export const arithmeticConsistency: Rule = {
  id: 'arithmetic_consistency',
  name: 'Arithmetic consistency',
  description: 'Sum of candidate votes must match valid votes within tolerance',
  severity: 'High',
  requiresBaseline: false,

  apply(current, _previous, config) {
    if (current.candidates.length === 0) {
      return [];
    }

    const { tolerance } = config.rules.arithmetic_consistency;
    const sum = candidateVoteSum(current);
    const valid = current.totals.valid_votes;
    const difference = Math.abs(sum - valid);

    if (difference <= tolerance) {
      return [];
    }

    return [
      createAlert(
        this,
        current,
        'candidate_sum_mismatch',
        `Candidate votes sum to ${sum} but valid_votes is ${valid} (difference ${difference}, tolerance ${tolerance})`
      ),
    ];
  },
};
