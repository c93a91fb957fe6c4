/**
 * Totals Discrepancy
 *
 * valid + null + blank must equal the reported total.
 */

import { createAlert, type Rule } from './types.js';

export const totalsDiscrepancy: Rule = {
  id: 'totals_discrepancy',
  name: 'Totals discrepancy',
  description: 'Valid, null and blank votes must add up to total votes',
  severity: 'High',
  requiresBaseline: false,

  apply(current, _previous, config) {
    const { tolerance } = config.rules.totals_discrepancy;
    const { valid_votes, null_votes, blank_votes, total_votes } = current.totals;
    const sum = valid_votes + null_votes + blank_votes;
    const difference = Math.abs(sum - total_votes);

    if (difference <= tolerance) {
      return [];
    }

    return [
      createAlert(
        this,
        current,
        'totals_mismatch',
        `valid ${valid_votes} + null ${null_votes} + blank ${blank_votes} = ${sum} but total_votes is ${total_votes} (difference ${difference}, tolerance ${tolerance})`
      ),
    ];
  },
};
