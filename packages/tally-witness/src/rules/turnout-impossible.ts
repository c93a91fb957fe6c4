/**
 * Turnout Impossible
 *
 * Turnout (total votes over registered voters) outside the configured
 * bounds. Skipped when the electorate is unknown or zero.
 */

import { createAlert, fixed, type Rule } from './types.js';

export const turnoutImpossible: Rule = {
  id: 'turnout_impossible',
  name: 'Turnout impossible',
  description: 'Turnout must lie within the configured bounds',
  severity: 'High',
  requiresBaseline: false,

  apply(current, _previous, config) {
    const registered = current.progress.registered_voters;
    if (registered === undefined || registered <= 0) {
      return [];
    }

    const { min_turnout_pct: minPct, max_turnout_pct: maxPct } =
      config.rules.turnout_impossible;
    const turnout = (current.totals.total_votes / registered) * 100;

    if (turnout >= minPct && turnout <= maxPct) {
      return [];
    }

    return [
      createAlert(
        this,
        current,
        'turnout_out_of_bounds',
        `Turnout ${fixed(turnout)}% (${current.totals.total_votes} of ${registered} registered) outside [${minPct}%, ${maxPct}%]`
      ),
    ];
  },
};
