/**
 * Null/Blank Share
 *
 * Null plus blank votes as a share of total votes. Above the critical
 * percentage the alert is High, above the warning percentage Medium.
 */

import { createAlert, fixed, type Rule } from './types.js';

export const nullBlankShare: Rule = {
  id: 'null_blank_share',
  name: 'Null/blank share',
  description: 'Null and blank votes must stay below the configured share of total votes',
  severity: 'High',
  requiresBaseline: false,

  apply(current, _previous, config) {
    const { null_votes: nullVotes, blank_votes: blankVotes, total_votes: total } = current.totals;
    if (total <= 0) {
      return [];
    }

    const { warning_pct: warningPct, critical_pct: criticalPct } = config.rules.null_blank_share;
    const nullBlank = nullVotes + blankVotes;
    const share = (nullBlank * 100) / total;

    const critical = share > criticalPct;
    if (!critical && share <= warningPct) {
      return [];
    }

    return [
      createAlert(
        this,
        current,
        'null_blank_share_high',
        `Null and blank votes are ${fixed(share)}% of total (${nullBlank} of ${total}), above ${critical ? criticalPct : warningPct}%`,
        critical ? 'High' : 'Medium'
      ),
    ];
  },
};
