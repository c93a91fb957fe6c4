/**
 * Snapshot Jump
 *
 * Total votes moving more than `max_change_pct` percent within
 * `max_minutes` of source time.
 */

import { parseSourceTimestamp } from '../core/utils/timestamps.js';
import { createAlert, fixed, type Rule } from './types.js';

export const snapshotJump: Rule = {
  id: 'snapshot_jump',
  name: 'Snapshot jump',
  description: 'Total votes must not change sharply within a short interval',
  severity: 'High',
  requiresBaseline: true,

  apply(current, previous, config) {
    if (previous === null) {
      return [];
    }

    const totalNow = current.totals.total_votes;
    const totalBefore = previous.totals.total_votes;
    if (totalNow <= 0 || totalBefore <= 0) {
      return [];
    }

    const now = parseSourceTimestamp(current.timestamp_source);
    const before = parseSourceTimestamp(previous.timestamp_source);
    if (now === null || before === null) {
      return [];
    }

    const { max_change_pct: maxChangePct, max_minutes: maxMinutes } =
      config.rules.snapshot_jump;
    const minutes = (now - before) / 60_000;
    if (minutes < 0 || minutes > maxMinutes) {
      return [];
    }

    const changePct = (Math.abs(totalNow - totalBefore) / totalBefore) * 100;
    if (changePct <= maxChangePct) {
      return [];
    }

    return [
      createAlert(
        this,
        current,
        'snapshot_jump',
        `Total votes moved from ${totalBefore} to ${totalNow} (${fixed(changePct)}%) in ${fixed(minutes, 1)} minutes (threshold ${maxChangePct}% within ${maxMinutes} minutes)`
      ),
    ];
  },
};
