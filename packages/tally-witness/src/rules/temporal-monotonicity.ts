/**
 * Temporal Monotonicity
 *
 * The source's own publication timestamp must not move backwards.
 */

import { parseSourceTimestamp } from '../core/utils/timestamps.js';
import { createAlert, type Rule } from './types.js';

export const temporalMonotonicity: Rule = {
  id: 'temporal_monotonicity',
  name: 'Temporal monotonicity',
  description: 'Source timestamps must not be earlier than the previous snapshot',
  severity: 'Medium',
  requiresBaseline: true,

  apply(current, previous) {
    if (previous === null) {
      return [];
    }

    const now = parseSourceTimestamp(current.timestamp_source);
    const before = parseSourceTimestamp(previous.timestamp_source);
    if (now === null || before === null || now >= before) {
      return [];
    }

    return [
      createAlert(
        this,
        current,
        'timestamp_regression',
        `Source timestamp ${current.timestamp_source ?? ''} is earlier than previous ${previous.timestamp_source ?? ''} (${(before - now) / 1000} s)`
      ),
    ];
  },
};
