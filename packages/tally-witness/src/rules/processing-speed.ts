/**
 * Processing Speed
 *
 * Tally sheets processed per 15 minutes of source time, compared with the
 * physical capacity configured in `max_units_per_15min`.
 */

import { PROCESSING_WINDOW_MINUTES } from '../core/constants.js';
import { parseSourceTimestamp } from '../core/utils/timestamps.js';
import { createAlert, fixed, type Rule } from './types.js';

export const processingSpeed: Rule = {
  id: 'processing_speed',
  name: 'Processing speed',
  description: 'Processed units per 15 minutes must not exceed physical capacity',
  severity: 'High',
  requiresBaseline: true,

  apply(current, previous, config) {
    if (previous === null) {
      return [];
    }

    const now = parseSourceTimestamp(current.timestamp_source);
    const before = parseSourceTimestamp(previous.timestamp_source);
    if (now === null || before === null) {
      return [];
    }

    const minutes = (now - before) / 60_000;
    if (minutes <= 0) {
      return [];
    }

    const processedNow = current.progress.processed_units;
    const processedBefore = previous.progress.processed_units;
    if (processedNow === undefined || processedBefore === undefined) {
      return [];
    }

    const units = processedNow - processedBefore;
    if (units <= 0) {
      return [];
    }

    const { max_units_per_15min: maxRate } = config.rules.processing_speed;
    const rate = (units / minutes) * PROCESSING_WINDOW_MINUTES;
    if (rate <= maxRate) {
      return [];
    }

    return [
      createAlert(
        this,
        current,
        'processing_speed_exceeded',
        `${units} units in ${fixed(minutes)} minutes = ${fixed(rate)} per ${PROCESSING_WINDOW_MINUTES} min (threshold ${maxRate})`
      ),
    ];
  },
};
