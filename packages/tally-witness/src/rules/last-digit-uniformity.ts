/**
 * Last Digit Uniformity
 *
 * Trailing digits of the snapshot's counts should be uniform over 0-9.
 * chi_square_critical defaults to 27.877, the 0.1% critical value at nine
 * degrees of freedom.
 */

import { createAlert, fixed, type Rule } from './types.js';
import {
  UNIFORM_SHARES,
  chiSquareStatistic,
  digitCounts,
  lastDigit,
  voteSamples,
} from './digit-distribution.js';

export const lastDigitUniformity: Rule = {
  id: 'last_digit_uniformity',
  name: 'Last digit uniformity',
  description: 'Trailing digits of vote counts should be uniformly distributed',
  severity: 'Medium',
  requiresBaseline: false,

  apply(current, _previous, config) {
    const settings = config.rules.last_digit_uniformity;
    const digits = voteSamples(current)
      .map(lastDigit)
      .filter((d): d is number => d !== null);
    if (digits.length < settings.min_samples) {
      return [];
    }

    const chiSquare = chiSquareStatistic(digitCounts(digits, 0, 9), UNIFORM_SHARES);
    if (chiSquare <= settings.chi_square_critical) {
      return [];
    }

    return [
      createAlert(
        this,
        current,
        'last_digit_not_uniform',
        `Last digits of ${digits.length} counts are not uniform (chi-square ${fixed(chiSquare)} > ${settings.chi_square_critical})`
      ),
    ];
  },
};
