/**
 * Benford First Digit
 *
 * Leading digits of the snapshot's counts against Benford's law. The mean
 * absolute deviation (MAD) grades the alert: above mad_critical, or a
 * chi-square statistic above chi_square_critical, is Medium; from
 * mad_warning up to mad_critical is Low.
 *
 * chi_square_critical defaults to 20.090, the 1% critical value at eight
 * degrees of freedom.
 */

import { createAlert, fixed, type Rule } from './types.js';
import {
  BENFORD_SHARES,
  chiSquareStatistic,
  digitCounts,
  firstDigit,
  voteSamples,
} from './digit-distribution.js';

export const benfordFirstDigit: Rule = {
  id: 'benford_first_digit',
  name: 'Benford first digit',
  description: "Leading digits of vote counts should follow Benford's law",
  severity: 'Medium',
  requiresBaseline: false,

  apply(current, _previous, config) {
    const settings = config.rules.benford_first_digit;
    const digits = voteSamples(current)
      .map(firstDigit)
      .filter((d): d is number => d !== null);
    if (digits.length < settings.min_samples) {
      return [];
    }

    const counts = digitCounts(digits, 1, 9);
    const mad =
      counts.reduce((sum, n, i) => sum + Math.abs(n / digits.length - BENFORD_SHARES[i]), 0) /
      counts.length;
    const chiSquare = chiSquareStatistic(counts, BENFORD_SHARES);

    const critical = mad > settings.mad_critical || chiSquare > settings.chi_square_critical;
    if (!critical && mad < settings.mad_warning) {
      return [];
    }

    return [
      createAlert(
        this,
        current,
        'benford_first_digit_deviation',
        `First digits of ${digits.length} counts deviate from Benford (MAD ${fixed(mad, 4)}, chi-square ${fixed(chiSquare)})`,
        critical ? 'Medium' : 'Low'
      ),
    ];
  },
};
