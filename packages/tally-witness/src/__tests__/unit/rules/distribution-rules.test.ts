/**
 * Distribution Rule Tests
 *
 * null_blank_share, benford_first_digit and last_digit_uniformity look at a
 * single snapshot. The digit rules sample every candidate's votes plus
 * total_votes.
 */

import { describe, it, expect } from 'vitest';
import { nullBlankShare } from '../../../rules/null-blank-share.js';
import { benfordFirstDigit } from '../../../rules/benford-first-digit.js';
import { lastDigitUniformity } from '../../../rules/last-digit-uniformity.js';
import {
  chiSquareStatistic,
  digitCounts,
  firstDigit,
  lastDigit,
} from '../../../rules/digit-distribution.js';
import { buildRuleConfig, DEFAULT_RULE_CONFIG } from '../../../rules/config.js';
import { buildSnapshot } from '../../utils/builders.js';

const REF = 'test-source/01/2025-11-30T20:00:05Z';

describe('digit helpers', () => {
  it('extracts leading and trailing digits', () => {
    expect(firstDigit(472)).toBe(4);
    expect(firstDigit(0)).toBeNull();
    expect(lastDigit(472)).toBe(2);
    expect(lastDigit(0)).toBe(0);
    expect(lastDigit(-3)).toBeNull();
  });

  it('counts digits within a range', () => {
    expect(digitCounts([1, 1, 3, 0, 12], 1, 9)).toEqual([2, 0, 1, 0, 0, 0, 0, 0, 0]);
  });

  it('computes the chi-square statistic', () => {
    expect(chiSquareStatistic([5, 5], [0.5, 0.5])).toBe(0);
    expect(chiSquareStatistic([10, 0], [0.5, 0.5])).toBe(10);
  });
});

describe('null_blank_share', () => {
  const withNullBlank = (nullVotes: number, blankVotes: number) =>
    buildSnapshot({
      totals: {
        valid_votes: 1000 - nullVotes - blankVotes,
        null_votes: nullVotes,
        blank_votes: blankVotes,
        total_votes: 1000,
      },
    });

  it('accepts ordinary shares', () => {
    expect(nullBlankShare.apply(buildSnapshot(), null, DEFAULT_RULE_CONFIG, [])).toEqual([]);
    expect(nullBlankShare.apply(withNullBlank(50, 30), null, DEFAULT_RULE_CONFIG, [])).toEqual([]);
  });

  it('grades a share above the warning level as Medium', () => {
    expect(nullBlankShare.apply(withNullBlank(70, 50), null, DEFAULT_RULE_CONFIG, [])).toEqual([
      {
        type: 'null_blank_share_high',
        severity: 'Medium',
        justification: 'Null and blank votes are 12.00% of total (120 of 1000), above 8%',
        department: 'NORTE',
        rule_id: 'null_blank_share',
        snapshot_ref: REF,
      },
    ]);
  });

  it('grades a share above the critical level as High', () => {
    const [alert] = nullBlankShare.apply(withNullBlank(80, 50), null, DEFAULT_RULE_CONFIG, []);

    expect(alert.severity).toBe('High');
    expect(alert.justification).toBe(
      'Null and blank votes are 13.00% of total (130 of 1000), above 12%'
    );
  });

  it('skips snapshots without votes', () => {
    const empty = buildSnapshot({
      totals: { valid_votes: 0, null_votes: 0, blank_votes: 0, total_votes: 0 },
    });
    expect(nullBlankShare.apply(empty, null, DEFAULT_RULE_CONFIG, [])).toEqual([]);
  });

  it('rejects a warning level above the critical level', () => {
    expect(() =>
      buildRuleConfig({ rules: { null_blank_share: { warning_pct: 15, critical_pct: 12 } } })
    ).toThrow('warning_pct must not exceed critical_pct');
  });
});

describe('benford_first_digit', () => {
  // First digits [6, 4, 2, 2, 2, 1, 1, 1, 1] with the 1000 total
  const nearBenford = buildSnapshot({
    votes: [10, 12, 14, 16, 18, 20, 21, 22, 23, 30, 31, 40, 41, 50, 51, 60, 70, 80, 90],
  });
  // Fifteen leading ones with the 1000 total
  const allOnes = buildSnapshot({
    votes: [10, 11, 12, 13, 14, 15, 16, 17, 18, 19, 100, 110, 120, 130],
  });

  it('needs the minimum number of samples', () => {
    expect(benfordFirstDigit.apply(buildSnapshot(), null, DEFAULT_RULE_CONFIG, [])).toEqual([]);
  });

  it('grades a moderate deviation as Low', () => {
    expect(benfordFirstDigit.apply(nearBenford, null, DEFAULT_RULE_CONFIG, [])).toEqual([
      {
        type: 'benford_first_digit_deviation',
        severity: 'Low',
        justification: 'First digits of 20 counts deviate from Benford (MAD 0.0116, chi-square 0.39)',
        department: 'NORTE',
        rule_id: 'benford_first_digit',
        snapshot_ref: REF,
      },
    ]);
  });

  it('grades a strong deviation as Medium', () => {
    const [alert] = benfordFirstDigit.apply(allOnes, null, DEFAULT_RULE_CONFIG, []);

    expect(alert.severity).toBe('Medium');
    expect(alert.justification).toBe(
      'First digits of 15 counts deviate from Benford (MAD 0.1553, chi-square 34.83)'
    );
  });

  it('honours the MAD thresholds', () => {
    const config = buildRuleConfig({
      rules: { benford_first_digit: { mad_warning: 0.012, mad_critical: 0.02 } },
    });
    expect(benfordFirstDigit.apply(nearBenford, null, config, [])).toEqual([]);
  });

  it('ignores zero counts', () => {
    const zeros = buildSnapshot({ votes: new Array<number>(20).fill(0) });
    expect(benfordFirstDigit.apply(zeros, null, DEFAULT_RULE_CONFIG, [])).toEqual([]);
  });
});

describe('last_digit_uniformity', () => {
  // Twenty counts ending in 0
  const roundNumbers = buildSnapshot({
    votes: [10, 20, 30, 40, 50, 60, 70, 80, 90, 100, 110, 120, 130, 140, 150, 160, 170, 180, 190],
  });

  it('needs the minimum number of samples', () => {
    expect(lastDigitUniformity.apply(buildSnapshot(), null, DEFAULT_RULE_CONFIG, [])).toEqual([]);
  });

  it('flags counts that all end in the same digit', () => {
    expect(lastDigitUniformity.apply(roundNumbers, null, DEFAULT_RULE_CONFIG, [])).toEqual([
      {
        type: 'last_digit_not_uniform',
        severity: 'Medium',
        justification: 'Last digits of 20 counts are not uniform (chi-square 180.00 > 27.877)',
        department: 'NORTE',
        rule_id: 'last_digit_uniformity',
        snapshot_ref: REF,
      },
    ]);
  });

  it('accepts evenly spread last digits', () => {
    const even = buildSnapshot({
      votes: [10, 11, 12, 13, 14, 15, 16, 17, 18, 19, 20, 21, 22, 23, 24, 25, 26, 27, 28],
      totals: { valid_votes: 950, null_votes: 30, blank_votes: 20, total_votes: 1009 },
    });
    expect(lastDigitUniformity.apply(even, null, DEFAULT_RULE_CONFIG, [])).toEqual([]);
  });

  it('honours min_samples', () => {
    const config = buildRuleConfig({ rules: { last_digit_uniformity: { min_samples: 25 } } });
    expect(lastDigitUniformity.apply(roundNumbers, null, config, [])).toEqual([]);
  });
});
