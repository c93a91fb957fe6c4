/**
 * Digit Distribution Helpers
 *
 * Shared by the first-digit and last-digit rules. Statistics are compared
 * against critical values of the chi-square distribution rather than
 * p-values, so no distribution function is needed at runtime.
 */

import type { NormalizedSnapshot } from '../core/types/snapshot.js';

/**
 * Counts a digit test draws from: every candidate's votes, then total votes
 */
export function voteSamples(snapshot: NormalizedSnapshot): number[] {
  return [...snapshot.candidates.map((c) => c.votes), snapshot.totals.total_votes];
}

/** Leading digit of a positive count, null otherwise */
export function firstDigit(value: number): number | null {
  return value > 0 ? Number(String(value)[0]) : null;
}

/** Trailing digit of a non-negative count, null otherwise */
export function lastDigit(value: number): number | null {
  return value >= 0 ? value % 10 : null;
}

/**
 * Occurrences of each digit from `from` to `to` inclusive
 */
export function digitCounts(digits: readonly number[], from: number, to: number): number[] {
  const counts = new Array<number>(to - from + 1).fill(0);
  for (const digit of digits) {
    if (digit >= from && digit <= to) {
      counts[digit - from] += 1;
    }
  }
  return counts;
}

/**
 * Pearson's statistic for observed counts against expected proportions
 */
export function chiSquareStatistic(
  observed: readonly number[],
  expectedShares: readonly number[]
): number {
  const total = observed.reduce((sum, n) => sum + n, 0);
  return observed.reduce((sum, n, i) => {
    const expected = expectedShares[i] * total;
    return expected > 0 ? sum + (n - expected) ** 2 / expected : sum;
  }, 0);
}

/** Expected share of each leading digit 1-9 */
export const BENFORD_SHARES: readonly number[] = [1, 2, 3, 4, 5, 6, 7, 8, 9].map((d) =>
  Math.log10(1 + 1 / d)
);

/** Expected share of each trailing digit 0-9 */
export const UNIFORM_SHARES: readonly number[] = new Array<number>(10).fill(0.1);
