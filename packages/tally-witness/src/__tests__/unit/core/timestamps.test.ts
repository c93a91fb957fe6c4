/**
 * Source Timestamp Tests
 */

import { describe, it, expect } from 'vitest';
import {
  compareObserved,
  isIsoInstant,
  parseSourceTimestamp,
} from '../../../core/utils/timestamps.js';

const EIGHT_PM = Date.UTC(2025, 10, 30, 20, 0, 0);

describe('parseSourceTimestamp', () => {
  it('parses ISO instants', () => {
    expect(parseSourceTimestamp('2025-11-30T20:00:00Z')).toBe(EIGHT_PM);
    expect(parseSourceTimestamp('2025-11-30T20:00:00.250Z')).toBe(EIGHT_PM + 250);
  });

  it('reads timestamps without a zone as UTC', () => {
    expect(parseSourceTimestamp('2025-11-30 20:00:00')).toBe(EIGHT_PM);
    expect(parseSourceTimestamp('2025-11-30T20:00')).toBe(EIGHT_PM);
  });

  it('applies offsets', () => {
    expect(parseSourceTimestamp('2025-11-30T20:00:00-05:00')).toBe(EIGHT_PM + 5 * 3_600_000);
    expect(parseSourceTimestamp('2025-11-30T20:00:00+0130')).toBe(EIGHT_PM - 90 * 60_000);
  });

  it('parses day-first dates', () => {
    expect(parseSourceTimestamp('30/11/2025 20:00')).toBe(EIGHT_PM);
    expect(parseSourceTimestamp('30/11/2025')).toBe(Date.UTC(2025, 10, 30));
  });

  it('returns null for unparsable or impossible values', () => {
    expect(parseSourceTimestamp('2025-02-30T00:00:00Z')).toBeNull();
    expect(parseSourceTimestamp('2025-11-30T25:00:00Z')).toBeNull();
    expect(parseSourceTimestamp('yesterday')).toBeNull();
    expect(parseSourceTimestamp(null)).toBeNull();
    expect(parseSourceTimestamp(undefined)).toBeNull();
  });
});

describe('isIsoInstant', () => {
  it('accepts ISO forms only', () => {
    expect(isIsoInstant('2025-11-30T20:00:00Z')).toBe(true);
    expect(isIsoInstant('30/11/2025')).toBe(false);
    expect(isIsoInstant('2025-13-01T00:00:00Z')).toBe(false);
  });
});

describe('compareObserved', () => {
  it('orders by instant, not by text', () => {
    // 21:00+02:00 is 19:00Z
    expect(compareObserved('2025-11-30T21:00:00+02:00', '2025-11-30T20:00:00Z')).toBeLessThan(0);
  });

  it('falls back to text order for equal or unparsable instants', () => {
    expect(compareObserved('2025-11-30T20:00:00Z', '2025-11-30T15:00:00-05:00')).toBeGreaterThan(0);
    expect(compareObserved('a', 'b')).toBeLessThan(0);
    expect(compareObserved('same', 'same')).toBe(0);
  });
});
