/**
 * Integer coercion for source values
 *
 * Numbers truncate toward zero and must stay within the safe integer range,
 * whichever form they arrive in. Strings may carry thousands separators
 * (",", "_", spaces) and a decimal tail, which is truncated. Everything else
 * is not coercible; the caller substitutes 0 and records a warning.
 */

import type { JsonValue } from '../types/json.js';

export type CoercionOutcome =
  | { readonly ok: true; readonly value: number }
  | { readonly ok: false; readonly reason: 'not_numeric' | 'non_finite' };

const NUMERIC_STRING = /^([+-]?)(\d+)(?:\.\d*)?$/;
const SEPARATORS = /[,_\s]/g;

function truncate(value: number): number {
  const truncated = Math.trunc(value);
  // -0 would serialize as 0 but compare differently in tests and maps
  return truncated === 0 ? 0 : truncated;
}

export function coerceInteger(value: JsonValue): CoercionOutcome {
  if (typeof value === 'number') {
    const truncated = Number.isFinite(value) ? truncate(value) : value;
    if (!Number.isSafeInteger(truncated)) {
      return { ok: false, reason: 'non_finite' };
    }
    return { ok: true, value: truncated };
  }

  if (typeof value === 'string') {
    const cleaned = value.trim().replace(SEPARATORS, '');
    const match = NUMERIC_STRING.exec(cleaned);
    if (!match) {
      return { ok: false, reason: 'not_numeric' };
    }
    const parsed = Number(`${match[1]}${match[2]}`);
    if (!Number.isSafeInteger(parsed)) {
      return { ok: false, reason: 'non_finite' };
    }
    return { ok: true, value: truncate(parsed) };
  }

  return { ok: false, reason: 'not_numeric' };
}

/**
 * Render a source value for a warning entry
 */
export function describeValue(value: JsonValue | undefined): string {
  if (value === undefined) {
    return 'undefined';
  }
  return typeof value === 'string' ? value : JSON.stringify(value);
}
