/**
 * Source timestamp parsing
 *
 * Sources publish timestamps in loosely ISO-like shapes. Anything that does
 * not parse returns null, and rules skip the comparison. Timestamps without a
 * zone are read as UTC.
 */

const ISO_LIKE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;

const DAY_FIRST =
  /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:[ T](\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;

interface DateParts {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  readonly millis: number;
  readonly offsetMinutes: number;
}

function toEpoch(parts: DateParts): number | null {
  const { year, month, day, hour, minute, second, millis, offsetMinutes } = parts;
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  const epoch = Date.UTC(year, month - 1, day, hour, minute, second, millis);
  // Date.UTC rolls 2025-02-30 over to March; reject instead
  const check = new Date(epoch);
  if (check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) return null;

  return epoch - offsetMinutes * 60_000;
}

function parseOffset(zone: string | undefined): number | null {
  if (zone === undefined || zone.toUpperCase() === 'Z') {
    return 0;
  }
  const sign = zone.startsWith('-') ? -1 : 1;
  const digits = zone.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  if (hours > 23 || minutes > 59) return null;
  return sign * (hours * 60 + minutes);
}

/**
 * Parse a source timestamp to epoch milliseconds, or null when unparsable
 */
export function parseSourceTimestamp(value: string | null | undefined): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  const text = value.trim();

  const iso = ISO_LIKE.exec(text);
  if (iso) {
    const offsetMinutes = parseOffset(iso[8]);
    if (offsetMinutes === null) return null;
    const fraction = iso[7] ?? '0';
    return toEpoch({
      year: Number(iso[1]),
      month: Number(iso[2]),
      day: Number(iso[3]),
      hour: Number(iso[4] ?? '0'),
      minute: Number(iso[5] ?? '0'),
      second: Number(iso[6] ?? '0'),
      millis: Math.floor(Number(`0.${fraction}`) * 1000),
      offsetMinutes,
    });
  }

  const dayFirst = DAY_FIRST.exec(text);
  if (dayFirst) {
    return toEpoch({
      year: Number(dayFirst[3]),
      month: Number(dayFirst[2]),
      day: Number(dayFirst[1]),
      hour: Number(dayFirst[4] ?? '0'),
      minute: Number(dayFirst[5] ?? '0'),
      second: Number(dayFirst[6] ?? '0'),
      millis: 0,
      offsetMinutes: 0,
    });
  }

  return null;
}

/**
 * Validate an ISO-8601 instant (used for retrieved_at / timestamp_observed)
 */
export function isIsoInstant(value: string): boolean {
  return ISO_LIKE.test(value.trim()) && parseSourceTimestamp(value) !== null;
}

/**
 * Order two observation instants; unparsable values compare as strings
 */
export function compareObserved(a: string, b: string): number {
  const ta = parseSourceTimestamp(a);
  const tb = parseSourceTimestamp(b);
  if (ta !== null && tb !== null && ta !== tb) {
    return ta - tb;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}
