/**
 * Canonical JSON serialization
 *
 * Object keys sorted by code unit, no insignificant whitespace, undefined
 * members omitted. The hash chain hashes exactly these bytes, so the output
 * must not depend on in-memory key order.
 */

import { createHash } from 'node:crypto';

export function canonicalStringify(value: unknown): string {
  if (value === null) {
    return 'null';
  }

  switch (typeof value) {
    case 'string':
      return JSON.stringify(value);
    case 'number':
      return Number.isFinite(value) ? JSON.stringify(value) : 'null';
    case 'boolean':
      return value ? 'true' : 'false';
    case 'object':
      return Array.isArray(value) ? stringifyArray(value) : stringifyObject(value);
    default:
      throw new TypeError(`Cannot canonicalize value of type ${typeof value}`);
  }
}

function stringifyArray(items: readonly unknown[]): string {
  const parts = items.map((item) =>
    item === undefined || typeof item === 'function' ? 'null' : canonicalStringify(item)
  );
  return `[${parts.join(',')}]`;
}

function stringifyObject(obj: object): string {
  const entries = Object.entries(obj)
    .filter(([, member]) => member !== undefined && typeof member !== 'function')
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  const parts = entries.map(
    ([key, member]) => `${JSON.stringify(key)}:${canonicalStringify(member)}`
  );
  return `{${parts.join(',')}}`;
}

/**
 * SHA-256 hex digest of a UTF-8 string
 */
export function sha256Hex(data: string): string {
  return createHash('sha256').update(data, 'utf8').digest('hex');
}
