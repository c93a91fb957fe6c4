/**
 * Dot-delimited JSON path resolution
 *
 * A path such as `estadisticas.distribucion_votos.validos` walks object keys;
 * an all-digit segment indexes an array (`resultados.0.votos`). Resolution is
 * a recursive descent over JsonValue; no reflection, no evaluation.
 */

import { isJsonArray, isJsonObject, type JsonValue } from '../types/json.js';

const INDEX_SEGMENT = /^\d+$/;

/**
 * Split a path into segments. Empty segments are rejected.
 */
export function parsePath(path: string): readonly string[] {
  if (path.length === 0) {
    return [];
  }
  const segments = path.split('.');
  if (segments.some((segment) => segment.length === 0)) {
    throw new Error(`Invalid JSON path "${path}": empty segment`);
  }
  return segments;
}

export function isValidPath(path: string): boolean {
  return path.length > 0 && path.split('.').every((segment) => segment.length > 0);
}

function walk(
  node: JsonValue | undefined,
  segments: readonly string[],
  index: number
): JsonValue | undefined {
  if (node === undefined || index === segments.length) {
    return node;
  }

  const segment = segments[index];

  if (isJsonArray(node)) {
    if (!INDEX_SEGMENT.test(segment)) {
      return undefined;
    }
    return walk(node[Number(segment)], segments, index + 1);
  }

  if (isJsonObject(node) && Object.prototype.hasOwnProperty.call(node, segment)) {
    return walk(node[segment], segments, index + 1);
  }

  return undefined;
}

/**
 * Resolve a path against a document. Undefined when any segment is absent.
 */
export function resolvePath(root: JsonValue, path: string): JsonValue | undefined {
  return walk(root, parsePath(path), 0);
}

export interface PathMatch {
  readonly path: string;
  readonly value: JsonValue;
}

/**
 * Try each path in order; the first present, non-null value wins
 */
export function firstPresent(
  root: JsonValue,
  paths: readonly string[]
): PathMatch | undefined {
  for (const path of paths) {
    const value = resolvePath(root, path);
    if (value !== undefined && value !== null) {
      return { path, value };
    }
  }
  return undefined;
}
