/**
 * Canonical Normalizer
 *
 * Maps one RawDocument onto exactly one NormalizedSnapshot using a field map.
 *
 * DETERMINISM: no clock, no randomness, no host-dependent formatting. The
 * same raw document and field map always produce the same canonical bytes.
 *
 * Malformed values never discard a snapshot: they become 0 (or are omitted,
 * for optional counters) and are recorded in metadata. Only a document that
 * is not JSON, a missing required key, or a missing candidate array fail.
 */

import {
  isJsonArray,
  isJsonObject,
  isJsonValue,
  type JsonObject,
  type JsonValue,
} from '../core/types/json.js';
import type {
  CandidateResult,
  CoercionWarning,
  Geography,
  NormalizedSnapshot,
  ProgressCounters,
  RawDocument,
  Totals,
} from '../core/types/snapshot.js';
import { NormalizationError } from '../core/errors.js';
import { DEFAULT_ELECTION_LEVEL, DEFAULT_GEOGRAPHY } from '../core/constants.js';
import { coerceInteger, describeValue } from '../core/utils/coerce.js';
import { firstPresent, resolvePath } from '../core/utils/json-path.js';
import type { FieldMapConfig, PathList } from './field-map.js';

// ============================================================================
// Types
// ============================================================================

export interface NormalizeOptions {
  /** Overrides raw.retrieved_at as timestamp_observed */
  readonly observedAt?: string;
  /** Expected number of candidates; mismatches become a metadata warning */
  readonly candidateCount?: number;
  /** Source-level fallbacks for fields the document does not carry */
  readonly defaults?: {
    readonly geography?: Geography;
    readonly electionLevel?: string;
  };
}

export type NormalizeResult =
  | { readonly success: true; readonly snapshot: NormalizedSnapshot }
  | { readonly success: false; readonly error: NormalizationError };

/**
 * Accumulates warnings while one document is being mapped
 */
interface NormalizationContext {
  readonly warnings: CoercionWarning[];
  readonly missing: string[];
  readonly derived: string[];
}

const UNWRAP_KEYS = ['candidates', 'candidatos'] as const;
const INDEX_KEY = /^\d+$/;

// ============================================================================
// Scalar extraction
// ============================================================================

function readInteger(
  doc: JsonValue,
  field: string,
  paths: PathList,
  ctx: NormalizationContext
): number | undefined {
  const match = firstPresent(doc, paths);
  if (!match) {
    return undefined;
  }

  const outcome = coerceInteger(match.value);
  if (!outcome.ok) {
    ctx.warnings.push({ field, value: describeValue(match.value), reason: outcome.reason });
    return 0;
  }
  return outcome.value;
}

function readText(doc: JsonValue, paths: PathList): string | undefined {
  for (const path of paths) {
    const value = resolvePath(doc, path);
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
    if (typeof value === 'number' && Number.isFinite(value)) {
      return String(value);
    }
  }
  return undefined;
}

function readTotals(doc: JsonValue, fieldMap: FieldMapConfig, ctx: NormalizationContext): Totals {
  const read = (key: keyof Totals): number | undefined =>
    readInteger(doc, `totals.${key}`, fieldMap.totals[key], ctx);

  const valid = read('valid_votes');
  const nulls = read('null_votes');
  const blank = read('blank_votes');
  let total = read('total_votes');

  for (const [key, value] of [
    ['valid_votes', valid],
    ['null_votes', nulls],
    ['blank_votes', blank],
  ] as const) {
    if (value === undefined) {
      ctx.missing.push(`totals.${key}`);
    }
  }

  if (total === undefined) {
    const sum = (valid ?? 0) + (nulls ?? 0) + (blank ?? 0);
    if (sum > 0) {
      total = sum;
      ctx.derived.push('totals.total_votes');
    } else {
      ctx.missing.push('totals.total_votes');
    }
  }

  return {
    valid_votes: valid ?? 0,
    null_votes: nulls ?? 0,
    blank_votes: blank ?? 0,
    total_votes: total ?? 0,
  };
}

function readProgress(
  doc: JsonValue,
  fieldMap: FieldMapConfig,
  ctx: NormalizationContext
): ProgressCounters {
  const progress: { -readonly [K in keyof ProgressCounters]: ProgressCounters[K] } = {};

  for (const key of ['processed_units', 'total_units', 'registered_voters'] as const) {
    const match = firstPresent(doc, fieldMap.progress[key]);
    if (!match) continue;

    const outcome = coerceInteger(match.value);
    if (outcome.ok) {
      progress[key] = outcome.value;
    } else {
      // Optional counters are omitted rather than zeroed; 0 would feed rules
      ctx.warnings.push({
        field: `progress.${key}`,
        value: describeValue(match.value),
        reason: outcome.reason,
      });
    }
  }

  return progress;
}

// ============================================================================
// Candidates
// ============================================================================

interface CandidateEntry {
  readonly element: JsonValue;
  /** Slot implied by the container (array position or numeric object key) */
  readonly implicitSlot: number;
}

function locateCandidates(
  doc: JsonValue,
  roots: PathList
): readonly CandidateEntry[] | undefined {
  for (const root of roots) {
    const resolved = resolvePath(doc, root);
    const value = isJsonObject(resolved) ? unwrapCandidates(resolved) : resolved;

    if (isJsonArray(value)) {
      return value.map((element, index) => ({ element, implicitSlot: index }));
    }

    if (isJsonObject(value)) {
      const keyed = Object.keys(value)
        .filter((key) => INDEX_KEY.test(key))
        .map((key) => ({ element: getMember(value, key) ?? null, implicitSlot: Number(key) }))
        .sort((a, b) => a.implicitSlot - b.implicitSlot);
      if (keyed.length > 0) {
        return keyed;
      }
    }
  }
  return undefined;
}

function getMember(obj: JsonObject, key: string): JsonValue | undefined {
  return Object.prototype.hasOwnProperty.call(obj, key) ? obj[key] : undefined;
}

/**
 * `{ "candidatos": [...] }` wrappers resolve to the inner array
 */
function unwrapCandidates(obj: JsonObject): JsonValue {
  for (const key of UNWRAP_KEYS) {
    const inner = getMember(obj, key);
    if (isJsonArray(inner)) {
      return inner;
    }
  }
  return obj;
}

function readCandidate(
  entry: CandidateEntry,
  position: number,
  fieldMap: FieldMapConfig,
  ctx: NormalizationContext
): CandidateResult {
  const { element, implicitSlot } = entry;
  const fields = fieldMap.candidate_fields;
  const label = `candidates.${position}`;

  // Bare values ("500", 500) are vote counts at the implicit slot
  if (!isJsonObject(element)) {
    const outcome = coerceInteger(element);
    if (!outcome.ok) {
      ctx.warnings.push({
        field: `${label}.votes`,
        value: describeValue(element),
        reason: element === null ? 'missing' : outcome.reason,
      });
    }
    return { slot: implicitSlot, votes: outcome.ok ? outcome.value : 0 };
  }

  let slot = implicitSlot;
  const slotMatch = firstPresent(element, fields.slot);
  if (slotMatch) {
    const outcome = coerceInteger(slotMatch.value);
    if (outcome.ok) {
      slot = outcome.value;
    } else {
      ctx.warnings.push({
        field: `${label}.slot`,
        value: describeValue(slotMatch.value),
        reason: outcome.reason,
      });
    }
  }

  let votes = 0;
  const votesMatch = firstPresent(element, fields.votes);
  if (!votesMatch) {
    ctx.warnings.push({ field: `${label}.votes`, value: 'undefined', reason: 'missing' });
  } else {
    const outcome = coerceInteger(votesMatch.value);
    if (outcome.ok) {
      votes = outcome.value;
    } else {
      ctx.warnings.push({
        field: `${label}.votes`,
        value: describeValue(votesMatch.value),
        reason: outcome.reason,
      });
    }
  }

  const candidateId = readText(element, fields.candidate_id);
  const name = readText(element, fields.name);
  const party = readText(element, fields.party);

  return {
    slot,
    votes,
    ...(candidateId !== undefined ? { candidate_id: candidateId } : {}),
    ...(name !== undefined ? { name } : {}),
    ...(party !== undefined ? { party } : {}),
  };
}

/**
 * Reassign duplicate slots past the current maximum. Slot identity must be
 * unique for per-slot comparisons to be meaningful.
 */
function dedupeSlots(
  candidates: readonly CandidateResult[],
  ctx: NormalizationContext
): CandidateResult[] {
  const seen = new Set<number>();
  let nextFree = candidates.reduce((max, c) => Math.max(max, c.slot), -1) + 1;

  return candidates.map((candidate, position) => {
    if (!seen.has(candidate.slot)) {
      seen.add(candidate.slot);
      return candidate;
    }

    const reassigned = nextFree;
    nextFree += 1;
    seen.add(reassigned);
    ctx.warnings.push({
      field: `candidates.${position}.slot`,
      value: String(candidate.slot),
      reason: 'duplicate_slot',
    });
    return { ...candidate, slot: reassigned };
  });
}

// ============================================================================
// Document
// ============================================================================

function parseBody(body: string): JsonObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body.replace(/^\uFEFF/, ''));
  } catch (error) {
    throw NormalizationError.unparsable(error instanceof Error ? error.message : String(error));
  }

  if (!isJsonValue(parsed) || !isJsonObject(parsed)) {
    throw NormalizationError.unparsable('top-level value is not a JSON object');
  }
  return parsed;
}

function readMetadata(
  doc: JsonObject,
  raw: RawDocument,
  fieldMap: FieldMapConfig
): Record<string, unknown> {
  const metadata: Record<string, unknown> = {};

  for (const root of fieldMap.metadata_roots) {
    const value = resolvePath(doc, root);
    if (isJsonObject(value)) {
      Object.assign(metadata, value);
    }
  }

  for (const [target, paths] of Object.entries(fieldMap.metadata)) {
    const match = firstPresent(doc, paths);
    if (match) {
      metadata[target] = match.value;
    }
  }

  metadata.content_type = raw.content_type;
  return metadata;
}

function mapDocument(
  raw: RawDocument,
  fieldMap: FieldMapConfig,
  options: NormalizeOptions
): NormalizedSnapshot {
  const doc = parseBody(raw.body);

  const missingRequired = fieldMap.required_keys.filter((path) => {
    const value = resolvePath(doc, path);
    return value === undefined || value === null;
  });
  if (missingRequired.length > 0) {
    throw NormalizationError.missingRequiredKeys(missingRequired);
  }

  const ctx: NormalizationContext = { warnings: [], missing: [], derived: [] };

  const totals = readTotals(doc, fieldMap, ctx);
  const progress = readProgress(doc, fieldMap, ctx);

  const entries = locateCandidates(doc, fieldMap.candidate_roots);
  let candidates: CandidateResult[] = [];
  if (entries) {
    candidates = dedupeSlots(
      entries.map((entry, position) => readCandidate(entry, position, fieldMap, ctx)),
      ctx
    );
  } else if (fieldMap.candidate_roots.length > 0) {
    if (!fieldMap.allow_missing_candidates) {
      throw NormalizationError.candidateRootNotFound(fieldMap.candidate_roots);
    }
    ctx.missing.push('candidates');
  }

  const defaults = options.defaults ?? {};
  const geography: Geography = {
    code: readText(doc, fieldMap.geography.code) ?? defaults.geography?.code ?? DEFAULT_GEOGRAPHY.code,
    name: readText(doc, fieldMap.geography.name) ?? defaults.geography?.name ?? DEFAULT_GEOGRAPHY.name,
  };

  const metadata = readMetadata(doc, raw, fieldMap);
  if (ctx.warnings.length > 0) metadata.coercion_warnings = ctx.warnings;
  if (ctx.missing.length > 0) metadata.missing_fields = ctx.missing;
  if (ctx.derived.length > 0) metadata.derived_fields = ctx.derived;

  if (options.candidateCount !== undefined) {
    metadata.candidate_count_expected = options.candidateCount;
    metadata.candidate_count_observed = candidates.length;
    if (candidates.length !== options.candidateCount) {
      metadata.candidate_count_warning =
        candidates.length < options.candidateCount ? 'fewer_candidates' : 'more_candidates';
    }
  }

  return {
    source_id: raw.source_id,
    election_level:
      readText(doc, fieldMap.election_level) ?? defaults.electionLevel ?? DEFAULT_ELECTION_LEVEL,
    geography,
    timestamp_source: readText(doc, fieldMap.timestamp_source) ?? null,
    timestamp_observed: options.observedAt ?? raw.retrieved_at,
    totals,
    candidates,
    progress,
    metadata,
  };
}

/**
 * Normalize a raw document
 *
 * @example
 * ```typescript
 * const result = normalize(raw, DEFAULT_FIELD_MAP, { candidateCount: 2 });
 * if (result.success) {
 *   console.log(serializeSnapshot(result.snapshot));
 * }
 * ```
 */
export function normalize(
  raw: RawDocument,
  fieldMap: FieldMapConfig,
  options: NormalizeOptions = {}
): NormalizeResult {
  try {
    return { success: true, snapshot: mapDocument(raw, fieldMap, options) };
  } catch (error) {
    if (error instanceof NormalizationError) {
      return { success: false, error };
    }
    throw error;
  }
}
