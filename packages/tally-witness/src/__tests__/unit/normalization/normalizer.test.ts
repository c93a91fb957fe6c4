/**
 * Canonical Normalizer Tests
 */

import { describe, it, expect } from 'vitest';
import { normalize } from '../../../normalization/normalizer.js';
import {
  DEFAULT_FIELD_MAP,
  IDENTITY_FIELD_MAP,
  mergeFieldMap,
} from '../../../normalization/field-map.js';
import { serializeSnapshot } from '../../../normalization/serialize.js';
import type { NormalizedSnapshot } from '../../../core/types/snapshot.js';
import { buildRaw, buildSnapshot, readFixture, SAMPLE_DOCUMENT } from '../../utils/builders.js';

function normalizeOk(...args: Parameters<typeof normalize>): NormalizedSnapshot {
  const result = normalize(...args);
  if (!result.success) {
    throw new Error(`expected success, got ${result.error.message}`);
  }
  return result.snapshot;
}

describe('normalize - results portal layout', () => {
  it('maps totals and positional candidates', () => {
    const snapshot = normalizeOk(buildRaw(SAMPLE_DOCUMENT), DEFAULT_FIELD_MAP);

    expect(snapshot).toEqual({
      source_id: 'test-source',
      election_level: 'national',
      geography: { code: '00', name: 'NATIONAL' },
      timestamp_source: null,
      timestamp_observed: '2025-11-30T20:00:05Z',
      totals: { valid_votes: 950, null_votes: 30, blank_votes: 20, total_votes: 1000 },
      candidates: [
        { slot: 0, votes: 500 },
        { slot: 1, votes: 450 },
      ],
      progress: {},
      metadata: { content_type: 'application/json' },
    });
  });

  it('reads geography, progress and candidate labels', () => {
    const snapshot = normalizeOk(
      buildRaw(readFixture('results-round-1.json')),
      DEFAULT_FIELD_MAP
    );

    expect(snapshot.election_level).toBe('presidential');
    expect(snapshot.geography).toEqual({ code: '01', name: 'NORTE' });
    expect(snapshot.timestamp_source).toBe('2025-11-30T20:00:00Z');
    expect(snapshot.progress).toEqual({
      processed_units: 100,
      total_units: 1000,
      registered_voters: 5000,
    });
    expect(snapshot.candidates).toEqual([
      { slot: 0, votes: 500, name: 'Candidate A', party: 'Party One' },
      { slot: 1, votes: 450, name: 'Candidate B', party: 'Party Two' },
    ]);
  });

  it('is deterministic regardless of source key order', () => {
    const reordered = {
      resultados: [{ votos: 500 }, { votos: 450 }],
      estadisticas: {
        distribucion_votos: { total: 1000, blancos: 20, nulos: 30, validos: 950 },
      },
    };

    const a = serializeSnapshot(normalizeOk(buildRaw(SAMPLE_DOCUMENT), DEFAULT_FIELD_MAP));
    const b = serializeSnapshot(normalizeOk(buildRaw(reordered), DEFAULT_FIELD_MAP));
    const c = serializeSnapshot(normalizeOk(buildRaw(SAMPLE_DOCUMENT), DEFAULT_FIELD_MAP));

    expect(b).toBe(a);
    expect(c).toBe(a);
  });

  it('strips a byte order mark', () => {
    const result = normalize(
      buildRaw(`\uFEFF${JSON.stringify(SAMPLE_DOCUMENT)}`),
      DEFAULT_FIELD_MAP
    );
    expect(result.success).toBe(true);
  });

  it('uses observedAt over retrieved_at', () => {
    const snapshot = normalizeOk(buildRaw(SAMPLE_DOCUMENT), DEFAULT_FIELD_MAP, {
      observedAt: '2025-11-30T21:00:00Z',
    });
    expect(snapshot.timestamp_observed).toBe('2025-11-30T21:00:00Z');
  });
});

describe('normalize - malformed values', () => {
  it('substitutes 0 and records coercion warnings', () => {
    const doc = {
      estadisticas: {
        distribucion_votos: { validos: 'n/a', nulos: 30, blancos: 20, total: 1000 },
      },
      resultados: [{ votos: '500' }, { votos: 'abc' }],
    };

    const snapshot = normalizeOk(buildRaw(doc), DEFAULT_FIELD_MAP);

    expect(snapshot.totals.valid_votes).toBe(0);
    expect(snapshot.candidates).toEqual([
      { slot: 0, votes: 500 },
      { slot: 1, votes: 0 },
    ]);
    expect(snapshot.metadata.coercion_warnings).toEqual([
      { field: 'totals.valid_votes', value: 'n/a', reason: 'not_numeric' },
      { field: 'candidates.1.votes', value: 'abc', reason: 'not_numeric' },
    ]);
  });

  it('records candidates without a vote count as missing', () => {
    const doc = { validos: 0, nulos: 0, blancos: 0, total_votes: 0, resultados: [{ nombre: 'X' }] };
    const snapshot = normalizeOk(buildRaw(doc), DEFAULT_FIELD_MAP);

    expect(snapshot.candidates).toEqual([{ slot: 0, votes: 0, name: 'X' }]);
    expect(snapshot.metadata.coercion_warnings).toEqual([
      { field: 'candidates.0.votes', value: 'undefined', reason: 'missing' },
    ]);
  });

  it('omits unreadable progress counters', () => {
    const doc = { ...SAMPLE_DOCUMENT, actas_procesadas: 'pending', actas_totales: 40 };
    const snapshot = normalizeOk(buildRaw(doc), DEFAULT_FIELD_MAP);

    expect(snapshot.progress).toEqual({ total_units: 40 });
    expect(snapshot.metadata.coercion_warnings).toEqual([
      { field: 'progress.processed_units', value: 'pending', reason: 'not_numeric' },
    ]);
  });

  it('derives total_votes when it is absent', () => {
    const doc = { validos: 10, nulos: 2, blancos: 1, resultados: [{ votos: 10 }] };
    const snapshot = normalizeOk(buildRaw(doc), DEFAULT_FIELD_MAP);

    expect(snapshot.totals).toEqual({
      valid_votes: 10,
      null_votes: 2,
      blank_votes: 1,
      total_votes: 13,
    });
    expect(snapshot.metadata.derived_fields).toEqual(['totals.total_votes']);
    expect(snapshot.metadata.missing_fields).toBeUndefined();
  });

  it('records missing totals', () => {
    const snapshot = normalizeOk(buildRaw({ resultados: [] }), DEFAULT_FIELD_MAP);

    expect(snapshot.totals).toEqual({
      valid_votes: 0,
      null_votes: 0,
      blank_votes: 0,
      total_votes: 0,
    });
    expect(snapshot.candidates).toEqual([]);
    expect(snapshot.metadata.missing_fields).toEqual([
      'totals.valid_votes',
      'totals.null_votes',
      'totals.blank_votes',
      'totals.total_votes',
    ]);
  });

  it('reassigns duplicate slots past the maximum', () => {
    const doc = {
      ...SAMPLE_DOCUMENT,
      resultados: [
        { posicion: 1, votos: 10 },
        { posicion: 1, votos: 20 },
        { posicion: 0, votos: 5 },
      ],
    };
    const snapshot = normalizeOk(buildRaw(doc), DEFAULT_FIELD_MAP);

    expect(snapshot.candidates).toEqual([
      { slot: 1, votes: 10 },
      { slot: 2, votes: 20 },
      { slot: 0, votes: 5 },
    ]);
    expect(snapshot.metadata.coercion_warnings).toEqual([
      { field: 'candidates.1.slot', value: '1', reason: 'duplicate_slot' },
    ]);
  });
});

describe('normalize - candidate containers', () => {
  it('unwraps a nested candidate array', () => {
    const doc = { ...SAMPLE_DOCUMENT, resultados: undefined, candidatos: { candidatos: [7, 8] } };
    const snapshot = normalizeOk(buildRaw(doc), DEFAULT_FIELD_MAP);

    expect(snapshot.candidates).toEqual([
      { slot: 0, votes: 7 },
      { slot: 1, votes: 8 },
    ]);
  });

  it('reads objects keyed by slot in numeric order', () => {
    const doc = { ...SAMPLE_DOCUMENT, resultados: { '10': 30, '2': 20, '0': 10 } };
    const snapshot = normalizeOk(buildRaw(doc), DEFAULT_FIELD_MAP);

    expect(snapshot.candidates).toEqual([
      { slot: 0, votes: 10 },
      { slot: 2, votes: 20 },
      { slot: 10, votes: 30 },
    ]);
  });

  it('records the candidate count against the expected one', () => {
    const snapshot = normalizeOk(buildRaw(SAMPLE_DOCUMENT), DEFAULT_FIELD_MAP, {
      candidateCount: 3,
    });

    expect(snapshot.metadata).toEqual({
      content_type: 'application/json',
      candidate_count_expected: 3,
      candidate_count_observed: 2,
      candidate_count_warning: 'fewer_candidates',
    });
  });

  it('omits the candidate count warning when counts agree', () => {
    const snapshot = normalizeOk(buildRaw(SAMPLE_DOCUMENT), DEFAULT_FIELD_MAP, {
      candidateCount: 2,
    });
    expect(snapshot.metadata.candidate_count_warning).toBeUndefined();
  });
});

describe('normalize - defaults', () => {
  it('falls back to source defaults for geography and level', () => {
    const snapshot = normalizeOk(buildRaw(SAMPLE_DOCUMENT), DEFAULT_FIELD_MAP, {
      defaults: { geography: { code: '05', name: 'SUR' }, electionLevel: 'municipal' },
    });

    expect(snapshot.geography).toEqual({ code: '05', name: 'SUR' });
    expect(snapshot.election_level).toBe('municipal');
  });

  it('prefers values from the document', () => {
    const snapshot = normalizeOk(buildRaw(readFixture('results-round-1.json')), DEFAULT_FIELD_MAP, {
      defaults: { geography: { code: '05', name: 'SUR' }, electionLevel: 'municipal' },
    });

    expect(snapshot.geography).toEqual({ code: '01', name: 'NORTE' });
    expect(snapshot.election_level).toBe('presidential');
  });
});

describe('normalize - failures', () => {
  it('fails on a body that is not JSON', () => {
    const result = normalize(buildRaw('<html>busy</html>'), DEFAULT_FIELD_MAP);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe('UnparsableDocument');
    }
  });

  it('fails on a top-level value that is not an object', () => {
    const result = normalize(buildRaw('[1,2]'), DEFAULT_FIELD_MAP);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe(
        'Unparsable document: top-level value is not a JSON object'
      );
    }
  });

  it('lists every missing required key', () => {
    const fieldMap = mergeFieldMap(DEFAULT_FIELD_MAP, {
      required_keys: ['estadisticas.inscritos', 'fecha_actualizacion'],
    });
    const result = normalize(buildRaw(SAMPLE_DOCUMENT), fieldMap);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe('MissingRequiredKey');
      expect(result.error.keys).toEqual(['estadisticas.inscritos', 'fecha_actualizacion']);
      expect(result.error.message).toBe(
        'Missing required keys: estadisticas.inscritos, fecha_actualizacion'
      );
    }
  });

  it('fails when no candidate root resolves', () => {
    const result = normalize(buildRaw({ validos: 1 }), DEFAULT_FIELD_MAP);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe('CandidateRootNotFound');
      expect(result.error.keys).toEqual(DEFAULT_FIELD_MAP.candidate_roots);
    }
  });

  it('accepts a missing candidate root when allowed', () => {
    const fieldMap = mergeFieldMap(DEFAULT_FIELD_MAP, { allow_missing_candidates: true });
    const snapshot = normalizeOk(
      buildRaw({ validos: 1, nulos: 0, blancos: 0, total_votes: 1 }),
      fieldMap
    );

    expect(snapshot.candidates).toEqual([]);
    expect(snapshot.metadata.missing_fields).toEqual(['candidates']);
  });
});

describe('normalize - identity map', () => {
  it('reproduces an already-normalized snapshot byte for byte', () => {
    const original = buildSnapshot({
      candidates: [
        { slot: 0, votes: 500, name: 'A' },
        { slot: 3, votes: 450, party: 'P', candidate_id: 'c-3' },
      ],
      progress: { processed_units: 10, total_units: 20 },
      metadata: { content_type: 'application/json', note: 'round 1' },
    });

    const raw = buildRaw(serializeSnapshot(original), {
      retrieved_at: original.timestamp_observed,
      content_type: 'application/json',
    });
    const roundTripped = normalizeOk(raw, IDENTITY_FIELD_MAP);

    expect(roundTripped).toEqual(original);
    expect(serializeSnapshot(roundTripped)).toBe(serializeSnapshot(original));
  });
});
