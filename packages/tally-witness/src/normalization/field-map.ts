/**
 * Field Map Configuration
 *
 * A field map declares, per canonical field, an ordered list of dot-delimited
 * JSON paths. The first present (non-null) value wins. Source documents differ
 * in layout across sources and across publication rounds of the same source,
 * so every field carries alternates.
 */

import { z } from 'zod';
import { isValidPath } from '../core/utils/json-path.js';

// ============================================================================
// Types
// ============================================================================

export type PathList = readonly string[];

export interface FieldMapConfig {
  readonly totals: {
    readonly valid_votes: PathList;
    readonly null_votes: PathList;
    readonly blank_votes: PathList;
    readonly total_votes: PathList;
  };
  readonly progress: {
    readonly processed_units: PathList;
    readonly total_units: PathList;
    readonly registered_voters: PathList;
  };
  readonly timestamp_source: PathList;
  readonly election_level: PathList;
  readonly geography: {
    readonly code: PathList;
    readonly name: PathList;
  };
  /** Candidate array locations, tried in order */
  readonly candidate_roots: PathList;
  /** Paths relative to each candidate element */
  readonly candidate_fields: {
    readonly slot: PathList;
    readonly votes: PathList;
    readonly candidate_id: PathList;
    readonly name: PathList;
    readonly party: PathList;
  };
  /** Extra metadata: target key -> paths, copied verbatim */
  readonly metadata: Readonly<Record<string, PathList>>;
  /** Objects whose members are merged into metadata as-is */
  readonly metadata_roots: PathList;
  /** Paths that must resolve, or normalization fails */
  readonly required_keys: PathList;
  /** Accept documents without any candidate array */
  readonly allow_missing_candidates: boolean;
}

// ============================================================================
// Built-in maps
// ============================================================================

/**
 * Default map covering the layouts published by results portals
 */
export const DEFAULT_FIELD_MAP: FieldMapConfig = {
  totals: {
    valid_votes: [
      'estadisticas.distribucion_votos.validos',
      'valid_votes',
      'votos_validos',
      'validos',
    ],
    null_votes: [
      'estadisticas.distribucion_votos.nulos',
      'null_votes',
      'votos_nulos',
      'nulos',
    ],
    blank_votes: [
      'estadisticas.distribucion_votos.blancos',
      'blank_votes',
      'votos_blancos',
      'blancos',
    ],
    total_votes: [
      'estadisticas.distribucion_votos.total',
      'total_votes',
      'total_votos',
      'votos_emitidos',
    ],
  },
  progress: {
    processed_units: [
      'estadisticas.actas.procesadas',
      'actas.procesadas',
      'actas_procesadas',
      'processed_units',
    ],
    total_units: [
      'estadisticas.actas.totales',
      'actas.totales',
      'actas_totales',
      'total_units',
    ],
    registered_voters: [
      'estadisticas.inscritos',
      'registered_voters',
      'inscritos',
      'padron',
    ],
  },
  timestamp_source: ['fecha_actualizacion', 'ultima_actualizacion', 'timestamp', 'updated_at'],
  election_level: ['nivel', 'election_level', 'scope'],
  geography: {
    code: ['departamento.codigo', 'department_code', 'codigo_departamento'],
    name: ['departamento.nombre', 'departamento', 'department'],
  },
  candidate_roots: ['candidatos', 'candidates', 'resultados', 'partidos'],
  candidate_fields: {
    slot: ['posicion', 'orden', 'slot'],
    votes: ['votos', 'votes', 'total'],
    candidate_id: ['id', 'candidate_id'],
    name: ['candidato', 'nombre', 'name'],
    party: ['partido', 'party'],
  },
  metadata: {},
  metadata_roots: [],
  required_keys: [],
  allow_missing_candidates: false,
};

/**
 * Map that reads an already-normalized snapshot back into itself
 */
export const IDENTITY_FIELD_MAP: FieldMapConfig = {
  totals: {
    valid_votes: ['totals.valid_votes'],
    null_votes: ['totals.null_votes'],
    blank_votes: ['totals.blank_votes'],
    total_votes: ['totals.total_votes'],
  },
  progress: {
    processed_units: ['progress.processed_units'],
    total_units: ['progress.total_units'],
    registered_voters: ['progress.registered_voters'],
  },
  timestamp_source: ['timestamp_source'],
  election_level: ['election_level'],
  geography: {
    code: ['geography.code'],
    name: ['geography.name'],
  },
  candidate_roots: ['candidates'],
  candidate_fields: {
    slot: ['slot'],
    votes: ['votes'],
    candidate_id: ['candidate_id'],
    name: ['name'],
    party: ['party'],
  },
  metadata: {},
  metadata_roots: ['metadata'],
  required_keys: [],
  allow_missing_candidates: true,
};

// ============================================================================
// Validation
// ============================================================================

const PathSchema = z
  .string()
  .refine((path) => isValidPath(path), { message: 'Invalid JSON path (empty segment)' });

const PathListSchema = z.array(PathSchema);

/**
 * Partial field map as written in configuration files. Every list given
 * replaces the default list for that field.
 */
export const FieldMapOverrideSchema = z
  .object({
    totals: z
      .object({
        valid_votes: PathListSchema,
        null_votes: PathListSchema,
        blank_votes: PathListSchema,
        total_votes: PathListSchema,
      })
      .partial()
      .strict(),
    progress: z
      .object({
        processed_units: PathListSchema,
        total_units: PathListSchema,
        registered_voters: PathListSchema,
      })
      .partial()
      .strict(),
    timestamp_source: PathListSchema,
    election_level: PathListSchema,
    geography: z
      .object({ code: PathListSchema, name: PathListSchema })
      .partial()
      .strict(),
    candidate_roots: PathListSchema,
    candidate_fields: z
      .object({
        slot: PathListSchema,
        votes: PathListSchema.min(1, 'votes needs at least one path'),
        candidate_id: PathListSchema,
        name: PathListSchema,
        party: PathListSchema,
      })
      .partial()
      .strict(),
    metadata: z.record(PathListSchema),
    metadata_roots: PathListSchema,
    required_keys: PathListSchema,
    allow_missing_candidates: z.boolean(),
  })
  .partial()
  .strict();

export type FieldMapOverride = z.infer<typeof FieldMapOverrideSchema>;

/**
 * Merge an override over a base map, one path list at a time
 */
export function mergeFieldMap(
  base: FieldMapConfig,
  override: FieldMapOverride | undefined
): FieldMapConfig {
  if (!override) {
    return base;
  }

  return {
    totals: { ...base.totals, ...override.totals },
    progress: { ...base.progress, ...override.progress },
    timestamp_source: override.timestamp_source ?? base.timestamp_source,
    election_level: override.election_level ?? base.election_level,
    geography: { ...base.geography, ...override.geography },
    candidate_roots: override.candidate_roots ?? base.candidate_roots,
    candidate_fields: { ...base.candidate_fields, ...override.candidate_fields },
    metadata: { ...base.metadata, ...override.metadata },
    metadata_roots: override.metadata_roots ?? base.metadata_roots,
    required_keys: override.required_keys ?? base.required_keys,
    allow_missing_candidates:
      override.allow_missing_candidates ?? base.allow_missing_candidates,
  };
}
