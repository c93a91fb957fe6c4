/**
 * tally-witness CLI Configuration Management
 *
 * Loads configuration from .tally-witnessrc (YAML or JSON) with environment
 * variable overrides and defaults, validates it with zod and resolves it into
 * the settings the pipeline is constructed with.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (TALLY_WITNESS_*)
 * 3. Config file (.tally-witnessrc or --config path)
 * 4. Default values
 *
 * Any invalid value is a ConfigurationError listing every issue. Nothing
 * falls back silently.
 *
 * @module cli/lib/config
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, resolve, dirname } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z, type ZodIssue } from 'zod';
import { ConfigurationError } from '../../core/errors.js';
import { isLogLevel, type LogLevel } from '../../core/utils/logger.js';
import {
  DEFAULT_FIELD_MAP,
  FieldMapOverrideSchema,
  mergeFieldMap,
  type FieldMapConfig,
} from '../../normalization/field-map.js';
import { RuleConfigSchema } from '../../rules/config.js';
import type { PipelineSettings, SourceSettings } from '../../services/evidence-pipeline.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Resolved, absolute paths
 */
export interface PathsConfig {
  /** Root of raw/ and normalized/ */
  readonly data: string;
  /** SQLite database holding the hash chains */
  readonly chainDb: string;
  /** Directory for audit reports */
  readonly reports: string;
}

/**
 * Full CLI configuration
 */
export interface CLIConfig {
  readonly version: 1;
  readonly paths: PathsConfig;
  readonly pipeline: PipelineSettings;
  readonly logging: { readonly level: LogLevel };

  // Runtime overrides (from CLI flags)
  /** Enable verbose output */
  readonly verbose: boolean;
  /** Output as JSON */
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

// ============================================================================
// Config File Schema
// ============================================================================

const GeographySchema = z.object({ code: z.string().min(1), name: z.string().min(1) }).strict();

const SourceSchema = z
  .object({
    geography: GeographySchema.optional(),
    election_level: z.string().min(1).optional(),
    field_map: FieldMapOverrideSchema.optional(),
  })
  .strict();

export const ConfigFileSchema = z
  .object({
    version: z.literal(1).default(1),
    paths: z
      .object({
        data: z.string().min(1),
        chain_db: z.string().min(1),
        reports: z.string().min(1),
      })
      .partial()
      .strict()
      .default({}),
    candidate_count: z.number().int().positive().optional(),
    required_keys: z.array(z.string().min(1)).optional(),
    field_map: FieldMapOverrideSchema.optional(),
    sources: z.record(SourceSchema).default({}),
    /** global_enabled, rule_set_version and one block per rule id */
    rules: z.record(z.unknown()).default({}),
    logging: z
      .object({ level: z.enum(['debug', 'info', 'warn', 'error']) })
      .partial()
      .strict()
      .default({}),
  })
  .strict();

export type ConfigFile = z.output<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

/** chain_db and reports default to these names inside the data directory */
export const DEFAULT_PATHS = {
  data: './data',
  chain_db: 'chain.db',
  reports: 'reports',
} as const;

/**
 * Resolve the storage paths
 *
 * Flags and environment variables resolve against the working directory, file
 * values against the config file's directory. A chain database or reports
 * directory given nowhere follows the resolved data directory.
 */
function resolvePaths(
  file: { readonly data?: string; readonly chain_db?: string; readonly reports?: string },
  overrides: LoadConfigOptions['overrides'],
  env: Env,
  cwd: string,
  baseDir: string
): PathsConfig {
  const pick = (flag: string | undefined, envName: string, fromFile: string | undefined) => {
    const given = flag ?? envVar(env, envName);
    if (given !== undefined) return resolve(cwd, given);
    return fromFile !== undefined ? resolve(baseDir, fromFile) : undefined;
  };

  const data = pick(overrides?.dataDir, 'DATA_DIR', file.data) ?? resolve(baseDir, DEFAULT_PATHS.data);
  return {
    data,
    chainDb: pick(overrides?.chainDb, 'CHAIN_DB', file.chain_db) ?? join(data, DEFAULT_PATHS.chain_db),
    reports: pick(undefined, 'REPORTS_DIR', file.reports) ?? join(data, DEFAULT_PATHS.reports),
  };
}

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
const CONFIG_FILE_NAMES = [
  '.tally-witnessrc',
  '.tally-witnessrc.yaml',
  '.tally-witnessrc.yml',
  '.tally-witnessrc.json',
];

const ENV_PREFIX = 'TALLY_WITNESS_';

/**
 * Find config file in a directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

function formatIssues(issues: readonly ZodIssue[]): string[] {
  return issues.map((issue) => `${issue.path.map(String).join('.') || '<root>'}: ${issue.message}`);
}

/**
 * Read a config file (YAML also covers plain JSON)
 */
function readConfigFile(filePath: string): unknown {
  const content = readFileSync(filePath, 'utf-8');
  try {
    const parsed: unknown = filePath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
    return parsed ?? {};
  } catch (error) {
    throw new ConfigurationError(`Cannot parse config file ${filePath}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }
}

type Env = Readonly<Record<string, string | undefined>>;

function envVar(env: Env, name: string): string | undefined {
  const value = env[`${ENV_PREFIX}${name}`];
  return value === undefined || value === '' ? undefined : value;
}

function envBool(env: Env, name: string, issues: string[]): boolean | undefined {
  const value = envVar(env, name);
  if (value === undefined) return undefined;
  const lowered = value.toLowerCase();
  if (lowered === 'true' || lowered === '1') return true;
  if (lowered === 'false' || lowered === '0') return false;
  issues.push(`${ENV_PREFIX}${name}: expected true/false, got "${value}"`);
  return undefined;
}

function envPositiveInt(env: Env, name: string, issues: string[]): number | undefined {
  const value = envVar(env, name);
  if (value === undefined) return undefined;
  const num = Number(value);
  if (!Number.isInteger(num) || num <= 0) {
    issues.push(`${ENV_PREFIX}${name}: expected a positive integer, got "${value}"`);
    return undefined;
  }
  return num;
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  /** Directory to search from (default: process.cwd()) */
  readonly cwd?: string;
  /** Environment (default: process.env) */
  readonly env?: Env;
  /** CLI flag overrides */
  readonly overrides?: {
    readonly verbose?: boolean;
    readonly json?: boolean;
    readonly dataDir?: string;
    readonly chainDb?: string;
  };
}

function resolveConfigPath(options: LoadConfigOptions, env: Env, cwd: string): string | null {
  const explicit = options.configPath ?? envVar(env, 'CONFIG');
  if (explicit !== undefined) {
    const configPath = resolve(cwd, explicit);
    if (!existsSync(configPath)) {
      throw new ConfigurationError(`Config file not found: ${configPath}`);
    }
    return configPath;
  }
  return findConfigFile(cwd);
}

/**
 * Split the flat `rules` block into the rule config layout
 */
function buildRules(
  block: Readonly<Record<string, unknown>>,
  globalEnabled: boolean | undefined,
  issues: string[]
): PipelineSettings['rules'] | null {
  const { global_enabled, rule_set_version, ...perRule } = block;
  const result = RuleConfigSchema.safeParse({
    global_enabled: globalEnabled ?? global_enabled,
    rule_set_version,
    rules: perRule,
  });

  if (!result.success) {
    // Per-rule issues carry a leading "rules" segment from the nested layout
    issues.push(
      ...result.error.issues.map((issue) => {
        const path = issue.path[0] === 'rules' ? issue.path.slice(1) : issue.path;
        return `rules.${path.map(String).join('.')}: ${issue.message}`;
      })
    );
    return null;
  }
  return result.data;
}

function buildSources(
  sources: ConfigFile['sources'],
  fieldMap: FieldMapConfig
): Record<string, SourceSettings> {
  return Object.fromEntries(
    Object.entries(sources).map(([sourceId, source]) => [
      sourceId,
      {
        geography: source.geography,
        electionLevel: source.election_level,
        fieldMap: mergeFieldMap(fieldMap, source.field_map),
      },
    ])
  );
}

/**
 * Load, merge and validate configuration from all sources
 *
 * @throws ConfigurationError listing every invalid value
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  const configPath = resolveConfigPath(options, env, cwd);
  const rawFile = configPath === null ? {} : readConfigFile(configPath);

  const parsed = ConfigFileSchema.safeParse(rawFile);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid configuration${configPath ? ` in ${configPath}` : ''}`,
      formatIssues(parsed.error.issues)
    );
  }
  const file = parsed.data;

  const issues: string[] = [];
  const envCandidateCount = envPositiveInt(env, 'CANDIDATE_COUNT', issues);
  const envRulesEnabled = envBool(env, 'RULES_GLOBAL_ENABLED', issues);
  const envVerbose = envBool(env, 'VERBOSE', issues);
  const envJson = envBool(env, 'JSON', issues);

  const envLogLevel = envVar(env, 'LOG_LEVEL');
  if (envLogLevel !== undefined && !isLogLevel(envLogLevel)) {
    issues.push(`${ENV_PREFIX}LOG_LEVEL: expected debug|info|warn|error, got "${envLogLevel}"`);
  }

  const rules = buildRules(file.rules, envRulesEnabled, issues);

  if (issues.length > 0 || rules === null) {
    throw new ConfigurationError('Invalid configuration', issues);
  }

  const baseDir = configPath ? dirname(configPath) : cwd;
  const fieldMap = mergeFieldMap(
    mergeFieldMap(DEFAULT_FIELD_MAP, file.field_map),
    file.required_keys !== undefined ? { required_keys: file.required_keys } : undefined
  );

  const verbose = options.overrides?.verbose ?? envVerbose ?? false;
  let level: LogLevel = file.logging.level ?? 'info';
  if (envLogLevel !== undefined && isLogLevel(envLogLevel)) {
    level = envLogLevel;
  }
  if (verbose) {
    level = 'debug';
  }

  const paths = resolvePaths(file.paths, options.overrides, env, cwd, baseDir);

  return {
    version: file.version,
    paths,
    pipeline: {
      fieldMap,
      sources: buildSources(file.sources, fieldMap),
      candidateCount: envCandidateCount ?? file.candidate_count,
      rules,
    },
    logging: { level },
    verbose,
    json: options.overrides?.json ?? envJson ?? false,
    configPath,
  };
}
