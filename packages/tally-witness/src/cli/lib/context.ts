/**
 * Command context: resolved configuration, loggers and the pipeline factory
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { ChainIntegrityError, ConfigurationError } from '../../core/errors.js';
import { createLogger, type Logger } from '../../core/utils/logger.js';
import { FileSnapshotStore } from '../../persistence/file-store.js';
import { SqliteHashChainStore } from '../../persistence/hash-chain-store.js';
import { EvidencePipeline } from '../../services/evidence-pipeline.js';
import type { CLIConfig } from './config.js';
import { EXIT_CODES, type ExitCode } from './exit-codes.js';
import type { CLILogger } from './logger.js';

export interface CommandContext {
  readonly config: CLIConfig;
  readonly logger: CLILogger;
  /** Logger handed to core services */
  readonly coreLogger: Logger;
}

export function createCoreLogger(config: CLIConfig): Logger {
  return createLogger({
    level: config.logging.level,
    pretty: !config.json,
    stderr: true,
  });
}

/**
 * Open stores and build the pipeline; the caller closes it
 */
export function openPipeline(context: CommandContext): EvidencePipeline {
  const { config } = context;
  mkdirSync(dirname(config.paths.chainDb), { recursive: true });

  return new EvidencePipeline({
    settings: config.pipeline,
    snapshotStore: new FileSnapshotStore(config.paths.data, {
      reportsDir: config.paths.reports,
    }),
    chainStore: new SqliteHashChainStore(config.paths.chainDb),
    logger: context.coreLogger,
  });
}

/**
 * Map an error escaping a command to its exit code
 */
export function exitCodeForError(error: unknown): ExitCode {
  if (error instanceof ConfigurationError) {
    return error.kind === 'NoEnabledRules' ? EXIT_CODES.NO_ENABLED_RULES : EXIT_CODES.CONFIG_ERROR;
  }
  if (error instanceof ChainIntegrityError) {
    return EXIT_CODES.CHAIN_INTEGRITY_ERROR;
  }
  return EXIT_CODES.ERRORS;
}

/**
 * Log an error and return the exit code it maps to
 */
export function reportCommandError(context: CommandContext, error: unknown): ExitCode {
  const code = exitCodeForError(error);
  const message =
    error instanceof ConfigurationError
      ? error.getSummary()
      : error instanceof Error
        ? error.message
        : String(error);
  context.logger.error(message, { exit_code: code });
  return code;
}
