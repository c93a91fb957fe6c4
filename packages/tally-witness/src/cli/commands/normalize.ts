/**
 * Normalize Command
 *
 * Prints the canonical snapshot of one source file without storing it.
 *
 * Usage:
 *   tally-witness normalize <file> --source <id> [--retrieved-at <iso>]
 */

import type { Command } from 'commander';
import { serializeSnapshot } from '../../normalization/serialize.js';
import { normalizeWithSettings } from '../../services/evidence-pipeline.js';
import type { CommandContext } from '../lib/context.js';
import { reportCommandError } from '../lib/context.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import { readRawDocument } from '../lib/raw-input.js';

export interface NormalizeCommandOptions {
  readonly source: string;
  readonly retrievedAt?: string;
}

export async function executeNormalize(
  file: string,
  options: NormalizeCommandOptions,
  context: CommandContext
): Promise<ExitCode> {
  const { config, logger } = context;
  logger.commandStart('normalize', { file, source: options.source });

  try {
    const raw = await readRawDocument(file, {
      sourceId: options.source,
      retrievedAt: options.retrievedAt,
    });
    const result = normalizeWithSettings(raw, config.pipeline);

    if (!result.success) {
      logger.error(result.error.message, { kind: result.error.kind, file });
      logger.commandEnd(false);
      return EXIT_CODES.NORMALIZATION_FAILED;
    }

    console.log(serializeSnapshot(result.snapshot));
    logger.commandEnd(true);
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return reportCommandError(context, error);
  }
}

export function registerNormalizeCommand(
  program: Command,
  getContext: () => CommandContext
): void {
  program
    .command('normalize <file>')
    .description('Print the canonical snapshot of a source document')
    .requiredOption('--source <id>', 'Source identifier')
    .option('--retrieved-at <iso>', 'Retrieval instant (default: file mtime)')
    .action(async (file: string, options: NormalizeCommandOptions) => {
      process.exitCode = await executeNormalize(file, options, getContext());
    });
}
