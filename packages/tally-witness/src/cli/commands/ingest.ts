/**
 * Ingest Command
 *
 * Stores, normalizes and chains source documents.
 *
 * Usage:
 *   tally-witness ingest <files...> --source <id> [--retrieved-at <iso>]
 *
 * Exit code 6 when any document conflicts with one already stored under the
 * same stamp, otherwise 2 when any fails to normalize; the others are still
 * ingested.
 */

import type { Command } from 'commander';
import { ConfigurationError } from '../../core/errors.js';
import type { NormalizationFailure } from '../../core/types/report.js';
import type { CommandContext } from '../lib/context.js';
import { openPipeline, reportCommandError } from '../lib/context.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import { readRawDocument } from '../lib/raw-input.js';

export interface IngestCommandOptions {
  readonly source: string;
  readonly retrievedAt?: string;
}

export interface IngestSummary {
  readonly stored: number;
  readonly duplicates: number;
  readonly conflicts: number;
  readonly failures: readonly NormalizationFailure[];
}

export async function executeIngest(
  files: readonly string[],
  options: IngestCommandOptions,
  context: CommandContext
): Promise<ExitCode> {
  const { logger } = context;
  logger.commandStart('ingest', { files: files.length, source: options.source });

  try {
    if (options.retrievedAt !== undefined && files.length > 1) {
      throw new ConfigurationError('--retrieved-at applies to a single file', [
        `${files.length} files given`,
      ]);
    }

    const pipeline = openPipeline(context);
    let stored = 0;
    let duplicates = 0;
    let conflicts = 0;
    const failures: NormalizationFailure[] = [];

    try {
      for (const file of files) {
        const raw = await readRawDocument(file, {
          sourceId: options.source,
          retrievedAt: options.retrievedAt,
        });
        const result = await pipeline.ingest(raw);

        switch (result.status) {
          case 'stored':
            stored += 1;
            logger.info('Stored', {
              file,
              chain: result.record.chain_id,
              index: result.record.sequence_index,
            });
            break;
          case 'duplicate':
            duplicates += 1;
            logger.warn('Already recorded', { file });
            break;
          case 'conflict':
            conflicts += 1;
            logger.error(result.message, { file, path: result.path });
            break;
          case 'normalization_failed':
            failures.push(result.failure);
            logger.error(result.error.message, { file, kind: result.error.kind });
            break;
        }
      }
    } finally {
      pipeline.close();
    }

    const summary: IngestSummary = { stored, duplicates, conflicts, failures };
    console.log(
      logger.json
        ? JSON.stringify(summary)
        : `Stored ${stored}, duplicates ${duplicates}, conflicts ${conflicts}, normalization failures ${failures.length}`
    );

    logger.commandEnd(failures.length === 0 && conflicts === 0, {
      stored,
      duplicates,
      conflicts,
      failed: failures.length,
    });
    if (conflicts > 0) {
      return EXIT_CODES.CONFLICT;
    }
    return failures.length > 0 ? EXIT_CODES.NORMALIZATION_FAILED : EXIT_CODES.SUCCESS;
  } catch (error) {
    return reportCommandError(context, error);
  }
}

export function registerIngestCommand(program: Command, getContext: () => CommandContext): void {
  program
    .command('ingest <files...>')
    .description('Store, normalize and hash-chain source documents')
    .requiredOption('--source <id>', 'Source identifier')
    .option('--retrieved-at <iso>', 'Retrieval instant (single file only; default: file mtime)')
    .action(async (files: string[], options: IngestCommandOptions) => {
      process.exitCode = await executeIngest(files, options, getContext());
    });
}
