/**
 * Verify Command
 *
 * Re-verifies stored hash chains.
 *
 * Usage:
 *   tally-witness verify [--chain <id>] [--deep]
 *
 * Exit code 5 when any chain is broken.
 */

import type { Command } from 'commander';
import type { CommandContext } from '../lib/context.js';
import { openPipeline, reportCommandError } from '../lib/context.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';

export interface VerifyCommandOptions {
  readonly chain?: string;
  readonly deep?: boolean;
}

export async function executeVerify(
  options: VerifyCommandOptions,
  context: CommandContext
): Promise<ExitCode> {
  const { logger } = context;
  logger.commandStart('verify', { chain: options.chain, deep: options.deep });

  try {
    const pipeline = openPipeline(context);
    try {
      const results = await pipeline.verify({ chainId: options.chain, deep: options.deep });

      const rows = [...results.entries()].map(([chainId, result]) => ({
        chain_id: chainId,
        valid: result.valid,
        checked: result.checked,
        first_break_index: result.first_break_index,
        reason: result.reason ?? null,
        tip: pipeline.tip(chainId)?.content_hash ?? null,
      }));
      logger.table(rows, ['chain_id', 'valid', 'checked', 'first_break_index', 'reason', 'tip']);

      const broken = rows.filter((row) => !row.valid).length;
      logger.commandEnd(broken === 0, { chains: rows.length, broken });
      return broken > 0 ? EXIT_CODES.CHAIN_INTEGRITY_ERROR : EXIT_CODES.SUCCESS;
    } finally {
      pipeline.close();
    }
  } catch (error) {
    return reportCommandError(context, error);
  }
}

export function registerVerifyCommand(program: Command, getContext: () => CommandContext): void {
  program
    .command('verify')
    .description('Verify stored hash chains')
    .option('--chain <id>', 'Verify a single chain ("<source>/<geography code>")')
    .option('--deep', 'Also recompute snapshot hashes and look for unchained snapshots')
    .action(async (options: VerifyCommandOptions) => {
      process.exitCode = await executeVerify(options, getContext());
    });
}
