/**
 * Audit Command
 *
 * Verifies the chains, runs the enabled rules over stored snapshots and
 * writes an AuditReport. Alerts are findings, not failures: the exit code is
 * 0 whether or not alerts were found. It is 2 when the report lists
 * normalization failures recorded by earlier ingests.
 *
 * Usage:
 *   tally-witness audit [--source <id>] [--rules <ids>] [--out <path>]
 */

import type { Command } from 'commander';
import type { CommandContext } from '../lib/context.js';
import { openPipeline, reportCommandError } from '../lib/context.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';

export interface AuditCommandOptions {
  readonly source?: string;
  /** Comma-separated rule ids */
  readonly rules?: string;
  readonly out?: string;
}

export function parseRuleList(value: string | undefined): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  return value
    .split(',')
    .map((id) => id.trim())
    .filter((id) => id.length > 0);
}

export async function executeAudit(
  options: AuditCommandOptions,
  context: CommandContext
): Promise<ExitCode> {
  const { logger } = context;
  logger.commandStart('audit', { source: options.source, rules: options.rules });

  try {
    const pipeline = openPipeline(context);
    try {
      const { report, reportPath, failureCount } = await pipeline.audit({
        sourceId: options.source,
        rules: parseRuleList(options.rules),
        outPath: options.out,
      });

      if (logger.json) {
        console.log(
          JSON.stringify({
            report_path: reportPath,
            summary: report.summary,
            normalization_failures: failureCount,
          })
        );
      } else {
        const { by_severity: bySeverity } = report.summary;
        console.log(
          `${report.summary.total} alert(s) [High ${bySeverity.High}, Medium ${bySeverity.Medium}, Low ${bySeverity.Low}] over ${report.metadata.snapshot_count} snapshot(s)`
        );
        if (failureCount > 0) {
          console.log(`Normalization failures: ${failureCount}`);
        }
        console.log(`Report: ${reportPath}`);
      }

      logger.commandEnd(failureCount === 0, { outcome: report.metadata.outcome });
      return failureCount > 0 ? EXIT_CODES.NORMALIZATION_FAILED : EXIT_CODES.SUCCESS;
    } finally {
      pipeline.close();
    }
  } catch (error) {
    return reportCommandError(context, error);
  }
}

export function registerAuditCommand(program: Command, getContext: () => CommandContext): void {
  program
    .command('audit')
    .description('Run integrity rules over stored snapshots and write a report')
    .option('--source <id>', 'Restrict to one source')
    .option('--rules <ids>', 'Comma-separated rule ids to run')
    .option('--out <path>', 'Report path (default: <reports>/audit-<stamp>.json)')
    .action(async (options: AuditCommandOptions) => {
      process.exitCode = await executeAudit(options, getContext());
    });
}
