#!/usr/bin/env tsx
/**
 * tally-witness CLI Entry Point
 *
 * Normalize published result documents, keep them in per-series hash chains
 * and audit them against the integrity rules.
 *
 * @module tally-witness-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { loadConfig } from '../src/cli/lib/config.js';
import { createCLILogger } from '../src/cli/lib/logger.js';
import { createCoreLogger, type CommandContext } from '../src/cli/lib/context.js';
import { EXIT_CODES } from '../src/cli/lib/exit-codes.js';
import { registerCommands } from '../src/cli/commands/index.js';
import { ConfigurationError } from '../src/core/errors.js';

export { EXIT_CODES, type ExitCode } from '../src/cli/lib/exit-codes.js';

// ============================================================================
// Global State
// ============================================================================

interface GlobalOptions {
  readonly verbose?: boolean;
  readonly json?: boolean;
  readonly config?: string;
  readonly dataDir?: string;
  readonly chainDb?: string;
}

let globalContext: CommandContext | null = null;

export function getGlobalContext(): CommandContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

// ============================================================================
// CLI Setup
// ============================================================================

function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed) {
    return typeof parsed.version === 'string' ? parsed.version : '0.0.0';
  }
  return '0.0.0';
}

async function initializeContext(options: GlobalOptions): Promise<CommandContext> {
  const config = await loadConfig({
    configPath: options.config,
    overrides: {
      verbose: options.verbose,
      json: options.json,
      dataDir: options.dataDir,
      chainDb: options.chainDb,
    },
  });

  const logger = createCLILogger({
    level: config.logging.level,
    json: config.json,
  });

  globalContext = { config, logger, coreLogger: createCoreLogger(config) };
  return globalContext;
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('tally-witness')
    .description('Tamper-evident observation and integrity auditing of published election results')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .tally-witnessrc)')
    .option('--data-dir <path>', 'Data directory (raw and normalized snapshots)')
    .option('--chain-db <path>', 'Hash-chain SQLite database')
    .hook('preAction', async () => {
      try {
        await initializeContext(program.opts<GlobalOptions>());
      } catch (error) {
        const message =
          error instanceof ConfigurationError
            ? error.getSummary()
            : error instanceof Error
              ? error.message
              : String(error);
        console.error(`Configuration error: ${message}`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  registerCommands(program, getGlobalContext);

  return program;
}

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(`Fatal error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(EXIT_CODES.ERRORS);
});
