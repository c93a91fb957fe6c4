/**
 * Rules Command
 *
 * Lists the rule registry in evaluation order with enabled state and the
 * effective thresholds.
 */

import type { Command } from 'commander';
import { isRuleEnabled } from '../../rules/config.js';
import { RULE_REGISTRY } from '../../rules/registry.js';
import type { CommandContext } from '../lib/context.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';

export function executeRules(context: CommandContext): ExitCode {
  const { config, logger } = context;
  const rules = config.pipeline.rules;

  const rows = RULE_REGISTRY.map((rule, index) => {
    const { enabled: _enabled, ...thresholds } = rules.rules[rule.id];
    return {
      order: index + 1,
      id: rule.id,
      severity: rule.severity,
      enabled: isRuleEnabled(rules, rule.id),
      thresholds: Object.entries(thresholds)
        .map(([key, value]) => `${key}=${String(value)}`)
        .join(' '),
    };
  });

  logger.table(rows, ['order', 'id', 'severity', 'enabled', 'thresholds']);
  return EXIT_CODES.SUCCESS;
}

export function registerRulesCommand(program: Command, getContext: () => CommandContext): void {
  program
    .command('rules')
    .description('List rules in evaluation order')
    .action(() => {
      process.exitCode = executeRules(getContext());
    });
}
