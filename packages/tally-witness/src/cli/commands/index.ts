/**
 * Command registration
 */

import type { Command } from 'commander';
import type { CommandContext } from '../lib/context.js';
import { registerAuditCommand } from './audit.js';
import { registerIngestCommand } from './ingest.js';
import { registerNormalizeCommand } from './normalize.js';
import { registerRulesCommand } from './rules.js';
import { registerVerifyCommand } from './verify.js';

export function registerCommands(program: Command, getContext: () => CommandContext): void {
  registerNormalizeCommand(program, getContext);
  registerIngestCommand(program, getContext);
  registerVerifyCommand(program, getContext);
  registerAuditCommand(program, getContext);
  registerRulesCommand(program, getContext);
}

export { executeNormalize } from './normalize.js';
export { executeIngest } from './ingest.js';
export { executeVerify } from './verify.js';
export { executeAudit, parseRuleList } from './audit.js';
export { executeRules } from './rules.js';
