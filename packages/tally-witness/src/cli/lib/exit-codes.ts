/**
 * Process exit codes
 */

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 1,
  NORMALIZATION_FAILED: 2,
  CONFIG_ERROR: 3,
  NO_ENABLED_RULES: 4,
  CHAIN_INTEGRITY_ERROR: 5,
  CONFLICT: 6,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
