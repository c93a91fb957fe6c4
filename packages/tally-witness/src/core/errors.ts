/**
 * Evidence Pipeline Error Types
 *
 * Custom error classes for the four failure families of the pipeline. Each
 * carries a discriminating `kind` so callers (and the CLI exit-code mapping)
 * can branch without string matching.
 *
 * RECOVERY SEMANTICS:
 * - NormalizationError: per document. Skip the snapshot, record the failure.
 * - ChainIntegrityError: never recovered. Halts appends for the chain.
 * - RuleExecutionError: per rule invocation. Downgraded to a diagnostic.
 * - ConfigurationError: fatal at startup, before any processing.
 */

export type NormalizationErrorKind =
  | 'MissingRequiredKey'
  | 'UnparsableDocument'
  | 'CandidateRootNotFound';

/**
 * Error raised when a raw document cannot be mapped to a snapshot
 */
export class NormalizationError extends Error {
  /**
   * @param kind - Failure family
   * @param message - Human-readable error message
   * @param keys - Paths involved (missing required keys, tried candidate roots)
   */
  constructor(
    public readonly kind: NormalizationErrorKind,
    message: string,
    public readonly keys: readonly string[] = []
  ) {
    super(message);
    this.name = 'NormalizationError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, NormalizationError);
    }
  }

  static missingRequiredKeys(keys: readonly string[]): NormalizationError {
    return new NormalizationError(
      'MissingRequiredKey',
      `Missing required keys: ${keys.join(', ')}`,
      keys
    );
  }

  static unparsable(reason: string): NormalizationError {
    return new NormalizationError('UnparsableDocument', `Unparsable document: ${reason}`);
  }

  static candidateRootNotFound(roots: readonly string[]): NormalizationError {
    return new NormalizationError(
      'CandidateRootNotFound',
      `No candidate array found at any of: ${roots.join(', ')}`,
      roots
    );
  }
}

export type ChainIntegrityErrorKind = 'BrokenLink' | 'GenesisMismatch' | 'UnchainedSnapshot';

function chainIntegrityMessage(
  kind: ChainIntegrityErrorKind,
  chainId: string,
  atIndex: number,
  reason: string
): string {
  switch (kind) {
    case 'GenesisMismatch':
      return `Chain ${chainId}: genesis record does not link to the genesis sentinel (${reason})`;
    case 'UnchainedSnapshot':
      return `Chain ${chainId}: stored snapshot has no hash record (${reason})`;
    case 'BrokenLink':
      return `Chain ${chainId}: broken link at index ${atIndex} (${reason})`;
  }
}

/**
 * Error raised when a stored hash chain fails verification
 *
 * This indicates tampering or corruption, not a transient condition. Appends
 * to the affected chain stop until an operator investigates.
 */
export class ChainIntegrityError extends Error {
  constructor(
    public readonly kind: ChainIntegrityErrorKind,
    public readonly chainId: string,
    public readonly atIndex: number,
    public readonly reason: string
  ) {
    super(chainIntegrityMessage(kind, chainId, atIndex, reason));
    this.name = 'ChainIntegrityError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ChainIntegrityError);
    }
  }
}

/**
 * Error raised inside a single rule invocation
 */
export class RuleExecutionError extends Error {
  constructor(
    public readonly ruleId: string,
    public readonly snapshotRef: string,
    cause: unknown
  ) {
    super(
      `Rule ${ruleId} failed on ${snapshotRef}: ${cause instanceof Error ? cause.message : String(cause)}`
    );
    this.name = 'RuleExecutionError';
  }
}

export type ConfigurationErrorKind = 'InvalidConfig' | 'NoEnabledRules' | 'UnknownRule';

/**
 * Error raised for an invalid or missing configuration
 *
 * Fail-fast: a wrong threshold silently replaced by a default is worse than
 * refusing to run.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
    public readonly kind: ConfigurationErrorKind = 'InvalidConfig'
  ) {
    super(message);
    this.name = 'ConfigurationError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigurationError);
    }
  }

  /**
   * Get formatted summary of configuration issues
   */
  getSummary(): string {
    if (this.issues.length === 0) {
      return this.message;
    }
    const lines = [this.message, ...this.issues.map((issue) => `  - ${issue}`)];
    return lines.join('\n');
  }
}
