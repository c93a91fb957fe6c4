/**
 * Alert Types
 */

export type Severity = 'Low' | 'Medium' | 'High';

export const SEVERITIES: readonly Severity[] = ['High', 'Medium', 'Low'];

/**
 * Typed finding emitted by a rule. Immutable once created.
 */
export interface Alert {
  readonly type: string;
  readonly severity: Severity;
  /** Contains the concrete numbers that triggered the alert */
  readonly justification: string;
  readonly department?: string;
  readonly rule_id: string;
  readonly snapshot_ref: string;
}

/**
 * Rule failure captured by the engine boundary. Never an Alert.
 */
export interface RuleDiagnostic {
  readonly rule_id: string;
  readonly snapshot_ref: string;
  readonly message: string;
}
