/**
 * Shared constants for the evidence pipeline
 */

/**
 * previous_hash of the genesis record: an all-zero SHA-256 digest
 */
export const GENESIS_HASH = '0'.repeat(64);

/**
 * Version tag of the AuditReport layout
 */
export const REPORT_VERSION = 1 as const;

/**
 * Fallback geography when neither the document nor the source config name one
 */
export const DEFAULT_GEOGRAPHY = { code: '00', name: 'NATIONAL' } as const;

export const DEFAULT_ELECTION_LEVEL = 'national';

/**
 * Scale used when turning per-interval processing rates into a 15 minute rate
 */
export const PROCESSING_WINDOW_MINUTES = 15;
