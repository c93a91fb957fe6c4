/**
 * Hash-Chain Store
 *
 * Append-only persistence for HashRecords.
 *
 * ARCHITECTURE:
 * - Synchronous better-sqlite3; appends are single transactions
 * - WAL mode so `verify` can read while an ingest is running
 * - Versioned migrations recorded in schema_migrations
 *
 * INVARIANT: rows are inserted, never updated or deleted. The append
 * transaction re-reads the tip so two writers cannot fork a chain.
 */

import Database from 'better-sqlite3';
import type { HashRecord } from '../core/types/ledger.js';

// ============================================================================
// Store Interface
// ============================================================================

export interface HashChainStore {
  /**
   * Persist the next record of a chain
   *
   * @throws StaleChainTipError if the record does not extend the stored tip
   */
  appendRecord(record: HashRecord): void;
  /** All records of a chain ordered by sequence_index */
  listRecords(chainId: string): HashRecord[];
  listChainIds(): string[];
  tip(chainId: string): HashRecord | null;
  close(): void;
}

/**
 * Raised when an append races another writer or skips an index
 */
export class StaleChainTipError extends Error {
  constructor(
    public readonly chainId: string,
    public readonly expectedIndex: number,
    public readonly attemptedIndex: number
  ) {
    super(
      `Chain ${chainId}: expected next index ${expectedIndex}, got ${attemptedIndex}`
    );
    this.name = 'StaleChainTipError';
  }
}

/**
 * Migration definition
 */
export interface Migration {
  readonly version: number;
  readonly name: string;
  readonly up: (db: Database.Database) => void;
}

// ============================================================================
// Database Row Types (internal)
// ============================================================================

interface HashRecordRow {
  readonly chain_id: string;
  readonly sequence_index: number;
  readonly snapshot_hash: string;
  readonly content_hash: string;
  readonly previous_hash: string;
  readonly snapshot_ref: string;
  readonly created_at: string;
}

function rowToRecord(row: HashRecordRow): HashRecord {
  return {
    chain_id: row.chain_id,
    sequence_index: row.sequence_index,
    snapshot_hash: row.snapshot_hash,
    content_hash: row.content_hash,
    previous_hash: row.previous_hash,
    snapshot_ref: row.snapshot_ref,
    created_at: row.created_at,
  };
}

const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    name: 'initial_schema',
    up: (db) => {
      db.exec(`
        CREATE TABLE hash_records (
          chain_id TEXT NOT NULL,
          sequence_index INTEGER NOT NULL CHECK (sequence_index >= 0),
          snapshot_hash TEXT NOT NULL CHECK (length(snapshot_hash) = 64),
          content_hash TEXT NOT NULL CHECK (length(content_hash) = 64),
          previous_hash TEXT NOT NULL CHECK (length(previous_hash) = 64),
          snapshot_ref TEXT NOT NULL,
          created_at TEXT NOT NULL,
          PRIMARY KEY (chain_id, sequence_index)
        );

        CREATE INDEX idx_hash_records_snapshot_ref ON hash_records(snapshot_ref);
      `);
    },
  },
  {
    version: 2,
    name: 'append_only_guards',
    up: (db) => {
      db.exec(`
        CREATE TRIGGER hash_records_no_update
        BEFORE UPDATE ON hash_records
        BEGIN
          SELECT RAISE(ABORT, 'hash_records is append-only');
        END;

        CREATE TRIGGER hash_records_no_delete
        BEFORE DELETE ON hash_records
        BEGIN
          SELECT RAISE(ABORT, 'hash_records is append-only');
        END;
      `);
    },
  },
];

// ============================================================================
// SQLite Store
// ============================================================================

export class SqliteHashChainStore implements HashChainStore {
  private readonly db: Database.Database;

  /**
   * @param dbPath - Database file, or ':memory:' for tests
   */
  constructor(dbPath: string) {
    this.db = new Database(dbPath);

    // Enable WAL mode for concurrent reads
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');

    this.runMigrations();
  }

  // ============================================================================
  // Migration Management
  // ============================================================================

  private runMigrations(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
      );
    `);

    const currentVersion = this.getDatabaseVersion();

    const apply = this.db.transaction(() => {
      for (const migration of MIGRATIONS) {
        if (migration.version > currentVersion) {
          migration.up(this.db);
          this.db
            .prepare<[number, string]>(
              'INSERT INTO schema_migrations (version, name) VALUES (?, ?)'
            )
            .run(migration.version, migration.name);
        }
      }
    });

    apply();
  }

  /**
   * Current schema version (0 if no migrations applied)
   */
  getDatabaseVersion(): number {
    const row = this.db
      .prepare<[], { version: number | null }>(
        'SELECT MAX(version) AS version FROM schema_migrations'
      )
      .get();
    return row?.version ?? 0;
  }

  // ============================================================================
  // Records
  // ============================================================================

  appendRecord(record: HashRecord): void {
    const insert = this.db.transaction((next: HashRecord) => {
      const current = this.tip(next.chain_id);
      const expectedIndex = current === null ? 0 : current.sequence_index + 1;
      if (next.sequence_index !== expectedIndex) {
        throw new StaleChainTipError(next.chain_id, expectedIndex, next.sequence_index);
      }

      this.db
        .prepare<[string, number, string, string, string, string, string]>(`
          INSERT INTO hash_records (
            chain_id, sequence_index, snapshot_hash, content_hash,
            previous_hash, snapshot_ref, created_at
          ) VALUES (?, ?, ?, ?, ?, ?, ?)
        `)
        .run(
          next.chain_id,
          next.sequence_index,
          next.snapshot_hash,
          next.content_hash,
          next.previous_hash,
          next.snapshot_ref,
          next.created_at
        );
    });

    insert(record);
  }

  listRecords(chainId: string): HashRecord[] {
    return this.db
      .prepare<[string], HashRecordRow>(`
        SELECT * FROM hash_records
        WHERE chain_id = ?
        ORDER BY sequence_index ASC
      `)
      .all(chainId)
      .map(rowToRecord);
  }

  listChainIds(): string[] {
    return this.db
      .prepare<[], { chain_id: string }>(
        'SELECT DISTINCT chain_id FROM hash_records ORDER BY chain_id ASC'
      )
      .all()
      .map((row) => row.chain_id);
  }

  tip(chainId: string): HashRecord | null {
    const row = this.db
      .prepare<[string], HashRecordRow>(`
        SELECT * FROM hash_records
        WHERE chain_id = ?
        ORDER BY sequence_index DESC
        LIMIT 1
      `)
      .get(chainId);
    return row ? rowToRecord(row) : null;
  }

  close(): void {
    this.db.close();
  }
}

// ============================================================================
// In-memory Store
// ============================================================================

/**
 * Array-backed store, for callers that do not need durability
 */
export class MemoryHashChainStore implements HashChainStore {
  private readonly chains = new Map<string, HashRecord[]>();

  appendRecord(record: HashRecord): void {
    const records = this.chains.get(record.chain_id) ?? [];
    if (record.sequence_index !== records.length) {
      throw new StaleChainTipError(record.chain_id, records.length, record.sequence_index);
    }
    records.push(record);
    this.chains.set(record.chain_id, records);
  }

  listRecords(chainId: string): HashRecord[] {
    return [...(this.chains.get(chainId) ?? [])];
  }

  listChainIds(): string[] {
    return [...this.chains.keys()].sort();
  }

  tip(chainId: string): HashRecord | null {
    const records = this.chains.get(chainId) ?? [];
    return records[records.length - 1] ?? null;
  }

  close(): void {
    this.chains.clear();
  }
}
