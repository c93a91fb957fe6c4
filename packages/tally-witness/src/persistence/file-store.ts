/**
 * File Snapshot Store
 *
 * Directory layout under the data root:
 *
 *   raw/<source>/<stamp>.json                   body exactly as received
 *   raw/<source>/<stamp>.meta.json              retrieval metadata + body digest
 *   raw/<source>/conflicts/<stamp>.<sha>.json   a different body for a stamp
 *                                               already taken
 *   normalized/<source>/<geo>/<stamp>.json      canonical snapshot
 *   failures/<source>/<stamp>.json              normalization failure record
 *   reports/audit-<stamp>.json                  audit reports (relocatable)
 *
 * Observations are immutable: raw and normalized files are created once and
 * never overwritten. Writing different bytes to a taken path is a conflict,
 * never a silent no-op. Reports are replaced atomically.
 */

import { readdir, readFile, rm } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import type { NormalizedSnapshot, RawDocument, SnapshotRef } from '../core/types/snapshot.js';
import { snapshotRef } from '../core/types/snapshot.js';
import type { AuditReport, NormalizationFailure } from '../core/types/report.js';
import { atomicCreateFile, isErrnoException } from '../core/utils/atomic-write.js';
import { sha256Hex } from '../core/utils/canonical-json.js';
import { compareObserved } from '../core/utils/timestamps.js';
import { parseSnapshot, serializeSnapshot } from '../normalization/serialize.js';
import { reportStamp, writeAuditReport } from '../audit/report-writer.js';

/**
 * created: new file. identical: the same bytes were already stored.
 * conflict: different bytes are stored under the same path.
 */
export type StoreOutcome = 'created' | 'identical' | 'conflict';

export interface StoredFile {
  readonly path: string;
  readonly outcome: StoreOutcome;
}

export interface StoredRawFile extends StoredFile {
  /** Where a conflicting body was kept; null unless outcome is conflict */
  readonly conflictPath: string | null;
}

const NormalizationFailureSchema = z
  .object({
    source_id: z.string().min(1),
    retrieved_at: z.string().min(1),
    kind: z.string().min(1),
    message: z.string(),
  })
  .strict();

/**
 * Raised when a stored snapshot no longer parses
 */
export class SnapshotStoreError extends Error {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(`${message} (${path})`);
    this.name = 'SnapshotStoreError';
  }
}

/**
 * Make a value safe to use as one path segment
 */
export function safeSegment(value: string): string {
  const cleaned = value.replace(/[^A-Za-z0-9._-]+/g, '_');
  return cleaned === '' || cleaned === '.' || cleaned === '..' ? '_' : cleaned;
}

/**
 * File stamp for an ISO instant ("2025-11-30T20:00:00Z" -> "2025-11-30T20-00-00Z")
 */
export function fileStamp(instant: string): string {
  return safeSegment(instant.replace(/:/g, '-'));
}

async function storeOnce(path: string, data: string): Promise<StoreOutcome> {
  if (await atomicCreateFile(path, data)) {
    return 'created';
  }
  const existing = await readFile(path, 'utf-8');
  return existing === data ? 'identical' : 'conflict';
}

async function listDir(path: string): Promise<string[]> {
  try {
    const entries = await readdir(path, { withFileTypes: true });
    return entries.map((entry) => entry.name).sort();
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }
}

function parseFailureRecord(
  text: string
): { success: true; data: NormalizationFailure } | { success: false; error: string } {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    return { success: false, error: error instanceof Error ? error.message : String(error) };
  }
  const parsed = NormalizationFailureSchema.safeParse(json);
  return parsed.success
    ? { success: true, data: parsed.data }
    : { success: false, error: parsed.error.issues.map((issue) => issue.message).join('; ') };
}

export interface FileSnapshotStoreOptions {
  /** Report directory (default: <root>/reports) */
  readonly reportsDir?: string;
}

export class FileSnapshotStore {
  private readonly reportsDir: string;

  constructor(
    private readonly rootDir: string,
    options: FileSnapshotStoreOptions = {}
  ) {
    this.reportsDir = options.reportsDir ?? join(rootDir, 'reports');
  }

  get root(): string {
    return this.rootDir;
  }

  rawPath(raw: RawDocument): string {
    return join(this.rootDir, 'raw', safeSegment(raw.source_id), `${fileStamp(raw.retrieved_at)}.json`);
  }

  normalizedPath(snapshot: NormalizedSnapshot): string {
    return join(
      this.rootDir,
      'normalized',
      safeSegment(snapshot.source_id),
      safeSegment(snapshot.geography.code),
      `${fileStamp(snapshot.timestamp_observed)}.json`
    );
  }

  failurePath(failure: NormalizationFailure): string {
    return join(
      this.rootDir,
      'failures',
      safeSegment(failure.source_id),
      `${fileStamp(failure.retrieved_at)}.json`
    );
  }

  /**
   * Store a raw body; a different body for a taken stamp is kept under
   * conflicts/ and reported as a conflict
   */
  async putRawDocument(raw: RawDocument): Promise<StoredRawFile> {
    const path = this.rawPath(raw);
    const bodySha256 = sha256Hex(raw.body);
    const outcome = await storeOnce(path, raw.body);

    if (outcome === 'created') {
      const meta = {
        source_id: raw.source_id,
        retrieved_at: raw.retrieved_at,
        content_type: raw.content_type,
        transport_status: raw.transport_status,
        body_sha256: bodySha256,
      };
      await atomicCreateFile(path.replace(/\.json$/, '.meta.json'), JSON.stringify(meta, null, 2) + '\n');
    }

    if (outcome !== 'conflict') {
      return { path, outcome, conflictPath: null };
    }

    const conflictPath = join(
      this.rootDir,
      'raw',
      safeSegment(raw.source_id),
      'conflicts',
      `${fileStamp(raw.retrieved_at)}.${bodySha256.slice(0, 16)}.json`
    );
    await atomicCreateFile(conflictPath, raw.body);
    return { path, outcome, conflictPath };
  }

  async putNormalizedSnapshot(snapshot: NormalizedSnapshot): Promise<StoredFile> {
    const path = this.normalizedPath(snapshot);
    return { path, outcome: await storeOnce(path, serializeSnapshot(snapshot)) };
  }

  /**
   * Remove a snapshot file whose hash record could not be appended
   */
  async discardNormalizedSnapshot(snapshot: NormalizedSnapshot): Promise<void> {
    await rm(this.normalizedPath(snapshot), { force: true });
  }

  async putNormalizationFailure(failure: NormalizationFailure): Promise<StoredFile> {
    const path = this.failurePath(failure);
    return { path, outcome: await storeOnce(path, JSON.stringify(failure, null, 2) + '\n') };
  }

  /**
   * Recorded normalization failures ordered by source, then retrieval time
   *
   * @throws SnapshotStoreError if a record fails validation
   */
  async listNormalizationFailures(sourceId?: string): Promise<NormalizationFailure[]> {
    const base = join(this.rootDir, 'failures');
    const sources = sourceId === undefined ? await listDir(base) : [safeSegment(sourceId)];

    const failures: NormalizationFailure[] = [];
    for (const source of sources) {
      for (const name of await listDir(join(base, source))) {
        if (!name.endsWith('.json')) continue;

        const path = join(base, source, name);
        const parsed = parseFailureRecord(await readFile(path, 'utf-8'));
        if (!parsed.success) {
          throw new SnapshotStoreError(`Invalid normalization failure record: ${parsed.error}`, path);
        }
        failures.push(parsed.data);
      }
    }

    return failures.sort((a, b) => {
      if (a.source_id !== b.source_id) {
        return a.source_id < b.source_id ? -1 : 1;
      }
      return compareObserved(a.retrieved_at, b.retrieved_at);
    });
  }

  /**
   * Stored snapshots ordered by timestamp_observed, then file name
   *
   * @throws SnapshotStoreError if a stored file fails validation
   */
  async listNormalizedSnapshots(sourceId?: string): Promise<NormalizedSnapshot[]> {
    const base = join(this.rootDir, 'normalized');
    const sources = sourceId === undefined ? await listDir(base) : [safeSegment(sourceId)];

    const found: { snapshot: NormalizedSnapshot; name: string }[] = [];

    for (const source of sources) {
      for (const geo of await listDir(join(base, source))) {
        for (const name of await listDir(join(base, source, geo))) {
          if (!name.endsWith('.json')) continue;

          const path = join(base, source, geo, name);
          const parsed = parseSnapshot(await readFile(path, 'utf-8'));
          if (!parsed.success) {
            throw new SnapshotStoreError(`Invalid stored snapshot: ${parsed.error}`, path);
          }
          found.push({ snapshot: parsed.data, name: join(source, geo, name) });
        }
      }
    }

    return found
      .sort((a, b) => {
        const byTime = compareObserved(a.snapshot.timestamp_observed, b.snapshot.timestamp_observed);
        if (byTime !== 0) return byTime;
        return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
      })
      .map(({ snapshot }) => snapshot);
  }

  /**
   * Index snapshots by SnapshotRef, for chain re-verification
   */
  async snapshotsByRef(sourceId?: string): Promise<Map<SnapshotRef, NormalizedSnapshot>> {
    const snapshots = await this.listNormalizedSnapshots(sourceId);
    return new Map(snapshots.map((snapshot) => [snapshotRef(snapshot), snapshot]));
  }

  async writeReport(report: AuditReport): Promise<string> {
    const path = join(this.reportsDir, `audit-${reportStamp(report)}.json`);
    await writeAuditReport(report, path);
    return path;
  }
}
