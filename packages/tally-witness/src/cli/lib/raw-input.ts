/**
 * Build RawDocuments from files on disk
 */

import { readFile, stat } from 'node:fs/promises';
import { extname } from 'node:path';
import type { RawDocument } from '../../core/types/snapshot.js';
import { isIsoInstant } from '../../core/utils/timestamps.js';
import { ConfigurationError } from '../../core/errors.js';

const CONTENT_TYPES: Readonly<Record<string, string>> = {
  '.json': 'application/json',
  '.txt': 'text/plain',
  '.html': 'text/html',
};

export interface RawInputOptions {
  readonly sourceId: string;
  /** Retrieval instant; defaults to the file's modification time */
  readonly retrievedAt?: string;
}

/**
 * Read a file as a RawDocument
 *
 * @throws ConfigurationError for an invalid --retrieved-at value
 */
export async function readRawDocument(path: string, options: RawInputOptions): Promise<RawDocument> {
  if (options.retrievedAt !== undefined && !isIsoInstant(options.retrievedAt)) {
    throw new ConfigurationError(`Invalid --retrieved-at value: ${options.retrievedAt}`, [
      'expected an ISO-8601 instant such as 2025-11-30T20:00:00Z',
    ]);
  }

  const [body, info] = await Promise.all([readFile(path, 'utf-8'), stat(path)]);

  return {
    source_id: options.sourceId,
    retrieved_at: options.retrievedAt ?? info.mtime.toISOString(),
    content_type: CONTENT_TYPES[extname(path).toLowerCase()] ?? 'application/octet-stream',
    transport_status: null,
    body,
  };
}
