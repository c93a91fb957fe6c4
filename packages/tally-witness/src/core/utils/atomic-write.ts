/**
 * Atomic Write Utilities
 *
 * Write-to-temp-then-rename so a crash leaves either the old file or the new
 * one, never a partial observation or report.
 */

import { writeFile, rename, unlink, mkdir, link } from 'fs/promises';
import { dirname } from 'path';

function tempPathFor(filePath: string): string {
  return `${filePath}.${process.pid}.${Date.now()}.tmp`;
}

async function removeTemp(tempPath: string): Promise<void> {
  try {
    await unlink(tempPath);
  } catch (error) {
    if (!isErrnoException(error) || error.code !== 'ENOENT') {
      throw error;
    }
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Atomically write string data to file, replacing any previous content
 *
 * @example
 * ```typescript
 * await atomicWriteFile('/data/reports/audit-2025.json', JSON.stringify(report, null, 2));
 * ```
 */
export async function atomicWriteFile(
  filePath: string,
  data: string,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  const tempPath = tempPathFor(filePath);

  try {
    await writeFile(tempPath, data, encoding);
    await rename(tempPath, filePath);
  } catch (error) {
    await removeTemp(tempPath);
    throw error;
  }
}

/**
 * Atomically create a file that must not exist yet
 *
 * Observations are immutable: an existing target is never overwritten.
 * Resolves false when the target already exists.
 */
export async function atomicCreateFile(
  filePath: string,
  data: string,
  encoding: BufferEncoding = 'utf-8'
): Promise<boolean> {
  await mkdir(dirname(filePath), { recursive: true });
  const tempPath = tempPathFor(filePath);

  try {
    await writeFile(tempPath, data, encoding);
    // link() fails with EEXIST instead of replacing the target
    await link(tempPath, filePath);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'EEXIST') {
      return false;
    }
    throw error;
  } finally {
    await removeTemp(tempPath);
  }
}

/**
 * Atomically write JSON data to file
 */
export async function atomicWriteJSON(
  filePath: string,
  data: unknown,
  space: number | string = 2
): Promise<void> {
  const json = JSON.stringify(data, null, space);
  await atomicWriteFile(filePath, json + '\n', 'utf-8');
}
