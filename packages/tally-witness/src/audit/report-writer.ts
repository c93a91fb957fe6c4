/**
 * Audit report output
 */

import type { AuditReport } from '../core/types/report.js';
import { atomicWriteJSON } from '../core/utils/atomic-write.js';

/**
 * Write a report as pretty JSON, atomically
 */
export async function writeAuditReport(report: AuditReport, path: string): Promise<void> {
  await atomicWriteJSON(path, report);
}

/**
 * File-name-safe stamp for a report: generated_at, else the end of the
 * observed time range, else "empty"
 */
export function reportStamp(report: AuditReport): string {
  const instant = report.metadata.generated_at ?? report.metadata.time_range?.to ?? 'empty';
  return instant.replace(/[^0-9A-Za-z]+/g, '-').replace(/-+$/, '');
}
