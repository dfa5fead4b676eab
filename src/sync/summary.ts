/**
 * Per-file sync outcomes
 */

import type { RecordKind } from '../core/types.js';
import type { ExportEncoding } from '../ingestion/export-reader.js';

/**
 * Terminal stage of one data row
 *
 * - transform_failed: the row could not be turned into a payload
 * - submitted: the API answered 200
 * - rejected: the API answered with a status other than 200
 * - submit_failed: the request failed (HTTP error, timeout, missing image file)
 * - unresolved: the species lookup did not return exactly one match
 * - dry_run: transformed only
 */
export type RowStage =
  | 'transform_failed'
  | 'submitted'
  | 'rejected'
  | 'submit_failed'
  | 'unresolved'
  | 'dry_run';

export const ROW_STAGES: readonly RowStage[] = [
  'submitted',
  'rejected',
  'submit_failed',
  'transform_failed',
  'unresolved',
  'dry_run',
];

export interface SyncSummary {
  readonly kind: RecordKind;
  readonly filePath: string;
  readonly encoding: ExportEncoding;
  /** Data rows read, header excluded */
  readonly rowsRead: number;
  readonly outcomes: Readonly<Record<RowStage, number>>;
  readonly durationMs: number;
}

export function emptyOutcomes(): Record<RowStage, number> {
  return {
    transform_failed: 0,
    submitted: 0,
    rejected: 0,
    submit_failed: 0,
    unresolved: 0,
    dry_run: 0,
  };
}

/**
 * One-line description of a summary, without timing
 */
export function formatSummary(summary: SyncSummary): string {
  const counts = ROW_STAGES.map((stage) => `${stage} ${summary.outcomes[stage]}`).join(', ');
  return `${summary.kind}: ${summary.rowsRead} rows read from ${summary.filePath} (${summary.encoding}) | ${counts}`;
}
