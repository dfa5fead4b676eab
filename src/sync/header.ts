import type { Logger } from '../core/utils/logger.js';
import type { HeaderMismatch } from '../schemas/row-schema.js';

const MAX_REPORTED_MISMATCHES = 5;

/**
 * Warn when an export's header no longer matches its column schema
 *
 * Rows are still processed; positional mapping may be wrong.
 */
export function warnOnHeaderDrift(
  logger: Logger,
  filePath: string,
  mismatches: readonly HeaderMismatch[]
): void {
  if (mismatches.length === 0) return;

  logger.warn(`Header of ${filePath} does not match the expected columns`, {
    filePath,
    mismatchCount: mismatches.length,
    mismatches: mismatches
      .slice(0, MAX_REPORTED_MISMATCHES)
      .map((m) => `#${m.index}: expected "${m.expected}", found "${m.actual}"`),
  });
}
