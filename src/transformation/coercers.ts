/**
 * Field Coercers
 *
 * Pure conversions from single raw export fields to typed payload values.
 * Malformed input throws a RowError subclass instead of defaulting; the
 * transformers turn those into skipped rows.
 */

import {
  BloomTimeParseError,
  CoordinateParseError,
  HardinessParseError,
  PlantDateParseError,
} from '../core/errors.js';
import type { Logger } from '../core/utils/logger.js';
import type { RawRow } from '../core/types.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Tokens merged with the month that follows them */
const BLOOM_QUALIFIERS: ReadonlySet<string> = new Set(['Early', 'Mid', 'Late']);

export const AFFIRMATIVE_VALUES: readonly string[] = ['yes', 'x'];
export const UTAH_NATIVE_VALUES: readonly string[] = [...AFFIRMATIVE_VALUES, 'utah native'];

/**
 * Remove the comma artifacts the export writes around field values
 */
export function stripDelimiterArtifacts(row: RawRow): string[] {
  return row.map((field) => field.replace(/^,+|,+$/g, ''));
}

/**
 * Parse a comma-separated list of hardiness zones
 *
 * @throws {HardinessParseError} If any token is not an integer
 */
export function parseHardinessZones(raw: string): number[] {
  if (raw === '') return [];

  return raw.split(',').map((token) => {
    const trimmed = token.trim();
    if (!INTEGER_PATTERN.test(trimmed)) {
      throw new HardinessParseError(raw);
    }
    return parseInt(trimmed, 10);
  });
}

function toTitleCase(token: string): string {
  return token.replace(/[A-Za-z]+/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

/**
 * Split a bloom time string into month labels, keeping export order
 *
 * `"early april late may"` -> `["Early April", "Late May"]`
 *
 * @throws {BloomTimeParseError} If a qualifier ends the string
 */
export function parseBloomMonths(raw: string): string[] {
  const tokens = raw.split(/\s+/).filter((token) => token.length > 0).map(toTitleCase);
  const months: string[] = [];

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i] ?? '';
    if (BLOOM_QUALIFIERS.has(token)) {
      const next = tokens[i + 1];
      if (next === undefined) {
        throw new BloomTimeParseError(raw);
      }
      months.push(`${token} ${next}`);
      i++;
    } else {
      months.push(token);
    }
  }

  return months;
}

function parseDatePart(value: string, parts: string): number {
  const trimmed = value.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new PlantDateParseError(parts);
  }
  return parseInt(trimmed, 10);
}

export interface PlantDateContext {
  readonly plantId?: string;
  readonly logger?: Logger;
}

/**
 * Compose the planting date from its export parts
 *
 * Returns null when a part is missing or out of range (logged as a warning).
 * Checks run day, month, year and stop at the first failure.
 *
 * @throws {PlantDateParseError} If the day or month is not an integer
 */
export function composePlantDate(
  day: string,
  month: string,
  year: string,
  context: PlantDateContext = {}
): string | null {
  const parts = `${year}-${month}-${day}`;

  if (day === '' || month === '' || year === '') {
    context.logger?.debug('Plant date incomplete', { plantId: context.plantId, day, month, year });
    return null;
  }

  const dayNumber = parseDatePart(day, parts);
  let valid = dayNumber >= 1 && dayNumber <= 31;
  if (valid) {
    const monthNumber = parseDatePart(month, parts);
    valid = monthNumber >= 1 && monthNumber <= 12 && year.length === 4;
  }

  if (!valid) {
    context.logger?.warn(`[${context.plantId ?? 'unknown'}] Date value invalid: ${parts}`, {
      plantId: context.plantId,
    });
    return null;
  }

  return parts;
}

/**
 * True when the lower-cased value is in the allow-list
 */
export function isAffirmative(raw: string, allowList: readonly string[] = AFFIRMATIVE_VALUES): boolean {
  return allowList.includes(raw.toLowerCase());
}

/**
 * Parse a decimal degree rounded to 6 places; '' means no coordinate
 *
 * @throws {CoordinateParseError} If the value is not a finite number
 */
export function parseCoordinate(raw: string): number | null {
  if (raw === '') return null;

  const trimmed = raw.trim();
  const value = Number(trimmed);
  if (!DECIMAL_PATTERN.test(trimmed) || !Number.isFinite(value)) {
    throw new CoordinateParseError(raw);
  }

  return Number(value.toFixed(6));
}
