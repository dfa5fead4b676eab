/**
 * BRAHMS Sync Error Types
 *
 * Custom error classes for startup, file-level and row-level failures.
 *
 * PROPAGATION:
 * - ConfigurationError / AuthenticationError: fatal, raised before any row is read
 * - FileDecodeError: fatal to the file being read (the image export retries
 *   with its fallback encoding when the header cannot be decoded)
 * - RowError subclasses: contained within a single row, which is skipped
 */

/**
 * Error thrown when required configuration is missing or invalid
 *
 * RECOVERY:
 * - Set RBG_API_USERNAME and RBG_API_PASSWORD (or add them to .env)
 * - Check the .brahms-syncrc file against the documented settings
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigurationError);
    }
  }
}

/**
 * Error thrown when the token endpoint does not issue a session
 */
export class AuthenticationError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'AuthenticationError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AuthenticationError);
    }
  }
}

/**
 * Error thrown when file bytes do not match the declared encoding
 */
export class FileDecodeError extends Error {
  constructor(
    public readonly filePath: string,
    public readonly encoding: string,
    cause?: unknown
  ) {
    super(`Failed to decode ${filePath} as ${encoding}`, { cause });
    this.name = 'FileDecodeError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FileDecodeError);
    }
  }
}

// ============================================================================
// Row-level errors
// ============================================================================

/**
 * Base class for failures that drop a single row
 *
 * @param rowId - Identity of the row (plant id or image file name), if known
 * @param rawValue - Offending raw field value
 */
export abstract class RowError extends Error {
  abstract readonly code: string;

  constructor(
    message: string,
    public readonly rawValue: string,
    public readonly rowId?: string
  ) {
    super(message);
    this.name = new.target.name;
  }

  /**
   * Copy of this error tagged with the row identity
   */
  abstract withRowId(rowId: string): RowError;
}

export class HardinessParseError extends RowError {
  readonly code = 'HARDINESS_PARSE';

  constructor(rawValue: string, rowId?: string) {
    super(`Invalid hardiness zone list: "${rawValue}"`, rawValue, rowId);
  }

  withRowId(rowId: string): HardinessParseError {
    return new HardinessParseError(this.rawValue, rowId);
  }
}

export class BloomTimeParseError extends RowError {
  readonly code = 'BLOOM_TIME_PARSE';

  constructor(rawValue: string, rowId?: string) {
    super(`Bloom time qualifier without a month: "${rawValue}"`, rawValue, rowId);
  }

  withRowId(rowId: string): BloomTimeParseError {
    return new BloomTimeParseError(this.rawValue, rowId);
  }
}

export class PlantDateParseError extends RowError {
  readonly code = 'PLANT_DATE_PARSE';

  constructor(rawValue: string, rowId?: string) {
    super(`Plant date is not numeric: ${rawValue}`, rawValue, rowId);
  }

  withRowId(rowId: string): PlantDateParseError {
    return new PlantDateParseError(this.rawValue, rowId);
  }
}

export class CoordinateParseError extends RowError {
  readonly code = 'COORDINATE_PARSE';

  constructor(rawValue: string, rowId?: string) {
    super(`Invalid coordinate: "${rawValue}"`, rawValue, rowId);
  }

  withRowId(rowId: string): CoordinateParseError {
    return new CoordinateParseError(this.rawValue, rowId);
  }
}

/**
 * Row width does not match the column schema
 */
export class RowSchemaError extends RowError {
  readonly code = 'ROW_SCHEMA';

  constructor(
    public readonly expected: number,
    public readonly actual: number,
    rawValue: string,
    rowId?: string
  ) {
    super(`Expected ${expected} columns, found ${actual}`, rawValue, rowId);
  }

  withRowId(rowId: string): RowSchemaError {
    return new RowSchemaError(this.expected, this.actual, this.rawValue, rowId);
  }
}

/**
 * Render any thrown value as a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
