import { AuthenticationError, ConfigurationError, FileDecodeError } from '../../core/errors.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  NETWORK_ERROR: 4,
  DATA_INTEGRITY_ERROR: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

const FILE_ERROR_CODES = new Set(['ENOENT', 'EACCES', 'EISDIR', 'EPERM']);

function isFileSystemError(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    FILE_ERROR_CODES.has(error.code)
  );
}

/**
 * Exit code for an error that ended a run
 *
 * Row-level failures never reach here.
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ConfigurationError) return EXIT_CODES.CONFIG_ERROR;
  if (error instanceof AuthenticationError) return EXIT_CODES.NETWORK_ERROR;
  if (error instanceof FileDecodeError || isFileSystemError(error)) {
    return EXIT_CODES.DATA_INTEGRITY_ERROR;
  }
  return EXIT_CODES.ERRORS;
}
