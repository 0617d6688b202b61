/**
 * Semantic exit codes for the CLI.
 * Following POSIX conventions.
 */
export const ExitCodes = {
  /** Successful execution */
  SUCCESS: 0,

  /** General error (catch-all) */
  GENERAL_ERROR: 1,

  /** Invalid command arguments or options */
  INVALID_ARGS: 2,

  /** Input file not found or not a regular file */
  NOT_FOUND: 4,

  /** Input stream could not be parsed as CSV */
  VALIDATION_ERROR: 8,

  /** Environment configuration is invalid */
  CONFIG_ERROR: 11,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/**
 * Map an exit code to the machine-readable error code shown with it.
 */
export function exitCodeToErrorCode(exitCode: ExitCode): string {
  switch (exitCode) {
    case ExitCodes.SUCCESS:
      return 'SUCCESS';
    case ExitCodes.INVALID_ARGS:
      return 'INVALID_ARGS';
    case ExitCodes.NOT_FOUND:
      return 'NOT_FOUND';
    case ExitCodes.VALIDATION_ERROR:
      return 'VALIDATION_ERROR';
    case ExitCodes.CONFIG_ERROR:
      return 'CONFIG_ERROR';
    case ExitCodes.GENERAL_ERROR:
      return 'GENERAL_ERROR';
  }
}
