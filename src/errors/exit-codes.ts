/**
 * Standardized exit codes for the mockcraft CLI
 *
 * Exit codes follow Unix conventions:
 * - 0: Success
 * - 1-125: Application errors
 * - 126-127: Command execution errors (reserved by shell)
 * - 128+N: Signal termination (128 + signal number)
 * - 130: SIGINT (Ctrl+C) - 128 + 2
 */

export enum ExitCode {
  /** Successful execution */
  SUCCESS = 0,

  /** General/unspecified error */
  GENERAL_ERROR = 1,

  /** Configuration file errors (missing, invalid, corrupt) */
  CONFIG_ERROR = 2,

  /** Invalid user input (malformed JSON, bad regex, out-of-range numbers) */
  VALIDATION_ERROR = 3,

  /** Required input missing while building an expectation */
  CONSTRUCTION_ERROR = 4,

  /** Body transform failed (compression, serialization) */
  TRANSFORM_ERROR = 5,

  /** Blueprint file missing, unreadable or malformed */
  BLUEPRINT_ERROR = 6,

  /** User aborted operation (Ctrl+C, SIGINT) */
  USER_ABORT = 130,
}

/**
 * Human-readable descriptions for exit codes
 * Used in error messages and documentation
 */
export const EXIT_CODE_DESCRIPTIONS: Record<ExitCode, string> = {
  [ExitCode.SUCCESS]: 'Success',
  [ExitCode.GENERAL_ERROR]: 'General error',
  [ExitCode.CONFIG_ERROR]: 'Configuration error',
  [ExitCode.VALIDATION_ERROR]: 'Validation error',
  [ExitCode.CONSTRUCTION_ERROR]: 'Construction error',
  [ExitCode.TRANSFORM_ERROR]: 'Transform error',
  [ExitCode.BLUEPRINT_ERROR]: 'Blueprint error',
  [ExitCode.USER_ABORT]: 'User abort (Ctrl+C)',
};

/**
 * Check if an exit code indicates success
 */
export function isSuccess(code: ExitCode | number): boolean {
  return code === ExitCode.SUCCESS;
}

/**
 * Check if an exit code indicates a recoverable error
 * (the operator can fix the input and run again)
 */
export function isRecoverable(code: ExitCode | number): boolean {
  return code === ExitCode.VALIDATION_ERROR || code === ExitCode.CONSTRUCTION_ERROR;
}
