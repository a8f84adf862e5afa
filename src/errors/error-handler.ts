/**
 * Centralized error handler for the mockcraft CLI
 *
 * Formats the error, runs cleanup callbacks and exits with the exit code
 * carried by the error. Debug details are printed when MOCKCRAFT_DEBUG is set.
 */

import { ExitCode, EXIT_CODE_DESCRIPTIONS } from './exit-codes';
import { BlueprintError, isMockcraftError } from './error-types';
import { runCleanup } from './cleanup-registry';

const isDebugMode = (): boolean => {
  return process.env['MOCKCRAFT_DEBUG'] === '1' || process.env['MOCKCRAFT_DEBUG'] === 'true';
};

/**
 * Format error message for display (ASCII markers only)
 */
export function formatErrorMessage(error: unknown): string {
  if (error instanceof BlueprintError && error.issues.length > 0) {
    const issues = error.issues.map((issue) => `    - ${issue}`).join('\n');
    return `[X] ${error.message}\n${issues}`;
  }

  if (error instanceof Error) {
    return `[X] ${error.message}`;
  }

  if (typeof error === 'string') {
    return `[X] ${error}`;
  }

  return '[X] An unexpected error occurred';
}

/**
 * Exit code for an error: MockcraftError carries its own, anything else is GENERAL_ERROR
 */
export function getExitCode(error: unknown): ExitCode {
  if (isMockcraftError(error)) {
    return error.code;
  }
  return ExitCode.GENERAL_ERROR;
}

function logDebugInfo(error: unknown, code: ExitCode): void {
  if (!isDebugMode()) return;

  console.error('');
  console.error('[i] Debug information:');
  console.error(`    Exit code: ${code} (${EXIT_CODE_DESCRIPTIONS[code] || 'Unknown'})`);

  if (error instanceof Error) {
    console.error(`    Error type: ${error.constructor.name}`);
    if (error.stack) {
      console.error('    Stack trace:');
      const stackLines = error.stack.split('\n').slice(1, 6);
      for (const line of stackLines) {
        console.error(`      ${line.trim()}`);
      }
    }
  }

  if (isMockcraftError(error)) {
    console.error(`    Recoverable: ${error.recoverable}`);
  }
}

/**
 * Central error handler
 *
 * @returns never - Always exits the process
 */
export function handleError(error: unknown): never {
  runCleanup();

  const code = getExitCode(error);
  console.error(formatErrorMessage(error));
  logDebugInfo(error, code);

  process.exit(code);
}

/**
 * Exit with an error message and code
 */
export function exitWithError(message: string, code: ExitCode = ExitCode.GENERAL_ERROR): never {
  runCleanup();
  console.error(`[X] ${message}`);

  if (isDebugMode()) {
    console.error('');
    console.error(`[i] Exit code: ${code} (${EXIT_CODE_DESCRIPTIONS[code] || 'Unknown'})`);
  }

  process.exit(code);
}

/**
 * Exit with success after running cleanup
 */
export function exitWithSuccess(message?: string): never {
  runCleanup();
  if (message) {
    console.log(`[OK] ${message}`);
  }
  process.exit(ExitCode.SUCCESS);
}

/**
 * Wrap an async command handler so any rejection goes through handleError
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      handleError(error);
    }
  };
}

/**
 * Assert a condition, exiting with the given code if false
 */
export function assertOrExit(
  condition: boolean,
  message: string,
  code: ExitCode = ExitCode.GENERAL_ERROR
): asserts condition {
  if (!condition) {
    exitWithError(message, code);
  }
}
