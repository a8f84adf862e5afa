/**
 * mockcraft Error Handling Module
 *
 * - Standardized exit codes
 * - Error types mapped to exit codes (validation, construction, transform, ...)
 * - Centralized error handler with cleanup
 * - Cleanup callback registry
 *
 * @example
 * ```typescript
 * import { handleError, RegexValidationError, registerCleanup } from './errors';
 *
 * registerCleanup(() => spin.stop());
 * throw new RegexValidationError('[a-', 'request body');
 * ```
 */

// Exit codes
export { ExitCode, EXIT_CODE_DESCRIPTIONS, isSuccess, isRecoverable } from './exit-codes';

// Error types
export {
  MockcraftError,
  ConfigError,
  ValidationError,
  JsonValidationError,
  RegexValidationError,
  InputValidationError,
  ConstructionError,
  TransformError,
  BlueprintError,
  UserAbortError,
  isMockcraftError,
  isRecoverableError,
} from './error-types';

// Error handler
export {
  handleError,
  exitWithError,
  exitWithSuccess,
  withErrorHandling,
  assertOrExit,
  formatErrorMessage,
  getExitCode,
} from './error-handler';

// Cleanup registry
export {
  registerCleanup,
  runCleanup,
  clearCleanup,
  getCleanupCount,
  hasCleanupRun,
} from './cleanup-registry';

export type { CleanupCallback } from './cleanup-registry';
