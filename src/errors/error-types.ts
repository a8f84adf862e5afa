/**
 * Custom error types for mockcraft
 *
 * All custom errors extend MockcraftError which provides:
 * - Standardized exit codes
 * - Recoverable flag (input can be fixed and the step retried)
 * - Consistent error formatting
 */

import { ExitCode } from './exit-codes';

/**
 * Base error class for all mockcraft errors
 * Extends standard Error with exit code and recovery information
 */
export class MockcraftError extends Error {
  constructor(
    message: string,
    public readonly code: ExitCode = ExitCode.GENERAL_ERROR,
    public readonly recoverable: boolean = false
  ) {
    super(message);
    this.name = 'MockcraftError';
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Configuration-related errors
 * Examples: unreadable config file, invalid YAML, unknown setting
 */
export class ConfigError extends MockcraftError {
  constructor(
    message: string,
    public readonly configPath?: string
  ) {
    super(message, ExitCode.CONFIG_ERROR, false);
    this.name = 'ConfigError';
  }
}

/**
 * Invalid input for a field of an expectation
 * Examples: non-positive match count, inconsistent progressive bounds
 */
export class ValidationError extends MockcraftError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message, ExitCode.VALIDATION_ERROR, true);
    this.name = 'ValidationError';
  }
}

const MAX_CONTENT_PREVIEW = 100;

/**
 * Text that was expected to be JSON but does not parse
 */
export class JsonValidationError extends ValidationError {
  constructor(
    public readonly context: string,
    public readonly content: string,
    public readonly originalError?: unknown
  ) {
    const preview =
      content.length > MAX_CONTENT_PREVIEW ? `${content.slice(0, MAX_CONTENT_PREVIEW)}...` : content;
    const reason = originalError instanceof Error ? originalError.message : 'invalid JSON';
    super(`JSON validation failed for ${context}: ${reason}\nContent: ${preview}`, context);
    this.name = 'JsonValidationError';
  }
}

/**
 * Pattern that does not compile as a regular expression
 */
export class RegexValidationError extends ValidationError {
  constructor(
    public readonly pattern: string,
    public readonly context: string,
    public readonly originalError?: unknown
  ) {
    const reason = originalError instanceof Error ? originalError.message : 'does not compile';
    super(`invalid regex pattern '${pattern}' for ${context}: ${reason}`, context);
    this.name = 'RegexValidationError';
  }
}

/**
 * Scalar operator input outside its accepted range
 * Examples: priority "-1", delay "abc", times "0"
 */
export class InputValidationError extends ValidationError {
  constructor(
    public readonly inputType: string,
    public readonly value: string,
    public readonly expected?: string
  ) {
    super(
      expected
        ? `invalid ${inputType} value '${value}' (expected: ${expected})`
        : `invalid ${inputType} value '${value}'`,
      inputType
    );
    this.name = 'InputValidationError';
  }
}

/**
 * Required input missing while assembling an expectation
 * Examples: zero body parameters supplied, empty GraphQL query
 */
export class ConstructionError extends MockcraftError {
  constructor(
    message: string,
    public readonly step?: string
  ) {
    super(message, ExitCode.CONSTRUCTION_ERROR, true);
    this.name = 'ConstructionError';
  }
}

/**
 * Body transform failure; the expectation is left as it was
 * Examples: unsupported compression algorithm, body that cannot be serialized
 */
export class TransformError extends MockcraftError {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly originalError?: unknown
  ) {
    super(message, ExitCode.TRANSFORM_ERROR, false);
    this.name = 'TransformError';
  }
}

/**
 * Blueprint file errors
 * Examples: file not found, YAML syntax error, schema violations
 */
export class BlueprintError extends MockcraftError {
  constructor(
    message: string,
    public readonly file?: string,
    public readonly issues: string[] = []
  ) {
    super(message, ExitCode.BLUEPRINT_ERROR, false);
    this.name = 'BlueprintError';
  }
}

/**
 * User abort error (Ctrl+C, SIGINT)
 * Used when user explicitly cancels an operation
 */
export class UserAbortError extends MockcraftError {
  constructor(message: string = 'Operation cancelled by user') {
    super(message, ExitCode.USER_ABORT, false);
    this.name = 'UserAbortError';
  }
}

/**
 * Type guard to check if an error is a MockcraftError
 */
export function isMockcraftError(error: unknown): error is MockcraftError {
  return error instanceof MockcraftError;
}

/**
 * Type guard to check if an error is recoverable
 */
export function isRecoverableError(error: unknown): boolean {
  if (isMockcraftError(error)) {
    return error.recoverable;
  }
  return false;
}
