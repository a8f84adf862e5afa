/**
 * Expectation validation
 *
 * Checks a built expectation before export. Errors make the batch
 * unusable; warnings are surfaced but do not block export.
 *
 * @module expectation/validation
 */

import { ValidationError } from '../errors';
import type { Expectation } from './expectation-types';
import { isValidProgressivePolicy } from './progressive';

export type IssueSeverity = 'error' | 'warning';

export interface ValidationIssue {
  /** Position of the expectation in its batch */
  index: number;
  field: string;
  message: string;
  severity: IssueSeverity;
}

export interface ValidationReport {
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

function isNonNegativeInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

export function validateExpectation(expectation: Expectation, index = 0): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const error = (field: string, message: string): void => {
    issues.push({ index, field, message, severity: 'error' });
  };
  const warning = (field: string, message: string): void => {
    issues.push({ index, field, message, severity: 'warning' });
  };

  const { httpRequest, httpResponse } = expectation;

  if (!httpRequest.method.trim()) {
    error('httpRequest.method', 'method is required');
  }
  if (!httpRequest.path.trim()) {
    error('httpRequest.path', 'path is required');
  }

  const status = httpResponse.statusCode;
  if (!Number.isInteger(status) || status < 100 || status > 599) {
    error('httpResponse.statusCode', `status code must be between 100 and 599, got ${status}`);
  }

  if (!Number.isInteger(expectation.priority)) {
    error('priority', `priority must be an integer, got ${expectation.priority}`);
  }

  if (expectation.times && !expectation.times.unlimited) {
    const remaining = expectation.times.remainingTimes;
    if (!Number.isInteger(remaining) || remaining <= 0) {
      error('times.remainingTimes', `match count must be a positive integer, got ${remaining}`);
    }
  }

  if (httpResponse.delay && !isNonNegativeInteger(httpResponse.delay.value)) {
    error('httpResponse.delay.value', `delay must be a non-negative integer, got ${httpResponse.delay.value}`);
  }

  if (expectation.progressive && !isValidProgressivePolicy(expectation.progressive)) {
    const { base, step, cap } = expectation.progressive;
    error('progressive', `inconsistent progressive bounds (base=${base}, step=${step}, cap=${cap})`);
  }

  const body = httpRequest.body;
  if (body?.type === 'REGEX' && body.unsafe) {
    warning('httpRequest.body.regex', `regex '${body.regex}' does not compile and was accepted as-is`);
  }

  const connection = httpResponse.connectionOptions;
  if (connection?.contentLengthHeaderOverride !== undefined && !isNonNegativeInteger(connection.contentLengthHeaderOverride)) {
    error(
      'httpResponse.connectionOptions.contentLengthHeaderOverride',
      `Content-Length override must be a non-negative integer, got ${connection.contentLengthHeaderOverride}`
    );
  }
  if (connection?.chunkSize !== undefined && !isNonNegativeInteger(connection.chunkSize)) {
    error('httpResponse.connectionOptions.chunkSize', `chunk size must be a non-negative integer, got ${connection.chunkSize}`);
  }

  return issues;
}

/**
 * Validate a whole batch. Duplicate ids are reported as errors since the
 * engine would treat the second as an update of the first.
 */
export function validateExpectations(expectations: readonly Expectation[]): ValidationReport {
  const issues: ValidationIssue[] = [];
  const seenIds = new Map<string, number>();

  expectations.forEach((expectation, index) => {
    issues.push(...validateExpectation(expectation, index));
    if (expectation.id !== undefined) {
      const previous = seenIds.get(expectation.id);
      if (previous !== undefined) {
        issues.push({
          index,
          field: 'id',
          message: `duplicate id '${expectation.id}' (also used by expectation ${previous})`,
          severity: 'error',
        });
      } else {
        seenIds.set(expectation.id, index);
      }
    }
  });

  const errors = issues.filter((issue) => issue.severity === 'error');
  const warnings = issues.filter((issue) => issue.severity === 'warning');
  return { valid: errors.length === 0, errors, warnings };
}

export function formatIssue(issue: ValidationIssue): string {
  return `expectation ${issue.index} ${issue.field}: ${issue.message}`;
}

/**
 * @throws ValidationError for the first error in the batch
 */
export function assertValidExpectations(expectations: readonly Expectation[]): ValidationReport {
  const report = validateExpectations(expectations);
  const [first] = report.errors;
  if (first) {
    throw new ValidationError(formatIssue(first), first.field);
  }
  return report;
}
