/**
 * Unit tests for expectation validation
 */
import {
  assertValidExpectations,
  createExpectation,
  formatIssue,
  regexBody,
  validateExpectation,
  validateExpectations,
} from '../../src/expectation';
import type { Expectation } from '../../src/expectation';
import { ValidationError } from '../../src/errors';

function valid(id?: string): Expectation {
  return createExpectation({ id, httpRequest: { method: 'GET', path: '/ok' } });
}

describe('validation', () => {
  it('should accept a minimal expectation', () => {
    expect(validateExpectation(valid())).toEqual([]);
  });

  it('should require method and path', () => {
    const expectation = createExpectation({ httpRequest: { method: ' ', path: '' } });

    expect(validateExpectation(expectation, 2).map(formatIssue)).toEqual([
      'expectation 2 httpRequest.method: method is required',
      'expectation 2 httpRequest.path: path is required',
    ]);
  });

  it('should check the status code range', () => {
    const expectation = valid();
    expectation.httpResponse.statusCode = 600;

    expect(validateExpectation(expectation)).toEqual([
      {
        index: 0,
        field: 'httpResponse.statusCode',
        message: 'status code must be between 100 and 599, got 600',
        severity: 'error',
      },
    ]);
  });

  it('should check counters, delays and progressive bounds', () => {
    const expectation = valid();
    expectation.times = { unlimited: false, remainingTimes: 0 };
    expectation.httpResponse.delay = { timeUnit: 'MILLISECONDS', value: -1 };
    expectation.progressive = { base: 10, step: 0, cap: 5 };

    expect(validateExpectation(expectation).map((issue) => issue.field)).toEqual([
      'times.remainingTimes',
      'httpResponse.delay.value',
      'progressive',
    ]);
    expect(validateExpectation(expectation)[2].message).toBe('inconsistent progressive bounds (base=10, step=0, cap=5)');
  });

  it('should warn only about unsafe regex bodies', () => {
    const safe = valid();
    safe.httpRequest.body = regexBody('^a+$');
    const unsafe = valid();
    unsafe.httpRequest.body = regexBody('[a-', { allowInvalid: true });

    expect(validateExpectation(safe)).toEqual([]);
    expect(validateExpectation(unsafe)).toEqual([
      {
        index: 0,
        field: 'httpRequest.body.regex',
        message: "regex '[a-' does not compile and was accepted as-is",
        severity: 'warning',
      },
    ]);
  });

  it('should report duplicate ids within a batch', () => {
    const report = validateExpectations([valid('a'), valid('b'), valid('a')]);

    expect(report.valid).toBe(false);
    expect(report.errors.map(formatIssue)).toEqual(["expectation 2 id: duplicate id 'a' (also used by expectation 0)"]);
  });

  it('should keep warnings out of the verdict', () => {
    const unsafe = valid();
    unsafe.httpRequest.body = regexBody('(', { allowInvalid: true });
    const report = validateExpectations([unsafe]);

    expect(report.valid).toBe(true);
    expect(report.warnings).toHaveLength(1);
  });

  it('should throw for the first error', () => {
    const broken = valid();
    broken.httpResponse.statusCode = 42;

    expect(() => assertValidExpectations([valid(), broken])).toThrow(ValidationError);
    expect(() => assertValidExpectations([valid(), broken])).toThrow(
      'expectation 1 httpResponse.statusCode: status code must be between 100 and 599, got 42'
    );
  });
});
