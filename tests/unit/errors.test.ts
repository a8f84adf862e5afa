/**
 * Unit tests for the error module
 */
import {
  assertOrExit,
  BlueprintError,
  clearCleanup,
  ConstructionError,
  exitWithError,
  exitWithSuccess,
  ExitCode,
  formatErrorMessage,
  getCleanupCount,
  getExitCode,
  hasCleanupRun,
  isRecoverableError,
  JsonValidationError,
  registerCleanup,
  runCleanup,
  TransformError,
  ValidationError,
} from '../../src/errors';

describe('error-types', () => {
  it('should carry exit codes and recoverability', () => {
    expect(getExitCode(new ValidationError('bad'))).toBe(ExitCode.VALIDATION_ERROR);
    expect(getExitCode(new ConstructionError('missing'))).toBe(ExitCode.CONSTRUCTION_ERROR);
    expect(getExitCode(new TransformError('failed', 'compress'))).toBe(ExitCode.TRANSFORM_ERROR);
    expect(getExitCode(new Error('plain'))).toBe(ExitCode.GENERAL_ERROR);

    expect(isRecoverableError(new ValidationError('bad'))).toBe(true);
    expect(isRecoverableError(new ConstructionError('missing'))).toBe(true);
    expect(isRecoverableError(new TransformError('failed', 'compress'))).toBe(false);
    expect(isRecoverableError('text')).toBe(false);
  });

  it('should truncate long content in JSON validation errors', () => {
    const error = new JsonValidationError('response body', 'x'.repeat(150));

    expect(error.message).toBe(`JSON validation failed for response body: invalid JSON\nContent: ${'x'.repeat(100)}...`);
    expect(error.field).toBe('response body');
    expect(error).toBeInstanceOf(ValidationError);
  });
});

describe('error-handler', () => {
  it('should list blueprint issues under the message', () => {
    const error = new BlueprintError('invalid blueprint', 'mocks.yaml', ['a: Required', 'b: Expected number']);

    expect(formatErrorMessage(error)).toBe('[X] invalid blueprint\n    - a: Required\n    - b: Expected number');
  });

  it('should format other values', () => {
    expect(formatErrorMessage(new Error('boom'))).toBe('[X] boom');
    expect(formatErrorMessage('text')).toBe('[X] text');
    expect(formatErrorMessage(42)).toBe('[X] An unexpected error occurred');
  });
});

describe('exit helpers', () => {
  let exitSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    clearCleanup();
    exitSpy = jest.spyOn(process, 'exit').mockImplementation((code?: string | number | null) => {
      throw new Error(`exit ${code}`);
    });
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    exitSpy.mockRestore();
    errorSpy.mockRestore();
    logSpy.mockRestore();
    clearCleanup();
  });

  it('should run cleanup and exit with the given code on error', () => {
    const calls: string[] = [];
    registerCleanup(() => calls.push('cleanup'));

    expect(() => exitWithError('2 error(s) in mocks.yaml', ExitCode.VALIDATION_ERROR)).toThrow('exit 3');
    expect(calls).toEqual(['cleanup']);
    expect(errorSpy).toHaveBeenCalledWith('[X] 2 error(s) in mocks.yaml');
  });

  it('should run cleanup and exit with zero on success', () => {
    const calls: string[] = [];
    registerCleanup(() => calls.push('cleanup'));

    expect(() => exitWithSuccess('done')).toThrow('exit 0');
    expect(calls).toEqual(['cleanup']);
    expect(logSpy).toHaveBeenCalledWith('[OK] done');
  });

  it('should exit only when the assertion fails', () => {
    assertOrExit(true, 'unused');
    expect(exitSpy).not.toHaveBeenCalled();

    expect(() => assertOrExit(false, 'no expectations', ExitCode.BLUEPRINT_ERROR)).toThrow('exit 6');
    expect(errorSpy).toHaveBeenCalledWith('[X] no expectations');
  });
});

describe('cleanup-registry', () => {
  beforeEach(() => {
    clearCleanup();
  });

  afterAll(() => {
    clearCleanup();
  });

  it('should run callbacks in LIFO order once', () => {
    const calls: string[] = [];
    registerCleanup(() => calls.push('first'));
    registerCleanup(() => calls.push('second'));

    runCleanup();
    runCleanup();

    expect(calls).toEqual(['second', 'first']);
    expect(hasCleanupRun()).toBe(true);
  });

  it('should unregister callbacks', () => {
    const unregister = registerCleanup(() => undefined);
    expect(getCleanupCount()).toBe(1);

    unregister();
    expect(getCleanupCount()).toBe(0);
  });

  it('should keep going after a failing callback', () => {
    const calls: string[] = [];
    registerCleanup(() => calls.push('survivor'));
    registerCleanup(() => {
      throw new Error('cleanup failed');
    });

    runCleanup();
    expect(calls).toEqual(['survivor']);
  });
});
