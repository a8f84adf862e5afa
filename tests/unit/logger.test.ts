/**
 * Unit tests for the logger
 */
import { createLogger, getMinLevel, setLogSink } from '../../src/utils/logger';
import type { LogLevel } from '../../src/utils/logger';

const ENV_KEYS = ['MOCKCRAFT_LOG_LEVEL', 'MOCKCRAFT_LOG_JSON', 'MOCKCRAFT_DEBUG'];

describe('logger', () => {
  const saved: Record<string, string | undefined> = {};
  let lines: Array<{ level: LogLevel; line: string }>;

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
    lines = [];
    setLogSink((level, line) => {
      lines.push({ level, line });
    });
  });

  afterEach(() => {
    setLogSink(null);
    for (const key of ENV_KEYS) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  it('should default to warn', () => {
    const log = createLogger('test');
    log.info('hidden');
    log.warn('shown');

    expect(getMinLevel()).toBe('warn');
    expect(lines.map((entry) => entry.level)).toEqual(['warn']);
  });

  it('should format plain text lines', () => {
    process.env['MOCKCRAFT_LOG_LEVEL'] = 'info';
    createLogger('builder').info('Built batch', { total: 3 });

    expect(lines).toHaveLength(1);
    expect(lines[0].line).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[INFO \] \[builder\] Built batch \{"total":3\}$/);
  });

  it('should write JSON lines when asked', () => {
    process.env['MOCKCRAFT_LOG_JSON'] = '1';
    createLogger('config').child('lock').error('stale', { pid: 1 });

    const entry: unknown = JSON.parse(lines[0].line);
    expect(entry).toMatchObject({ level: 'error', component: 'config:lock', msg: 'stale', data: { pid: 1 } });
  });

  it('should force debug with MOCKCRAFT_DEBUG', () => {
    process.env['MOCKCRAFT_LOG_LEVEL'] = 'error';
    process.env['MOCKCRAFT_DEBUG'] = '1';
    createLogger('test').debug('details');

    expect(getMinLevel()).toBe('debug');
    expect(lines).toHaveLength(1);
  });

  it('should fall back to warn for an unknown level', () => {
    process.env['MOCKCRAFT_LOG_LEVEL'] = 'chatty';

    expect(getMinLevel()).toBe('warn');
  });

  it('should not take object prototype members as levels', () => {
    process.env['MOCKCRAFT_LOG_LEVEL'] = 'constructor';

    expect(getMinLevel()).toBe('warn');
  });
});
