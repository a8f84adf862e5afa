/**
 * Structured logger
 *
 * Levels debug < info < warn < error. Every line carries an ISO timestamp
 * and the component name. Output always goes to stderr so JSON written to
 * stdout by `mockcraft build` stays machine-readable.
 *
 * Environment:
 *   MOCKCRAFT_LOG_LEVEL = debug|info|warn|error (default: warn)
 *   MOCKCRAFT_LOG_JSON  = 1 for JSONL output
 *   MOCKCRAFT_DEBUG     = 1 forces debug level
 *
 * @module utils/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export type LogData = Record<string, unknown>;

export interface Logger {
  debug(msg: string, data?: LogData): void;
  info(msg: string, data?: LogData): void;
  warn(msg: string, data?: LogData): void;
  error(msg: string, data?: LogData): void;
  child(component: string): Logger;
}

/** Receives formatted lines; replaced in tests */
export type LogSink = (level: LogLevel, line: string) => void;

const stderrSink: LogSink = (_level, line) => {
  process.stderr.write(line + '\n');
};

let sink: LogSink = stderrSink;

export function setLogSink(next: LogSink | null): void {
  sink = next ?? stderrSink;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Minimum level, read on every call so tests and the CLI can change the
 * environment after import.
 */
export function getMinLevel(): LogLevel {
  const debug = process.env['MOCKCRAFT_DEBUG'];
  if (debug === '1' || debug === 'true') return 'debug';
  const level = (process.env['MOCKCRAFT_LOG_LEVEL'] || 'warn').toLowerCase();
  return isLogLevel(level) ? level : 'warn';
}

function emit(level: LogLevel, component: string, message: string, data?: LogData): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[getMinLevel()]) return;

  const ts = new Date().toISOString();

  if (process.env['MOCKCRAFT_LOG_JSON'] === '1') {
    const entry: LogData = { ts, level, component, msg: message };
    if (data) entry.data = data;
    sink(level, JSON.stringify(entry));
    return;
  }

  const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]`;
  sink(level, data ? `${prefix} ${message} ${JSON.stringify(data)}` : `${prefix} ${message}`);
}

export function createLogger(component: string): Logger {
  return {
    debug: (msg, data) => emit('debug', component, msg, data),
    info: (msg, data) => emit('info', component, msg, data),
    warn: (msg, data) => emit('warn', component, msg, data),
    error: (msg, data) => emit('error', component, msg, data),
    child: (sub) => createLogger(`${component}:${sub}`),
  };
}
