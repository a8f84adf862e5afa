/**
 * mockcraft public API
 *
 * @example
 * ```typescript
 * import { loadBlueprintFile, buildBatch, toMockServerJson } from 'mockcraft';
 *
 * const { expectations } = buildBatch(loadBlueprintFile('mocks.yaml'));
 * console.log(toMockServerJson(expectations));
 * ```
 */

export * from './expectation';
export * from './features';
export * from './serializer';
export * from './blueprint';
export * from './config';
export * from './errors';
export { createLogger, setLogSink } from './utils/logger';
export type { Logger, LogLevel, LogSink, LogData } from './utils/logger';
