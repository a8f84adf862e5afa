/**
 * Feature Module Exports
 */

export * from './feature-types';
export * from './registry';
export { annotateDescription, CACHE_CONTROL_PRESETS } from './response-behavior';
