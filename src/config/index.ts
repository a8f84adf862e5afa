/**
 * Config Module Exports
 */

// Types
export * from './config-types';

// Loader
export * from './config-loader';
