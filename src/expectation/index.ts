/**
 * Expectation Module Exports
 *
 * Model, construction helpers and the transformation engine
 * (clone, progressive expansion, compression).
 */

// Model
export * from './expectation-types';
export * from './name-values';
export * from './expectation';

// Construction
export * from './body-matchers';
export * from './graphql';

// Transformations
export * from './clone';
export * from './progressive';
export * from './response-body';
export * from './compression';

// Checks
export * from './validation';
