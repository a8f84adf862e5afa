/**
 * Blueprint module: declarative YAML/JSON input for expectation batches
 */

export * from './blueprint-schema';
export * from './blueprint-loader';
export * from './blueprint-builder';
export * from './source';
