/**
 * Serializer Module Exports
 */

export * from './wire-schema';
export * from './mockserver-json';
