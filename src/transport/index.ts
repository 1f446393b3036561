/**
 * Transport exports.
 * @module transport
 */
export * from './types';
export * from './serial';
