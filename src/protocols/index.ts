/**
 * Protocol exports.
 * @module protocols
 */
export * from './meshcore';
