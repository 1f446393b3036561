/**
 * MeshCore companion-radio protocol exports.
 * @module meshcore
 */
export * from './constants';
export * from './errors';
export * from './frame';
export * from './types';
export * from './lpp';
export * from './parsers';
export * from './events';
export * from './decoder';
export * from './commands';
