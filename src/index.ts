/**
 * MeshCore companion-radio client for Node.js.
 * @module meshcore-node
 */
export * from './protocols';
export * from './core';
export * from './transport';
export * from './logger';
export * from './config';
