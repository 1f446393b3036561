/**
 * Core runtime exports.
 * @module core
 */
export * from './EventDispatcher';
export * from './DeviceState';
export * from './FramePump';
export * from './CommandEngine';
export * from './MeshCoreClient';
