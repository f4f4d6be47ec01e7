export * from './config/types.js';
export * from './contracts/contract.js';
export * from './discovery/discover.js';
export * from './discovery/markers.js';
export * from './logging/logger.js';
export * from './registry/bindings.js';
export * from './registry/errors.js';
export * from './registry/global.js';
export * from './registry/Registry.js';
export * from './registry/types.js';
