export * from './autoload.js';
export * from './bootstrap.js';
export * from './config.js';
