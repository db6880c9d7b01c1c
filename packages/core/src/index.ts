// Core package public API

export * from './types.js';
export * from './constants.js';
export * from './config.js';
export * from './di/container.js';
export * from './persona/catalog.js';
export * from './persona/loader.js';
export * from './utils/async.js';
export * from './utils/logger.js';
