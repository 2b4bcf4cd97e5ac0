export * from './logger.js';
export * from './utils.js';
export * from './errors.js';
