export * from './logger.js';
export * from './env.js';
export * from './date.js';
