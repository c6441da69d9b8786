export * from './types.js';
export * from './errors.js';
export * from './artifact-id.js';
export * from './paths.js';
export * from './artifact-store.js';
export * from './s3-object-store.js';
export * from './client.js';
