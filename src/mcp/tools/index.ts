export * from './operations.js';
export * from './batch.js';
