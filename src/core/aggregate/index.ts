export * from './types.js';
export * from './census.js';
