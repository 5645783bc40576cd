export * from './types.js';
export * from './libraries.js';
export * from './driver.js';
