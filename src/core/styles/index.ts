export * from './catalog.js';
export * from './classifier.js';
