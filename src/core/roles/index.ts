export * from './predicates.js';
export * from './resolver.js';
