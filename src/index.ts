/**
 * case-census library exports.
 */

// Case styles
export * from './core/styles/index.js';

// Role expectations
export * from './core/roles/index.js';

// Aggregation
export * from './core/aggregate/index.js';

// Scanning
export * from './core/scan/index.js';

// Configuration
export * from './core/config/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
