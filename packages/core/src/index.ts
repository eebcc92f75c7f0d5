// Debug logging
export * from './debug/index.js';

// Utilities
export * from './utils/errors.js';
export * from './utils/paths.js';
