// Configuration
export * from './config/environment.js';

// Logging
export * from './logging/types.js';
export * from './logging/correlation.js';
export * from './logging/logger.js';

// Domain types
export * from './types/review.js';

// Utilities
export * from './utils/dates.js';
