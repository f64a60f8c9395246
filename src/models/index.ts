/**
 * Centralized exports for all models
 */

export * from './brands.js';
export * from './verdicts.js';
export * from './result.js';
export * from './errors.js';
export * from './benchmark.js';
export * from './schemas.js';
