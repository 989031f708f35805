/**
 * Schema module: single source of truth for all data shapes.
 * Zod schemas + inferred TypeScript types.
 */

export * from './locator.js';
export * from './profile.js';
export * from './config.js';
export * from './results.js';
export * from './jsonOutput.js';
