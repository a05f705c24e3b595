/**
 * Schema module: single source of truth for all data shapes.
 * Zod schemas + inferred TypeScript types.
 * Every boundary validates through these schemas.
 */

export * from './locator.js';
export * from './session.js';
export * from './outcome.js';
export * from './plan.js';
export * from './suite.js';
export * from './config.js';
export * from './jsonOutput.js';
