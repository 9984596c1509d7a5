/**
 * Schema module: zod schemas and inferred types for every data shape.
 * Zod schemas + inferred TypeScript types.
 * Every boundary validates through these schemas.
 */

export * from './task.js';
export * from './attempt.js';
export * from './results.js';
export * from './config.js';
export * from './decision.js';
export * from './jsonOutput.js';
