/**
 * Configuration module.
 * Loads and validates the task config file, then builds the Task.
 * Zod-validated. Defaults live in the schemas and defaults.ts.
 */

export { TIMEOUTS, LIMITS, MOTION, FRAME } from './defaults.js';
export { loadConfigFile, buildTask, ConfigError } from './loader.js';
