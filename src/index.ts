/**
 * Library entry point.
 * The CLI in src/cli is a thin wrapper over these exports.
 */

export * from './schema/index.js';
export * from './core/index.js';
export * from './env/index.js';
export * from './agent/index.js';
export * from './verifier/index.js';
export * from './runlog/index.js';
export * from './tracing/index.js';
export { generateMarkdown, generateJSON } from './report/index.js';
export { TIMEOUTS, LIMITS, MOTION, FRAME, loadConfigFile, buildTask, ConfigError } from './config/index.js';
export { createLLMClient, loadLLMConfig, createMockClient } from './llm/index.js';
export type { LLMClient, LLMConfig, ImageInput } from './llm/index.js';
export { executeRun } from './cli/run.js';
export type { ExecuteRunOptions } from './cli/run.js';
