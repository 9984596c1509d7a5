/**
 * Report generation module.
 * Deterministic. No LLM calls.
 * Turns a RunRecord into markdown + JSON artifacts.
 */

export { generateMarkdown, generateJSON } from './reporter.js';
export type { JsonOutput, JsonOutputAttempt, JsonOutputSubtask } from './reporter.js';
