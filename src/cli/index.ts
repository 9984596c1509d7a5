/**
 * CLI module: thin wrapper over core.
 * Parses arguments, delegates to core, handles exit codes.
 * No business logic lives here.
 */

export { registerRunCommand, registerReplayCommand, executeRun } from './run.js';
export type { ExecuteRunOptions } from './run.js';
