/**
 * Run log module.
 * Append-only, crash-consistent record of every sealed attempt.
 */

export { RunLog, RunLogError, STEPS_FILE, SUMMARY_FILE, REPORT_FILE } from './runLog.js';
export type { AttemptLog, FrameStore, FrameSlot, RunLogOptions } from './runLog.js';
export { replayRunLog, parseRunLog, summarizeReplay, findOrderingViolations } from './replay.js';
export type { ReplayResult, ReplayedSubtask } from './replay.js';
