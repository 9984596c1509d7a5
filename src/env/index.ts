/**
 * Environment module.
 * Simulated arm, frame capture and the motion executor.
 * No LLM calls, no run-log IO.
 */

export { MockArmEnv, MARKER_RGB } from './mockArmEnv.js';
export type { ArmEnvironment, ArmObservation, ArmCommand, MockArmEnvOptions } from './mockArmEnv.js';
export { MotionExecutor, numberParam } from './motion.js';
export { EnvFrameCapture } from './capture.js';
export { createFrame, fillRect, pixelAt, encodePng, decodePng } from './frame.js';
export type { Frame } from './frame.js';
