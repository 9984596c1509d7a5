/**
 * Core orchestration module.
 * Orchestrator → sequencer → attempt runner → collaborators.
 * No CLI and no environment specifics; collaborators are injected.
 */

export { Orchestrator } from './orchestrator.js';
export type { OrchestratorOptions, RunOptions } from './orchestrator.js';
export { SubtaskSequencer, nextParams } from './sequencer.js';
export type { SequencerDeps, SubtaskRun } from './sequencer.js';
export { AttemptRunner, InvalidActionError, failureResult } from './attemptRunner.js';
export type { AttemptExecutor, AttemptRunnerDeps } from './attemptRunner.js';
export { callWithRetry, CollaboratorTimeoutError } from './retry.js';
export type { CallOutcome, RetryPolicy } from './retry.js';
export type {
  ActionExecutor,
  CompletionVerifier,
  DecisionAgent,
  DecisionState,
  ObservationCapture,
  VerifierInput,
} from './collaborators.js';
