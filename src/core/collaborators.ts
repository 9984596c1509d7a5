import type {
  Action,
  AgentDecision,
  ExecutionReport,
  Params,
  SealedAttempt,
  Subtask,
  VerifierResult,
} from '../schema/index.js';
import type { Frame } from '../env/frame.js';

// ── Observation Capture ──────────────────────────────────────

export interface ObservationCapture {
  /** Render the current environment state as one frame. */
  capture(): Promise<Frame>;
}

// ── Action Executor ──────────────────────────────────────────

export interface ActionExecutor {
  execute(action: Action, params: Params, subtask: Subtask): Promise<ExecutionReport>;
}

// ── Decision Agent ───────────────────────────────────────────

export interface DecisionState {
  subtaskId: string;
  instruction: string;
  successCriteria: string;
  params: Params;
  attemptIndex: number;
  allowedActions: readonly Action[];
  recentHistory: readonly SealedAttempt[];
  /** Aborted when this call times out or is abandoned. */
  signal?: AbortSignal | undefined;
}

export interface DecisionAgent {
  readonly kind: string;
  /** Returns the raw decision; the caller checks it against the vocabulary. */
  chooseAction(state: DecisionState): Promise<AgentDecision>;
}

// ── Completion Verifier ──────────────────────────────────────

export interface VerifierInput {
  subtaskId: string;
  beforeFrame: Frame;
  afterFrame: Frame;
  instruction: string;
  successCriteria: string;
  params: Params;
  signal?: AbortSignal | undefined;
}

export interface CompletionVerifier {
  readonly kind: string;
  check(input: VerifierInput): Promise<VerifierResult>;
}
