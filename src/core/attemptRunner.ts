import type { Frame } from '../env/frame.js';
import type { FrameStore } from '../runlog/index.js';
import type {
  Action,
  Attempt,
  AttemptFailure,
  ExecutionReport,
  FailureStage,
  Params,
  SealedAttempt,
  Subtask,
  VerifierResult,
} from '../schema/index.js';
import { ACTIONS, actionSchema, verifierResultSchema } from '../schema/index.js';
import type { TraceSink } from '../tracing/index.js';
import type {
  ActionExecutor,
  CompletionVerifier,
  DecisionAgent,
  ObservationCapture,
} from './collaborators.js';
import { callWithRetry } from './retry.js';
import type { RetryPolicy } from './retry.js';

// ── Errors ───────────────────────────────────────────────────

export class InvalidActionError extends Error {
  constructor(action: string, allowed: readonly string[]) {
    super(`Action "${action}" is not one of: ${allowed.join(', ')}`);
    this.name = 'InvalidActionError';
  }
}

// ── Public types ─────────────────────────────────────────────

export interface AttemptRunnerDeps {
  agent: DecisionAgent;
  executor: ActionExecutor;
  capture: ObservationCapture;
  verifier: CompletionVerifier;
  frames: FrameStore;
  retry: RetryPolicy;
  sink: TraceSink;
  actions?: readonly Action[] | undefined;
  clock?: (() => Date) | undefined;
}

/** The single seam the sequencer drives. */
export interface AttemptExecutor {
  execute(
    subtask: Subtask,
    attemptIndex: number,
    params: Params,
    history: readonly SealedAttempt[],
  ): Promise<Attempt>;
}

// ── Runner ───────────────────────────────────────────────────

/**
 * One attempt, always in this order:
 *   capture before → decide → execute → capture after → verify → stamp.
 *
 * Decision and verifier calls get bounded retries under the same attempt
 * index. Once those run out, or execution/capture throws, the attempt is
 * still returned, with complete=false and a `failure` entry, and the
 * steps after the failing one are skipped (the after-frame is always
 * taken when a before-frame exists). Frame-store errors are not caught.
 */
export class AttemptRunner implements AttemptExecutor {
  private readonly deps: AttemptRunnerDeps;
  private readonly actions: readonly Action[];
  private readonly clock: () => Date;
  private inFlight = false;

  constructor(deps: AttemptRunnerDeps) {
    this.deps = deps;
    this.actions = deps.actions ?? ACTIONS;
    this.clock = deps.clock ?? (() => new Date());
  }

  async execute(
    subtask: Subtask,
    attemptIndex: number,
    params: Params,
    history: readonly SealedAttempt[],
  ): Promise<Attempt> {
    if (this.inFlight) {
      throw new Error('AttemptRunner.execute called while another attempt is in flight');
    }
    this.inFlight = true;
    try {
      return await this.run(subtask, attemptIndex, { ...params }, history);
    } finally {
      this.inFlight = false;
    }
  }

  private async run(
    subtask: Subtask,
    attemptIndex: number,
    params: Params,
    history: readonly SealedAttempt[],
  ): Promise<Attempt> {
    const { capture, executor, frames } = this.deps;
    const subtaskId = subtask.name;
    const startedAt = this.clock().toISOString();

    let failure: AttemptFailure | null = null;
    let chosenAction: Action | null = null;
    let agentReason: string | null = null;
    let execution: ExecutionReport | null = null;
    let verifierResult: VerifierResult | null = null;
    let beforeFrameRef: string | null = null;
    let afterFrameRef: string | null = null;

    // ── 1. Before frame ──────────────────────────────────────

    let beforeFrame: Frame | null = null;
    try {
      beforeFrame = await capture.capture();
    } catch (err) {
      failure = failed('capture', err, 1);
    }
    if (beforeFrame) {
      beforeFrameRef = await frames.saveFrame(subtaskId, attemptIndex, 'before', beforeFrame);
    }

    // ── 2. Decide ────────────────────────────────────────────

    if (!failure) {
      const outcome = await callWithRetry(
        async (signal) => {
          const decision = await this.deps.agent.chooseAction({
            subtaskId,
            instruction: subtask.instruction,
            successCriteria: subtask.successCriteria,
            params: { ...params },
            attemptIndex,
            allowedActions: this.actions,
            recentHistory: history,
            signal,
          });
          return { action: this.toAction(decision.action), reason: decision.reason };
        },
        this.deps.retry,
        'decision',
        (tryNumber, error) => this.emitRetry(subtaskId, attemptIndex, 'decision', tryNumber, error),
      );

      if (outcome.ok) {
        chosenAction = outcome.value.action;
        agentReason = outcome.value.reason;
        this.deps.sink.emit({
          type: 'action_chosen',
          subtaskId,
          attemptIndex,
          action: chosenAction,
          reason: agentReason,
        });
      } else {
        failure = failed('decision', outcome.error, outcome.tries);
      }
    }

    // ── 3. Execute ───────────────────────────────────────────
    // Not retried: motion is not idempotent.

    if (!failure && chosenAction) {
      try {
        execution = await executor.execute(chosenAction, params, subtask);
      } catch (err) {
        failure = failed('execution', err, 1);
      }
    }

    // ── 4. After frame ───────────────────────────────────────

    let afterFrame: Frame | null = null;
    if (beforeFrame) {
      try {
        afterFrame = await capture.capture();
      } catch (err) {
        failure ??= failed('capture', err, 1);
      }
    }
    if (afterFrame) {
      afterFrameRef = await frames.saveFrame(subtaskId, attemptIndex, 'after', afterFrame);
    }

    // ── 5. Verify ────────────────────────────────────────────

    if (!failure && beforeFrame && afterFrame) {
      const input = {
        subtaskId,
        beforeFrame,
        afterFrame,
        instruction: subtask.instruction,
        successCriteria: subtask.successCriteria,
        params: { ...params },
      };
      const outcome = await callWithRetry(
        async (signal) => verifierResultSchema.parse(await this.deps.verifier.check({ ...input, signal })),
        this.deps.retry,
        'verification',
        (tryNumber, error) => this.emitRetry(subtaskId, attemptIndex, 'verification', tryNumber, error),
      );

      if (outcome.ok) {
        verifierResult = outcome.value;
      } else {
        failure = failed('verification', outcome.error, outcome.tries);
      }
    }

    // ── 6. Stamp ─────────────────────────────────────────────

    return {
      subtaskId,
      attemptIndex,
      chosenAction,
      agentReason,
      paramsUsed: params,
      beforeFrameRef,
      afterFrameRef,
      execution,
      verifierResult: verifierResult ?? failureResult(failure),
      failure,
      startedAt,
      finishedAt: this.clock().toISOString(),
    };
  }

  private toAction(raw: string): Action {
    const parsed = actionSchema.safeParse(raw);
    if (!parsed.success || !this.actions.includes(parsed.data)) {
      throw new InvalidActionError(raw, this.actions);
    }
    return parsed.data;
  }

  private emitRetry(
    subtaskId: string,
    attemptIndex: number,
    stage: FailureStage,
    tryNumber: number,
    error: Error,
  ): void {
    this.deps.sink.emit({
      type: 'collaborator_retry',
      subtaskId,
      attemptIndex,
      stage,
      tryNumber,
      error: error.message,
    });
  }
}

// ── Failure records ──────────────────────────────────────────

function failed(stage: FailureStage, err: unknown, tries: number): AttemptFailure {
  const message = err instanceof Error ? err.message : String(err);
  return { stage, message, tries };
}

export function failureResult(failure: AttemptFailure | null): VerifierResult {
  if (!failure) {
    return { complete: false, rationale: 'verification skipped', failureMode: 'verification_skipped' };
  }
  return {
    complete: false,
    rationale: `${failure.stage} failed: ${failure.message}`,
    failureMode: `${failure.stage}_error`,
  };
}
