import type { AttemptLog } from '../runlog/index.js';
import type {
  Attempt,
  Params,
  SealedAttempt,
  Subtask,
  SubtaskState,
  TerminalState,
} from '../schema/index.js';
import { sealAttempt } from '../schema/index.js';
import type { TraceSink } from '../tracing/index.js';
import type { AttemptExecutor } from './attemptRunner.js';

// ── Public types ─────────────────────────────────────────────

export interface SequencerDeps {
  runner: AttemptExecutor;
  log: Pick<AttemptLog, 'append'>;
  sink: TraceSink;
  signal?: AbortSignal | undefined;
  clock?: (() => Date) | undefined;
}

export interface SubtaskRun {
  subtaskId: string;
  state: TerminalState;
  /** Sealed attempts in index order, 1..attemptCount. */
  attempts: readonly SealedAttempt[];
  cancelled: boolean;
}

// ── Sequencer ────────────────────────────────────────────────

/**
 * Drives one subtask: PENDING → RUNNING → COMPLETED | EXHAUSTED.
 *
 * Attempt k+1 starts only after attempt k is sealed and on disk. The
 * params for k+1 are the verifier's updatedParams from k, or k's params
 * unchanged when it proposed none.
 */
export class SubtaskSequencer {
  private readonly deps: SequencerDeps;
  private readonly clock: () => Date;
  private current: SubtaskState = 'PENDING';

  constructor(deps: SequencerDeps) {
    this.deps = deps;
    this.clock = deps.clock ?? (() => new Date());
  }

  get state(): SubtaskState {
    return this.current;
  }

  async run(subtask: Subtask): Promise<SubtaskRun> {
    if (this.current !== 'PENDING') {
      throw new Error(`Sequencer for ${subtask.name} already ${this.current}`);
    }
    this.current = 'RUNNING';

    const attempts: SealedAttempt[] = [];
    let params: Params = { ...subtask.initialParams };

    for (let attemptIndex = 1; attemptIndex <= subtask.maxAttempts; attemptIndex++) {
      if (this.deps.signal?.aborted) {
        await this.record(sealAttempt(this.cancelledAttempt(subtask, attemptIndex, params)), attempts);
        return this.finish(subtask, 'EXHAUSTED', attempts, true);
      }

      this.deps.sink.emit({
        type: 'attempt_started',
        subtaskId: subtask.name,
        attemptIndex,
        maxAttempts: subtask.maxAttempts,
      });

      const attempt = sealAttempt(
        await this.deps.runner.execute(subtask, attemptIndex, params, attempts),
      );
      await this.record(attempt, attempts);

      if (attempt.verifierResult.complete) {
        return this.finish(subtask, 'COMPLETED', attempts, false);
      }
      params = nextParams(attempt);
    }

    return this.finish(subtask, 'EXHAUSTED', attempts, false);
  }

  private async record(attempt: SealedAttempt, attempts: SealedAttempt[]): Promise<void> {
    await this.deps.log.append(attempt);
    attempts.push(attempt);
    this.deps.sink.emit({ type: 'attempt_sealed', attempt });
  }

  private finish(
    subtask: Subtask,
    state: TerminalState,
    attempts: readonly SealedAttempt[],
    cancelled: boolean,
  ): SubtaskRun {
    this.current = state;
    return { subtaskId: subtask.name, state, attempts, cancelled };
  }

  private cancelledAttempt(subtask: Subtask, attemptIndex: number, params: Params): Attempt {
    const now = this.clock().toISOString();
    return {
      subtaskId: subtask.name,
      attemptIndex,
      chosenAction: null,
      agentReason: null,
      paramsUsed: { ...params },
      beforeFrameRef: null,
      afterFrameRef: null,
      execution: null,
      verifierResult: {
        complete: false,
        rationale: 'cancelled: run aborted before this attempt started',
        failureMode: 'cancelled',
      },
      failure: { stage: 'cancelled', message: 'run aborted', tries: 0 },
      startedAt: now,
      finishedAt: now,
    };
  }
}

// ── Parameter carry-forward ──────────────────────────────────

export function nextParams(attempt: SealedAttempt): Params {
  return { ...(attempt.verifierResult.updatedParams ?? attempt.paramsUsed) };
}
