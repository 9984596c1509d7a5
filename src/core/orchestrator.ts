import { randomUUID } from 'node:crypto';

import { LIMITS, TIMEOUTS } from '../config/defaults.js';
import { generateMarkdown } from '../report/reporter.js';
import { RunLog } from '../runlog/index.js';
import type {
  Action,
  RunRecord,
  SealedAttempt,
  SubtaskOutcome,
  Task,
} from '../schema/index.js';
import { computeRunStatus, parseTask } from '../schema/index.js';
import { NoopTraceSink } from '../tracing/index.js';
import type { TraceSink } from '../tracing/index.js';
import { AttemptRunner } from './attemptRunner.js';
import type {
  ActionExecutor,
  CompletionVerifier,
  DecisionAgent,
  ObservationCapture,
} from './collaborators.js';
import type { RetryPolicy } from './retry.js';
import { SubtaskSequencer } from './sequencer.js';

// ── Public types ─────────────────────────────────────────────

export interface OrchestratorOptions {
  agent: DecisionAgent;
  executor: ActionExecutor;
  capture: ObservationCapture;
  verifier: CompletionVerifier;
  /** Parent directory; each run gets its own timestamped subdirectory. */
  runDir: string;
  /** Stop the task at the first EXHAUSTED subtask. Required, no default. */
  haltOnExhaustion: boolean;
  retry?: Partial<RetryPolicy> | undefined;
  sink?: TraceSink | undefined;
  actions?: readonly Action[] | undefined;
  clock?: (() => Date) | undefined;
  newRunId?: (() => string) | undefined;
}

export interface RunOptions {
  signal?: AbortSignal | undefined;
}

// ── Orchestrator ─────────────────────────────────────────────

export class Orchestrator {
  private readonly options: OrchestratorOptions;
  private readonly sink: TraceSink;
  private readonly clock: () => Date;
  private readonly retry: RetryPolicy;

  constructor(options: OrchestratorOptions) {
    this.options = options;
    this.sink = options.sink ?? new NoopTraceSink();
    this.clock = options.clock ?? (() => new Date());
    this.retry = {
      retries: options.retry?.retries ?? LIMITS.COLLABORATOR_RETRIES,
      timeoutMs: options.retry?.timeoutMs ?? TIMEOUTS.COLLABORATOR_CALL_TIMEOUT,
      retryDelayMs: options.retry?.retryDelayMs ?? TIMEOUTS.RETRY_WAIT,
    };
  }

  async run(input: Task, runOptions: RunOptions = {}): Promise<RunRecord> {
    // Rejects duplicate subtask names before anything touches disk.
    const task = parseTask(input);
    const runId = (this.options.newRunId ?? randomUUID)();
    const startedAt = this.clock();

    // ── 1. Open the run log (fatal on failure) ───────────────

    const log = await RunLog.create({
      baseDir: this.options.runDir,
      runId,
      taskName: task.name,
      now: startedAt,
    });

    try {
      this.sink.emit({
        type: 'run_started',
        runId,
        taskName: task.name,
        subtaskCount: task.subtasks.length,
        runDir: log.runDir,
      });

      const runner = new AttemptRunner({
        agent: this.options.agent,
        executor: this.options.executor,
        capture: this.options.capture,
        verifier: this.options.verifier,
        frames: log,
        retry: this.retry,
        sink: this.sink,
        actions: this.options.actions,
        clock: this.clock,
      });

      const attempts: SealedAttempt[] = [];
      const outcomes: SubtaskOutcome[] = [];

      // ── 2. Subtasks, strictly in order ─────────────────────

      for (const [index, subtask] of task.subtasks.entries()) {
        this.sink.emit({
          type: 'subtask_started',
          subtaskId: subtask.name,
          index: index + 1,
          total: task.subtasks.length,
          maxAttempts: subtask.maxAttempts,
        });

        const sequencer = new SubtaskSequencer({
          runner,
          log,
          sink: this.sink,
          signal: runOptions.signal,
          clock: this.clock,
        });
        const result = await sequencer.run(subtask);

        attempts.push(...result.attempts);
        outcomes.push({
          subtaskId: result.subtaskId,
          state: result.state,
          attemptCount: result.attempts.length,
          cancelled: result.cancelled,
        });

        this.sink.emit({
          type: 'subtask_finished',
          subtaskId: result.subtaskId,
          state: result.state,
          attemptCount: result.attempts.length,
        });

        if (result.cancelled) break;
        if (result.state === 'EXHAUSTED' && this.options.haltOnExhaustion) break;
      }

      // ── 3. Summary artifacts ───────────────────────────────

      const finishedAt = this.clock();
      const record: RunRecord = {
        runId,
        taskName: task.name,
        status: computeRunStatus(outcomes, task.subtasks.length),
        runDir: log.runDir,
        stepsLog: log.stepsPath,
        startedAt: startedAt.toISOString(),
        finishedAt: finishedAt.toISOString(),
        durationMs: Math.max(0, finishedAt.getTime() - startedAt.getTime()),
        attempts,
        outcomes,
      };

      await log.writeSummary(record);
      await log.writeReport(generateMarkdown(record));

      this.sink.emit({ type: 'run_finished', runId, status: record.status });
      return record;
    } finally {
      await log.close();
    }
  }
}
