import type { FailureStage, RunStatus, SealedAttempt, TerminalState } from '../schema/index.js';

// ── Trace events ─────────────────────────────────────────────

export type TraceEvent =
  | { type: 'run_started'; runId: string; taskName: string; subtaskCount: number; runDir: string }
  | { type: 'subtask_started'; subtaskId: string; index: number; total: number; maxAttempts: number }
  | { type: 'attempt_started'; subtaskId: string; attemptIndex: number; maxAttempts: number }
  | { type: 'action_chosen'; subtaskId: string; attemptIndex: number; action: string; reason: string }
  | {
      type: 'collaborator_retry';
      subtaskId: string;
      attemptIndex: number;
      stage: FailureStage;
      tryNumber: number;
      error: string;
    }
  | { type: 'attempt_sealed'; attempt: SealedAttempt }
  | { type: 'subtask_finished'; subtaskId: string; state: TerminalState; attemptCount: number }
  | { type: 'run_finished'; runId: string; status: RunStatus };

export type TraceEventType = TraceEvent['type'];

// ── Sink interface ───────────────────────────────────────────

/**
 * Destination for trace events. Passed explicitly into the orchestrator;
 * emit() must never throw into the control loop.
 */
export interface TraceSink {
  emit(event: TraceEvent): void;
  close(): Promise<void>;
}

// ── Built-in sinks ───────────────────────────────────────────

export class NoopTraceSink implements TraceSink {
  emit(_event: TraceEvent): void {}

  async close(): Promise<void> {}
}

/** Forwards every event to each child sink in order. */
export class FanoutTraceSink implements TraceSink {
  private readonly sinks: readonly TraceSink[];

  constructor(sinks: readonly TraceSink[]) {
    this.sinks = sinks;
  }

  emit(event: TraceEvent): void {
    for (const sink of this.sinks) {
      sink.emit(event);
    }
  }

  async close(): Promise<void> {
    await Promise.all(this.sinks.map((sink) => sink.close()));
  }
}

/** Keeps events in memory. Handy for tests and for post-run inspection. */
export class MemoryTraceSink implements TraceSink {
  readonly events: TraceEvent[] = [];

  emit(event: TraceEvent): void {
    this.events.push(event);
  }

  async close(): Promise<void> {}

  ofType<K extends TraceEventType>(type: K): Extract<TraceEvent, { type: K }>[] {
    return this.events.filter(
      (event): event is Extract<TraceEvent, { type: K }> => event.type === type,
    );
  }
}
