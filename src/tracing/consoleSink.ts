import * as log from '../utils/logger.js';
import type { TraceEvent, TraceSink } from './sink.js';

/** Renders trace events as live stderr output. */
export class ConsoleTraceSink implements TraceSink {
  private maxAttempts = 0;

  emit(event: TraceEvent): void {
    switch (event.type) {
      case 'run_started':
        log.section(`Task: ${event.taskName}`);
        log.info(`Run ${event.runId} → ${event.runDir}`);
        break;
      case 'subtask_started':
        log.subtask(event.index, event.total, event.subtaskId);
        break;
      case 'attempt_started':
        this.maxAttempts = event.maxAttempts;
        break;
      case 'action_chosen':
        log.attempt(event.attemptIndex, this.maxAttempts, event.action);
        log.detail(event.reason);
        break;
      case 'collaborator_retry':
        log.retry(event.stage, event.tryNumber, event.error);
        break;
      case 'attempt_sealed':
        if (event.attempt.failure) {
          log.warn(`attempt ${String(event.attempt.attemptIndex)} failed at ${event.attempt.failure.stage}`);
        }
        log.attemptResult(
          event.attempt.attemptIndex,
          event.attempt.verifierResult.complete,
          event.attempt.verifierResult.rationale,
        );
        break;
      case 'subtask_finished':
        log.info(`${event.subtaskId}: ${event.state} after ${String(event.attemptCount)} attempt(s)`);
        break;
      case 'run_finished':
        log.info(`Run ${event.runId} finished: ${event.status}`);
        break;
    }
  }

  async close(): Promise<void> {}
}
