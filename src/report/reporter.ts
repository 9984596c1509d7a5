import type {
  Attempt,
  RunRecord,
  RunStatus,
  SubtaskOutcome,
} from '../schema/index.js';
import { JSON_OUTPUT_VERSION, exitCodeForStatus } from '../schema/index.js';
import type {
  JsonOutput,
  JsonOutputAttempt,
  JsonOutputSubtask,
} from '../schema/index.js';

// Re-export contract types for consumers
export type { JsonOutput, JsonOutputAttempt, JsonOutputSubtask };

// ── JSON generator ───────────────────────────────────────────

export function generateJSON(run: RunRecord): JsonOutput {
  return {
    version: JSON_OUTPUT_VERSION,
    status: run.status,
    runId: run.runId,
    taskName: run.taskName,
    runDir: run.runDir,
    durationMs: run.durationMs,
    exitCode: exitCodeForStatus(run.status),
    subtasks: run.outcomes.map(outcomeToJSON),
    attempts: run.attempts.map(attemptToJSON),
  };
}

function outcomeToJSON(outcome: SubtaskOutcome): JsonOutputSubtask {
  return {
    subtaskId: outcome.subtaskId,
    state: outcome.state,
    attemptCount: outcome.attemptCount,
    cancelled: outcome.cancelled,
  };
}

function attemptToJSON(attempt: Attempt): JsonOutputAttempt {
  return {
    subtaskId: attempt.subtaskId,
    attemptIndex: attempt.attemptIndex,
    action: attempt.chosenAction,
    complete: attempt.verifierResult.complete,
    confidence: attempt.verifierResult.confidence ?? null,
    rationale: attempt.verifierResult.rationale,
    failureStage: attempt.failure?.stage ?? null,
    beforeFrame: attempt.beforeFrameRef,
    afterFrame: attempt.afterFrameRef,
  };
}

// ── Markdown generator ───────────────────────────────────────

export function generateMarkdown(run: RunRecord): string {
  const lines: string[] = [];

  // Header + metadata
  lines.push(`# Run Report: ${run.taskName}`);
  lines.push('');
  lines.push(`| Field | Value |`);
  lines.push(`|-------|-------|`);
  lines.push(`| **Run ID** | \`${run.runId}\` |`);
  lines.push(`| **Started** | ${run.startedAt} |`);
  lines.push(`| **Finished** | ${run.finishedAt} |`);
  lines.push(`| **Duration** | ${formatDuration(run.durationMs)} |`);
  lines.push(`| **Result** | **${run.status}** ${statusIcon(run.status)} |`);
  lines.push('');

  // Subtask summary table
  lines.push(`## Subtasks`);
  lines.push('');
  lines.push(`| Subtask | State | Attempts |`);
  lines.push(`|---------|-------|----------|`);

  for (const outcome of run.outcomes) {
    const state = outcome.cancelled ? `${outcome.state} (cancelled)` : outcome.state;
    lines.push(
      `| ${escapeMarkdownCell(outcome.subtaskId)} | ${state} | ${String(outcome.attemptCount)} |`,
    );
  }

  lines.push('');

  // Per-attempt details
  lines.push(`## Attempts`);
  lines.push('');

  for (const attempt of run.attempts) {
    const verdict = attempt.verifierResult.complete ? '[DONE]' : '[RETRY]';
    lines.push(
      `### ${attempt.subtaskId} #${String(attempt.attemptIndex)} ${verdict}`,
    );
    lines.push('');
    lines.push(`- **Action:** ${attempt.chosenAction ?? 'none'}`);
    if (attempt.agentReason) {
      lines.push(`- **Agent reason:** ${attempt.agentReason}`);
    }
    lines.push(`- **Params:** \`${JSON.stringify(attempt.paramsUsed)}\``);
    lines.push(`- **Rationale:** ${attempt.verifierResult.rationale}`);
    if (attempt.verifierResult.confidence !== undefined) {
      lines.push(`- **Confidence:** ${formatConfidence(attempt.verifierResult.confidence)}`);
    }
    if (attempt.execution) {
      lines.push(
        `- **Execution:** ${String(attempt.execution.steps)} steps, ${attempt.execution.terminatedReason}`,
      );
    }
    if (attempt.failure) {
      lines.push(
        `- **Failure:** ${attempt.failure.stage} after ${String(attempt.failure.tries)} tries: ${attempt.failure.message}`,
      );
    }
    lines.push('');

    if (attempt.beforeFrameRef && attempt.afterFrameRef) {
      lines.push(`![before](${attempt.beforeFrameRef}) ![after](${attempt.afterFrameRef})`);
      lines.push('');
    }
  }

  return lines.join('\n');
}

// ── Helpers ──────────────────────────────────────────────────

function statusIcon(status: RunStatus): string {
  switch (status) {
    case 'success':
      return '[PASS]';
    case 'fail':
      return '[FAIL]';
    case 'cancelled':
      return '[CANCELLED]';
  }
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`;
  const seconds = (ms / 1000).toFixed(1);
  return `${seconds}s`;
}

function formatConfidence(value: number): string {
  return `${String(Math.round(value * 100))}%`;
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}
