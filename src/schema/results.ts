import { z } from 'zod';

import { attemptSchema } from './attempt.js';

// ── Subtask terminal state ───────────────────────────────────

export const subtaskStateSchema = z.enum([
  'PENDING',
  'RUNNING',
  'COMPLETED',
  'EXHAUSTED',
]);

export type SubtaskState = z.infer<typeof subtaskStateSchema>;

export const terminalStateSchema = z.enum(['COMPLETED', 'EXHAUSTED']);

export type TerminalState = z.infer<typeof terminalStateSchema>;

export const subtaskOutcomeSchema = z.object({
  subtaskId: z.string().min(1),
  state: terminalStateSchema,
  attemptCount: z.number().int().positive(),
  cancelled: z.boolean(),
});

export type SubtaskOutcome = z.infer<typeof subtaskOutcomeSchema>;

// ── RunRecord ────────────────────────────────────────────────

export const runStatusSchema = z.enum(['success', 'fail', 'cancelled']);

export type RunStatus = z.infer<typeof runStatusSchema>;

export const runRecordSchema = z.object({
  runId: z.string().min(1),
  taskName: z.string().min(1),
  status: runStatusSchema,
  runDir: z.string().min(1),
  stepsLog: z.string().min(1),
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  durationMs: z.number().int().nonnegative(),
  attempts: z.array(attemptSchema),
  outcomes: z.array(subtaskOutcomeSchema),
});

export type RunRecord = z.infer<typeof runRecordSchema>;

// ── Deterministic run status ─────────────────────────────────
// Any cancellation wins; otherwise every subtask of the task must be
// COMPLETED for the run to count as a success.

export function computeRunStatus(
  outcomes: readonly SubtaskOutcome[],
  subtaskCount: number,
): RunStatus {
  if (outcomes.some((o) => o.cancelled)) return 'cancelled';
  if (outcomes.length < subtaskCount) return 'fail';
  return outcomes.every((o) => o.state === 'COMPLETED') ? 'success' : 'fail';
}

export function parseRunRecord(data: unknown): RunRecord {
  return runRecordSchema.parse(data);
}

// ── Exit codes ───────────────────────────────────────────────

export const EXIT_CODES = {
  success: 0,
  fail: 1,
  cancelled: 2,
  error: 4,
} as const;

export function exitCodeForStatus(status: RunStatus): number {
  return EXIT_CODES[status];
}
