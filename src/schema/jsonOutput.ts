import { z } from 'zod';

import { actionSchema } from './task.js';
import { runStatusSchema, terminalStateSchema } from './results.js';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const JSON_OUTPUT_VERSION = '1.0' as const;

// ── Attempt output ──────────────────────────────────────────

export const jsonOutputAttemptSchema = z.object({
  subtaskId: z.string().min(1),
  attemptIndex: z.number().int().positive(),
  action: actionSchema.nullable(),
  complete: z.boolean(),
  confidence: z.number().min(0).max(1).nullable(),
  rationale: z.string(),
  failureStage: z.string().nullable(),
  beforeFrame: z.string().nullable(),
  afterFrame: z.string().nullable(),
});

export type JsonOutputAttempt = z.infer<typeof jsonOutputAttemptSchema>;

// ── Subtask output ──────────────────────────────────────────

export const jsonOutputSubtaskSchema = z.object({
  subtaskId: z.string().min(1),
  state: terminalStateSchema,
  attemptCount: z.number().int().positive(),
  cancelled: z.boolean(),
});

export type JsonOutputSubtask = z.infer<typeof jsonOutputSubtaskSchema>;

// ── Root output ─────────────────────────────────────────────

export const jsonOutputSchema = z.object({
  version: z.literal(JSON_OUTPUT_VERSION),
  status: runStatusSchema,
  runId: z.string().min(1),
  taskName: z.string().min(1),
  runDir: z.string(),
  durationMs: z.number().int().nonnegative(),
  exitCode: z.number().int().nonnegative(),
  subtasks: z.array(jsonOutputSubtaskSchema),
  attempts: z.array(jsonOutputAttemptSchema),
});

export type JsonOutput = z.infer<typeof jsonOutputSchema>;
