import { z } from 'zod';

import { actionSchema, paramsSchema } from './task.js';

// ── VerifierResult ───────────────────────────────────────────

export const verifierResultSchema = z.object({
  complete: z.boolean(),
  /** Full parameter mapping for the next attempt; absent means carry forward. */
  updatedParams: paramsSchema.optional(),
  rationale: z.string(),
  confidence: z.number().min(0).max(1).optional(),
  failureMode: z.string().optional(),
});

export type VerifierResult = z.infer<typeof verifierResultSchema>;

// ── ExecutionReport ──────────────────────────────────────────

export const executionReportSchema = z.object({
  ok: z.boolean(),
  steps: z.number().int().nonnegative(),
  terminatedReason: z.string().min(1),
  telemetry: z.record(z.number().nullable()),
});

export type ExecutionReport = z.infer<typeof executionReportSchema>;

// ── AttemptFailure ───────────────────────────────────────────

export const failureStageSchema = z.enum([
  'decision',
  'execution',
  'capture',
  'verification',
  'cancelled',
]);

export type FailureStage = z.infer<typeof failureStageSchema>;

export const attemptFailureSchema = z.object({
  stage: failureStageSchema,
  message: z.string(),
  tries: z.number().int().nonnegative(),
});

export type AttemptFailure = z.infer<typeof attemptFailureSchema>;

// ── Attempt ──────────────────────────────────────────────────

export const attemptSchema = z.object({
  subtaskId: z.string().min(1),
  attemptIndex: z.number().int().positive(),
  chosenAction: actionSchema.nullable(),
  agentReason: z.string().nullable(),
  paramsUsed: paramsSchema,
  beforeFrameRef: z.string().nullable(),
  afterFrameRef: z.string().nullable(),
  execution: executionReportSchema.nullable(),
  verifierResult: verifierResultSchema,
  failure: attemptFailureSchema.nullable(),
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
});

export type Attempt = z.infer<typeof attemptSchema>;

/** A sealed attempt. Frozen all the way down; the run log only ever sees these. */
export type SealedAttempt = DeepReadonly<Attempt>;

type DeepReadonly<T> = T extends (infer U)[]
  ? readonly DeepReadonly<U>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export function sealAttempt(attempt: Attempt): SealedAttempt {
  return deepFreeze(attempt);
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

// ── Run log entry (one JSONL line) ───────────────────────────

export const runLogEntrySchema = attemptSchema.extend({
  runId: z.string().min(1),
  taskName: z.string().min(1),
});

export type RunLogEntry = z.infer<typeof runLogEntrySchema>;
