import { z } from 'zod';

import { paramsSchema } from './task.js';

// ── Agent decision (raw, before vocabulary check) ────────────

export const agentDecisionSchema = z.object({
  action: z.string().transform((a) => a.trim().toLowerCase()),
  reason: z
    .string()
    .optional()
    .transform((r) => (r?.trim() ? r.trim() : 'No reason provided')),
});

export type AgentDecision = z.output<typeof agentDecisionSchema>;

// ── Vision verifier response ─────────────────────────────────
// Shape the LLM verifier is asked to return; mapped onto VerifierResult.

export const verifierStatusSchema = z.enum(['success', 'fail', 'uncertain']);

export type VerifierStatus = z.infer<typeof verifierStatusSchema>;

export const verifierResponseSchema = z
  .object({
    status: verifierStatusSchema,
    confidence: z.number().min(0).max(1),
    failure_mode: z.string().nullable(),
    adjustment: paramsSchema.nullable(),
    notes: z.string().nullable(),
  })
  .strict();

export type VerifierResponse = z.infer<typeof verifierResponseSchema>;
