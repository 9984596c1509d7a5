import { z } from 'zod';

import { paramsSchema } from './task.js';

// ── Subtask entry ───────────────────────────────────────────

export const subtaskEntrySchema = z.object({
  name: z.string().min(1),
  instruction: z.string().min(1),
  successCriteria: z.string().min(1),
  params: paramsSchema.optional().default({}),
  maxAttempts: z.number().int().min(1).optional(),
  maxAttemptSeconds: z.number().positive().optional(),
});

export type SubtaskEntry = z.infer<typeof subtaskEntrySchema>;

// ── Collaborator blocks ─────────────────────────────────────

export const llmProviderSchema = z.enum(['anthropic', 'openai', 'mock']);

export type LLMProvider = z.infer<typeof llmProviderSchema>;

export const agentConfigSchema = z.object({
  type: z.enum(['rule_based', 'llm']).optional().default('rule_based'),
  provider: llmProviderSchema.optional(),
  model: z.string().min(1).optional(),
});

export type AgentConfig = z.infer<typeof agentConfigSchema>;

export const verifierConfigSchema = z.object({
  type: z.enum(['stub', 'llm']).optional().default('stub'),
  crossingMarginPx: z.number().int().nonnegative().optional().default(4),
  jitter: z.boolean().optional().default(false),
  provider: llmProviderSchema.optional(),
  model: z.string().min(1).optional(),
});

export type VerifierConfig = z.infer<typeof verifierConfigSchema>;

export const envConfigSchema = z.object({
  controlHz: z.number().int().positive().optional().default(50),
  armLimit: z.number().positive().optional().default(1),
  initialArmPos: z.number().optional().default(-0.6),
});

export type EnvConfig = z.infer<typeof envConfigSchema>;

export const collaboratorConfigSchema = z.object({
  retries: z.number().int().nonnegative().optional().default(2),
  timeoutMs: z.number().int().positive().optional().default(30_000),
  retryDelayMs: z.number().int().nonnegative().optional().default(500),
});

export type CollaboratorConfig = z.infer<typeof collaboratorConfigSchema>;

export const tracingConfigSchema = z.object({
  enabled: z.boolean().optional().default(false),
  path: z.string().min(1).optional(),
});

export type TracingConfig = z.infer<typeof tracingConfigSchema>;

// ── Full config file ────────────────────────────────────────
// haltOnExhaustion has no default: a run either stops at the first
// exhausted subtask or carries on, and the config must say which.

export const fileConfigSchema = z.object({
  task: z.object({
    name: z.string().min(1),
    subtasks: z.array(subtaskEntrySchema).min(1),
  }),
  haltOnExhaustion: z.boolean(),
  runDir: z.string().min(1).optional().default('runs'),
  verbose: z.boolean().optional().default(false),
  agent: agentConfigSchema.optional().default({}),
  verifier: verifierConfigSchema.optional().default({}),
  env: envConfigSchema.optional().default({}),
  collaborator: collaboratorConfigSchema.optional().default({}),
  tracing: tracingConfigSchema.optional().default({}),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;
