import { z } from 'zod';

import { llmProviderSchema } from '../schema/config.js';

export { llmProviderSchema };
export type { LLMProvider } from '../schema/config.js';

// ── LLMClient interface ──────────────────────────────────────

export interface ImageInput {
  /** Base64 payload without the data: prefix. */
  base64: string;
  mimeType: 'image/png' | 'image/jpeg';
  /** Text placed immediately before the image, e.g. "BEFORE". */
  label?: string | undefined;
}

export interface CallOptions {
  /** Cancels the outbound request. */
  signal?: AbortSignal | undefined;
}

export interface LLMClient {
  generate(systemPrompt: string, userPrompt: string, options?: CallOptions): Promise<string>;
  generateWithImages?(
    systemPrompt: string,
    userPrompt: string,
    images: readonly ImageInput[],
    options?: CallOptions,
  ): Promise<string>;
}

// ── Config schema ────────────────────────────────────────────

export const llmConfigSchema = z.object({
  provider: llmProviderSchema,
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().optional(),
});

export type LLMConfig = z.infer<typeof llmConfigSchema>;

// ── Env loader ───────────────────────────────────────────────

export interface LLMOverrides {
  provider?: string | undefined;
  model?: string | undefined;
  timeoutMs?: number | undefined;
}

/**
 * Resolve provider credentials from the environment.
 * Config-file values in `overrides` take precedence over env values.
 */
export function loadLLMConfig(
  overrides: LLMOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): LLMConfig {
  const provider = overrides.provider ?? env['LLM_PROVIDER'] ?? 'anthropic';

  const apiKey = provider === 'anthropic'
    ? env['ANTHROPIC_API_KEY']
    : env['OPENAI_API_KEY'];

  const model = overrides.model ?? env['ORCHESTRATOR_MODEL'];

  return llmConfigSchema.parse({
    provider,
    apiKey: apiKey || undefined,
    model: model || undefined,
    timeoutMs: overrides.timeoutMs,
  });
}
