import { z } from 'zod';

import type { CallOptions, ImageInput, LLMClient } from './client.js';
import { LIMITS } from '../config/defaults.js';
import * as log from '../utils/logger.js';

// ── Constants ────────────────────────────────────────────────

const DEFAULT_MODEL = 'gpt-4o-mini';
const COMPLETIONS_URL = 'https://api.openai.com/v1/chat/completions';

// ── Response validation ──────────────────────────────────────

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      }),
    )
    .nonempty(),
});

// ── Rate-limit-aware fetch ───────────────────────────────────

async function fetchWithRetry(
  url: string,
  init: RequestInit,
  timeoutMs: number | undefined,
  signal: AbortSignal | undefined,
): Promise<Response> {
  for (let attempt = 0; attempt < LIMITS.MAX_LLM_RETRIES; attempt++) {
    signal?.throwIfAborted();
    const signals = [
      ...(signal ? [signal] : []),
      ...(timeoutMs !== undefined ? [AbortSignal.timeout(timeoutMs)] : []),
    ];
    const response = await fetch(url, {
      ...init,
      ...(signals.length > 0 ? { signal: AbortSignal.any(signals) } : {}),
    });

    if (response.status === 429) {
      const retryAfter = response.headers.get('retry-after');
      const waitMs = retryAfter
        ? parseFloat(retryAfter) * 1000
        : (attempt + 1) * 5000;
      log.warn(`Rate limited, waiting ${String(Math.round(waitMs / 1000))}s...`);
      await new Promise((r) => setTimeout(r, waitMs));
      continue;
    }

    if (!response.ok) {
      const body = await response.text();
      throw new Error(
        `OpenAI API error (${String(response.status)}): ${body}`,
      );
    }

    return response;
  }

  throw new Error('OpenAI API: max retries exceeded due to rate limiting');
}

// ── Provider factory ─────────────────────────────────────────

export function createOpenAIClient(
  apiKey: string,
  model?: string,
  timeoutMs?: number,
): LLMClient {
  const resolvedModel = model ?? DEFAULT_MODEL;

  async function complete(
    messages: readonly unknown[],
    signal: AbortSignal | undefined,
  ): Promise<string> {
    const response = await fetchWithRetry(
      COMPLETIONS_URL,
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${apiKey}`,
        },
        body: JSON.stringify({
          model: resolvedModel,
          messages,
          temperature: 0,
          response_format: { type: 'json_object' },
        }),
      },
      timeoutMs,
      signal,
    );

    const raw = await response.text();
    const body: unknown = JSON.parse(raw);
    const parsed = chatResponseSchema.parse(body);

    return parsed.choices[0].message.content;
  }

  return {
    async generate(
      systemPrompt: string,
      userPrompt: string,
      options?: CallOptions,
    ): Promise<string> {
      return complete(
        [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userPrompt },
        ],
        options?.signal,
      );
    },

    async generateWithImages(
      systemPrompt: string,
      userPrompt: string,
      images: readonly ImageInput[],
      options?: CallOptions,
    ): Promise<string> {
      const content: unknown[] = [{ type: 'text', text: userPrompt }];
      for (const image of images) {
        if (image.label) {
          content.push({ type: 'text', text: `Image label: ${image.label}` });
        }
        content.push({
          type: 'image_url',
          image_url: { url: `data:${image.mimeType};base64,${image.base64}` },
        });
      }

      return complete(
        [
          { role: 'system', content: systemPrompt },
          { role: 'user', content },
        ],
        options?.signal,
      );
    },
  };
}
