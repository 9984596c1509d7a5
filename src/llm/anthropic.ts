import Anthropic from '@anthropic-ai/sdk';

import type { CallOptions, ImageInput, LLMClient } from './client.js';
import { LIMITS } from '../config/defaults.js';
import * as log from '../utils/logger.js';

// ── Constants ────────────────────────────────────────────────

const DEFAULT_MODEL = 'claude-sonnet-4-5-20250929';
const MAX_TOKENS = 1024;

// ── Rate-limit-aware wrapper ────────────────────────────────

function isRateLimitError(err: unknown): boolean {
  if (err instanceof Anthropic.RateLimitError) return true;
  if (err instanceof Error && err.message.includes('429')) return true;
  return false;
}

async function withRetry<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
  for (let attempt = 0; attempt < LIMITS.MAX_LLM_RETRIES; attempt++) {
    signal?.throwIfAborted();
    try {
      return await fn();
    } catch (err) {
      if (!isRateLimitError(err) || attempt === LIMITS.MAX_LLM_RETRIES - 1) throw err;

      const waitMs = (attempt + 1) * 5000;
      log.warn(`Rate limited, waiting ${String(Math.round(waitMs / 1000))}s...`);
      await new Promise((r) => setTimeout(r, waitMs));
    }
  }

  throw new Error('Anthropic API: max retries exceeded due to rate limiting');
}

function firstText(response: Anthropic.Message): string {
  const firstBlock = response.content[0];
  if (!firstBlock || firstBlock.type !== 'text') {
    throw new Error('Anthropic API returned no text content');
  }
  return firstBlock.text;
}

// ── Provider factory ─────────────────────────────────────────

export function createAnthropicClient(
  apiKey: string,
  model?: string,
  timeoutMs?: number,
): LLMClient {
  const resolvedModel = model ?? DEFAULT_MODEL;
  const client = new Anthropic({
    apiKey,
    ...(timeoutMs !== undefined ? { timeout: timeoutMs } : {}),
  });

  return {
    async generate(
      systemPrompt: string,
      userPrompt: string,
      options?: CallOptions,
    ): Promise<string> {
      const signal = options?.signal;
      const response = await withRetry(
        () =>
          client.messages.create(
            {
              model: resolvedModel,
              max_tokens: MAX_TOKENS,
              system: systemPrompt,
              messages: [{ role: 'user', content: userPrompt }],
              temperature: 0,
            },
            { signal },
          ),
        signal,
      );

      return firstText(response);
    },

    async generateWithImages(
      systemPrompt: string,
      userPrompt: string,
      images: readonly ImageInput[],
      options?: CallOptions,
    ): Promise<string> {
      const signal = options?.signal;
      const content: (Anthropic.TextBlockParam | Anthropic.ImageBlockParam)[] = [
        { type: 'text', text: userPrompt },
      ];
      for (const image of images) {
        if (image.label) {
          content.push({ type: 'text', text: `Image label: ${image.label}` });
        }
        content.push({
          type: 'image',
          source: {
            type: 'base64',
            media_type: image.mimeType,
            data: image.base64,
          },
        });
      }

      const response = await withRetry(
        () =>
          client.messages.create(
            {
              model: resolvedModel,
              max_tokens: MAX_TOKENS,
              system: systemPrompt,
              messages: [{ role: 'user', content }],
              temperature: 0,
            },
            { signal },
          ),
        signal,
      );

      return firstText(response);
    },
  };
}
