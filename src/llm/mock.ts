import type { ImageInput, LLMClient } from './client.js';

const DEFAULT_RESPONSE = '{"result":"mock"}';

/**
 * Mock LLM provider for testing.
 * Cycles through provided canned responses, falling back to a default.
 * Text and vision calls share one response queue.
 */
export function createMockClient(
  responses?: readonly string[],
): LLMClient {
  let callIndex = 0;

  function next(): string {
    const response = responses?.[callIndex] ?? DEFAULT_RESPONSE;
    callIndex++;
    return response;
  }

  return {
    async generate(
      _systemPrompt: string,
      _userPrompt: string,
    ): Promise<string> {
      return next();
    },

    async generateWithImages(
      _systemPrompt: string,
      _userPrompt: string,
      _images: readonly ImageInput[],
    ): Promise<string> {
      return next();
    },
  };
}
