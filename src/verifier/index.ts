/**
 * Completion verifier module.
 * Judges from before/after frames whether a subtask's goal was met.
 */

import type { CompletionVerifier } from '../core/collaborators.js';
import type { LLMClient } from '../llm/index.js';
import type { VerifierConfig } from '../schema/index.js';
import { StubVerifier } from './stub.js';
import { LLMVisionVerifier } from './llmVision.js';

export { StubVerifier, locateMarker } from './stub.js';
export type { StubVerifierOptions } from './stub.js';
export { LLMVisionVerifier, VerifierResponseError } from './llmVision.js';
export { tryParseVerifierResponse, toVerifierResult } from './parse.js';

// ── Factory ──────────────────────────────────────────────────

export function createVerifier(
  config: VerifierConfig,
  makeClient: () => LLMClient,
): CompletionVerifier {
  switch (config.type) {
    case 'stub':
      return new StubVerifier({
        crossingMarginPx: config.crossingMarginPx,
        jitter: config.jitter,
      });
    case 'llm':
      return new LLMVisionVerifier(makeClient());
  }
}
