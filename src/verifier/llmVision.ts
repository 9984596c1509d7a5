import { readFile } from 'node:fs/promises';
import path from 'node:path';

import type { CompletionVerifier, VerifierInput } from '../core/collaborators.js';
import { encodePng } from '../env/frame.js';
import type { ImageInput, LLMClient } from '../llm/index.js';
import type { VerifierResult } from '../schema/index.js';
import { serializeJSON } from '../utils/json.js';
import * as log from '../utils/logger.js';
import { toVerifierResult, tryParseVerifierResponse } from './parse.js';

// ── Error ────────────────────────────────────────────────────

export class VerifierResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'VerifierResponseError';
  }
}

// ── Template paths ───────────────────────────────────────────

const PROMPTS_DIR = path.join(__dirname, '..', '..', 'prompts');

async function loadTemplate(name: string): Promise<string> {
  return readFile(path.join(PROMPTS_DIR, name), 'utf-8');
}

// ── Verifier ─────────────────────────────────────────────────

/**
 * Vision-LLM verifier. Sends the before/after frames as PNGs, validates
 * the JSON reply and asks once for a repaired reply if it is unusable.
 */
export class LLMVisionVerifier implements CompletionVerifier {
  readonly kind = 'llm';

  constructor(private readonly client: LLMClient) {}

  async check(input: VerifierInput): Promise<VerifierResult> {
    if (!this.client.generateWithImages) {
      throw new VerifierResponseError('LLM client does not support image input');
    }

    const systemPrompt = await loadTemplate('verifier.txt');
    const userPrompt = await buildUserPrompt(input);
    const images: ImageInput[] = [
      { label: 'BEFORE (before.png)', mimeType: 'image/png', base64: encodePng(input.beforeFrame).toString('base64') },
      { label: 'AFTER (after.png)', mimeType: 'image/png', base64: encodePng(input.afterFrame).toString('base64') },
    ];

    const options = { signal: input.signal };
    const raw = await this.client.generateWithImages(systemPrompt, userPrompt, images, options);

    const firstAttempt = tryParseVerifierResponse(raw);
    if (firstAttempt.ok) return toVerifierResult(firstAttempt.response, input.params);

    // Repair: one retry, text only
    log.warn(`Verifier parse failed, attempting repair: ${firstAttempt.error}`);
    const repairPrompt = await buildRepairPrompt(raw, firstAttempt.error);
    const repaired = await this.client.generate(systemPrompt, repairPrompt, options);

    const secondAttempt = tryParseVerifierResponse(repaired);
    if (secondAttempt.ok) return toVerifierResult(secondAttempt.response, input.params);

    throw new VerifierResponseError(
      `Verifier failed after repair attempt: ${secondAttempt.error}`,
    );
  }
}

// ── Template rendering ───────────────────────────────────────

async function buildUserPrompt(input: VerifierInput): Promise<string> {
  const template = await loadTemplate('verifier_user.txt');

  return fillTemplate(template, {
    subtask: input.subtaskId,
    instruction: input.instruction,
    successCriteria: input.successCriteria,
    params: serializeJSON(input.params),
  });
}

async function buildRepairPrompt(
  previousOutput: string,
  error: string,
): Promise<string> {
  const template = await loadTemplate('verifier_repair.txt');

  return fillTemplate(template, { error, previousOutput });
}

/** Fills `{{key}}` placeholders in one pass. Values are inserted literally. */
function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (placeholder: string, key: string) =>
    values[key] ?? placeholder,
  );
}
