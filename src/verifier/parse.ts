import type { Params, VerifierResponse, VerifierResult } from '../schema/index.js';
import { verifierResponseSchema } from '../schema/index.js';
import { extractJSON } from '../utils/json.js';

// ── JSON extraction + validation ─────────────────────────────

type ParseResult =
  | { ok: true; response: VerifierResponse }
  | { ok: false; error: string };

export function tryParseVerifierResponse(raw: string): ParseResult {
  if (raw.trim() === '') {
    return { ok: false, error: 'Empty verifier response' };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJSON(raw));
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return { ok: false, error: `Invalid JSON: ${message}` };
  }

  const result = verifierResponseSchema.safeParse(parsed);
  if (!result.success) {
    return { ok: false, error: result.error.message };
  }

  return { ok: true, response: result.data };
}

// ── Mapping onto VerifierResult ──────────────────────────────

/**
 * Only "success" completes a subtask. An adjustment is merged over the
 * params the verifier was shown, so updatedParams is always a full mapping.
 */
export function toVerifierResult(
  response: VerifierResponse,
  params: Params,
): VerifierResult {
  const rationale = response.notes ?? response.failure_mode ?? `status=${response.status}`;

  return {
    complete: response.status === 'success',
    rationale,
    confidence: response.confidence,
    ...(response.adjustment !== null
      ? { updatedParams: { ...params, ...response.adjustment } }
      : {}),
    ...(response.failure_mode !== null ? { failureMode: response.failure_mode } : {}),
  };
}
