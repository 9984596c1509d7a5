import { readFile } from 'node:fs/promises';
import path from 'node:path';

import type { DecisionAgent, DecisionState } from '../core/collaborators.js';
import type { LLMClient } from '../llm/index.js';
import type { AgentDecision } from '../schema/index.js';
import { agentDecisionSchema } from '../schema/index.js';
import { LIMITS } from '../config/defaults.js';
import { extractJSON } from '../utils/json.js';

// ── Error ────────────────────────────────────────────────────

export class AgentResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AgentResponseError';
  }
}

// ── Template paths ───────────────────────────────────────────

const PROMPTS_DIR = path.join(__dirname, '..', '..', 'prompts');

// ── Agent ────────────────────────────────────────────────────

/**
 * LLM-backed agent. One completion per call; any transport or parse
 * problem is thrown so the attempt runner can retry it.
 */
export class LLMDecisionAgent implements DecisionAgent {
  readonly kind = 'llm';

  constructor(private readonly client: LLMClient) {}

  async chooseAction(state: DecisionState): Promise<AgentDecision> {
    const systemPrompt = await buildSystemPrompt(state.allowedActions);
    const raw = await this.client.generate(systemPrompt, buildUserPrompt(state), {
      signal: state.signal,
    });
    return parseDecision(raw);
  }
}

// ── Prompt building ─────────────────────────────────────────

async function buildSystemPrompt(actions: readonly string[]): Promise<string> {
  const template = await readFile(
    path.join(PROMPTS_DIR, 'agent_decide.txt'),
    'utf-8',
  );
  return template.replaceAll('{{actions}}', () => actions.join(', '));
}

export function buildUserPrompt(state: DecisionState): string {
  const recentHistory = state.recentHistory
    .slice(-LIMITS.AGENT_HISTORY_WINDOW)
    .map((a) => ({
      attemptIndex: a.attemptIndex,
      action: a.chosenAction,
      complete: a.verifierResult.complete,
      rationale: a.verifierResult.rationale,
    }));

  return JSON.stringify({
    subtask: {
      name: state.subtaskId,
      instruction: state.instruction,
      successCriteria: state.successCriteria,
      params: state.params,
    },
    attemptIndex: state.attemptIndex,
    allowedActions: state.allowedActions,
    recentHistory,
  });
}

// ── Response parsing ────────────────────────────────────────

export function parseDecision(raw: string): AgentDecision {
  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJSON(raw));
  } catch {
    throw new AgentResponseError(`Agent returned invalid JSON: ${raw.slice(0, 200)}`);
  }

  const result = agentDecisionSchema.safeParse(parsed);
  if (!result.success) {
    throw new AgentResponseError(`Agent response validation failed: ${result.error.message}`);
  }

  return result.data;
}
