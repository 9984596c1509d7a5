/**
 * Decision agent module.
 * One variant is chosen at configuration time; the core only sees
 * the DecisionAgent interface.
 */

import type { DecisionAgent } from '../core/collaborators.js';
import type { LLMClient } from '../llm/index.js';
import type { AgentConfig } from '../schema/index.js';
import { RuleBasedAgent } from './ruleBased.js';
import { LLMDecisionAgent } from './llmAgent.js';

export { RuleBasedAgent } from './ruleBased.js';
export { LLMDecisionAgent, AgentResponseError, parseDecision, buildUserPrompt } from './llmAgent.js';

// ── Factory ──────────────────────────────────────────────────

export function createDecisionAgent(
  config: AgentConfig,
  makeClient: () => LLMClient,
): DecisionAgent {
  switch (config.type) {
    case 'rule_based':
      return new RuleBasedAgent();
    case 'llm':
      return new LLMDecisionAgent(makeClient());
  }
}
