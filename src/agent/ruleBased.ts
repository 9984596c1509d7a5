import type { DecisionAgent, DecisionState } from '../core/collaborators.js';
import type { AgentDecision } from '../schema/index.js';

/**
 * Deterministic agent: moves toward `params.target` ("left" / "right"),
 * falling back to the direction named in the subtask id.
 */
export class RuleBasedAgent implements DecisionAgent {
  readonly kind = 'rule_based';

  async chooseAction(state: DecisionState): Promise<AgentDecision> {
    const target = String(state.params['target'] ?? '').toLowerCase();

    if (target === 'left') {
      return { action: 'move_left', reason: 'Using target=left from subtask params' };
    }
    if (target === 'right') {
      return { action: 'move_right', reason: 'Using target=right from subtask params' };
    }
    if (state.subtaskId.toLowerCase().includes('left')) {
      return { action: 'move_left', reason: 'Subtask name points left' };
    }
    return { action: 'move_right', reason: 'Defaulting to move_right' };
  }
}
