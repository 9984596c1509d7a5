import type { ActionExecutor } from '../core/collaborators.js';
import type { Action, ExecutionReport, Params, Subtask } from '../schema/index.js';
import { MOTION } from '../config/defaults.js';
import type { ArmEnvironment } from './mockArmEnv.js';

// ── Param helpers ────────────────────────────────────────────

export function numberParam(params: Params, key: string, fallback: number): number {
  const value = params[key];
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) return parsed;
  }
  return fallback;
}

// ── Executor ─────────────────────────────────────────────────

/**
 * Runs one motion chunk per attempt: a fixed number of control steps at
 * a constant commanded velocity, stopping early on a safety violation.
 */
export class MotionExecutor implements ActionExecutor {
  constructor(private readonly env: ArmEnvironment) {}

  async execute(action: Action, params: Params, subtask: Subtask): Promise<ExecutionReport> {
    const hz = this.env.controlHz;
    const speed = numberParam(params, 'speed', MOTION.DEFAULT_SPEED);
    const chunkDurationS = numberParam(params, 'chunkDurationS', MOTION.DEFAULT_CHUNK_DURATION_S);

    const sign = action === 'move_right' ? 1 : -1;
    const dx = sign * Math.max(MOTION.MIN_SPEED, Math.min(speed, MOTION.MAX_SPEED));

    const requested = Math.max(1, Math.round(chunkDurationS * hz));
    const cap = Math.max(1, Math.floor(subtask.maxAttemptSeconds * hz));
    const plannedSteps = Math.min(requested, cap);

    let steps = 0;
    let armPosMin = Number.POSITIVE_INFINITY;
    let armPosMax = Number.NEGATIVE_INFINITY;
    let timeStartS: number | null = null;
    let timeEndS: number | null = null;
    let terminatedReason = requested > cap ? 'time_limit' : 'chunk_complete';

    for (let i = 0; i < plannedSteps; i++) {
      const obs = this.env.step({ dx });
      steps++;
      armPosMin = Math.min(armPosMin, obs.armPos);
      armPosMax = Math.max(armPosMax, obs.armPos);
      timeStartS ??= obs.timeS;
      timeEndS = obs.timeS;

      if (!this.env.safetyCheck()) {
        terminatedReason = 'safety_stop';
        break;
      }
    }

    return {
      ok: terminatedReason !== 'safety_stop',
      steps,
      terminatedReason,
      telemetry: {
        commandedDx: dx,
        armPosMin: steps > 0 ? armPosMin : null,
        armPosMax: steps > 0 ? armPosMax : null,
        timeStartS,
        timeEndS,
      },
    };
  }
}
