import type { CompletionVerifier, VerifierInput } from '../core/collaborators.js';
import type { Frame } from '../env/frame.js';
import { pixelAt } from '../env/frame.js';
import { numberParam } from '../env/motion.js';
import type { VerifierResult } from '../schema/index.js';
import { MOTION } from '../config/defaults.js';

// ── Public types ─────────────────────────────────────────────

export interface StubVerifierOptions {
  crossingMarginPx?: number | undefined;
  /** Randomise proposed adjustments slightly so retries do not follow a fixed schedule. */
  jitter?: boolean | undefined;
  random?: (() => number) | undefined;
}

/**
 * Deterministic verifier with the same contract as the vision-LLM one.
 * Reads the marker position straight out of the after-frame.
 */
export class StubVerifier implements CompletionVerifier {
  readonly kind = 'stub';
  private readonly crossingMarginPx: number;
  private readonly jitter: boolean;
  private readonly random: () => number;

  constructor(options: StubVerifierOptions = {}) {
    this.crossingMarginPx = options.crossingMarginPx ?? 4;
    this.jitter = options.jitter ?? false;
    this.random = options.random ?? Math.random;
  }

  async check(input: VerifierInput): Promise<VerifierResult> {
    const { afterFrame, params } = input;
    const markerX = locateMarker(afterFrame);

    if (markerX === null) {
      return {
        complete: false,
        rationale: 'No marker visible in the post-execution frame.',
        confidence: 0.2,
        failureMode: 'missing_marker',
        updatedParams: { ...params, chunkDurationS: 0.45 },
      };
    }

    const lineX = Math.floor(afterFrame.width / 2);
    const target = resolveTarget(input);

    let crossed = false;
    if (target === 'right') crossed = markerX > lineX + this.crossingMarginPx;
    if (target === 'left') crossed = markerX < lineX - this.crossingMarginPx;

    if (crossed) {
      return {
        complete: true,
        rationale: `Marker crossed line to the ${target}. markerX=${String(markerX)}, lineX=${String(lineX)}.`,
        confidence: 0.92,
      };
    }

    const speed = numberParam(params, 'speed', MOTION.DEFAULT_SPEED);
    const chunkDurationS = numberParam(params, 'chunkDurationS', MOTION.DEFAULT_CHUNK_DURATION_S);

    return {
      complete: false,
      rationale: `Still not across line. markerX=${String(markerX)}, lineX=${String(lineX)}, target=${target || 'unknown'}.`,
      confidence: 0.78,
      failureMode: 'not_crossed_line',
      updatedParams: {
        ...params,
        speed: this.adjust(Math.min(MOTION.MAX_SPEED, speed + 0.08), 0.05, MOTION.MIN_SPEED, MOTION.MAX_SPEED),
        chunkDurationS: this.adjust(
          Math.min(MOTION.MAX_CHUNK_DURATION_S, chunkDurationS + 0.05),
          0.08,
          MOTION.MIN_CHUNK_DURATION_S,
          MOTION.MAX_CHUNK_DURATION_S,
        ),
      },
    };
  }

  private adjust(value: number, spread: number, min: number, max: number): number {
    if (!this.jitter) return value;
    const factor = 1 - spread + this.random() * 2 * spread;
    return Math.max(min, Math.min(max, value * factor));
  }
}

// ── Frame analysis ───────────────────────────────────────────

/**
 * Column whose pixels are most green relative to red and blue. The white
 * line and the background both score zero. Returns the centre of the
 * best-scoring columns, or null when no column scores above zero.
 */
export function locateMarker(frame: Frame): number | null {
  let best = 0;
  let columns: number[] = [];

  for (let x = 0; x < frame.width; x++) {
    let sum = 0;
    for (let y = 0; y < frame.height; y++) {
      const [r, g, b] = pixelAt(frame, x, y);
      sum += g - 0.5 * r - 0.5 * b;
    }
    const score = sum / frame.height;

    if (score > best) {
      best = score;
      columns = [x];
    } else if (score === best && best > 0) {
      columns.push(x);
    }
  }

  if (columns.length === 0) return null;
  return Math.round(columns.reduce((a, b) => a + b, 0) / columns.length);
}

function resolveTarget(input: VerifierInput): string {
  const target = String(input.params['target'] ?? '').toLowerCase();
  if (target === 'left' || target === 'right') return target;
  const id = input.subtaskId.toLowerCase();
  if (id.includes('right')) return 'right';
  if (id.includes('left')) return 'left';
  return '';
}
