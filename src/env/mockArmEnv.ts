import type { Frame } from './frame.js';
import { createFrame, fillRect } from './frame.js';
import { FRAME } from '../config/defaults.js';

// ── Public types ─────────────────────────────────────────────

export interface ArmObservation {
  frame: Frame;
  armPos: number;
  timeS: number;
  lastDx: number;
}

export interface ArmCommand {
  dx: number;
}

/** The environment surface the motion executor and frame capture need. */
export interface ArmEnvironment {
  readonly controlHz: number;
  reset(): ArmObservation;
  observe(): ArmObservation;
  step(command: ArmCommand): ArmObservation;
  safetyCheck(): boolean;
  close(): void;
}

export interface MockArmEnvOptions {
  controlHz: number;
  armLimit?: number | undefined;
  initialArmPos?: number | undefined;
  frameWidth?: number | undefined;
  frameHeight?: number | undefined;
}

// ── Scene colours ────────────────────────────────────────────

const BACKGROUND = 18;
const LINE_RGB = [255, 255, 255] as const;
export const MARKER_RGB = [30, 220, 30] as const;

/**
 * Simulated one-axis arm. The frame shows a white vertical goal line in
 * the middle and a green marker at the arm's position.
 */
export class MockArmEnv implements ArmEnvironment {
  readonly controlHz: number;
  readonly armLimit: number;
  readonly frameWidth: number;
  readonly frameHeight: number;
  private readonly initialArmPos: number;
  private readonly dt: number;
  private armPos: number;
  private simTime = 0;
  private lastDx = 0;

  constructor(options: MockArmEnvOptions) {
    this.controlHz = options.controlHz;
    this.dt = 1 / options.controlHz;
    this.armLimit = options.armLimit ?? 1;
    this.initialArmPos = options.initialArmPos ?? -0.6;
    this.frameWidth = options.frameWidth ?? FRAME.WIDTH;
    this.frameHeight = options.frameHeight ?? FRAME.HEIGHT;
    this.armPos = this.initialArmPos;
  }

  get position(): number {
    return this.armPos;
  }

  reset(): ArmObservation {
    this.armPos = this.initialArmPos;
    this.simTime = 0;
    this.lastDx = 0;
    return this.observe();
  }

  observe(): ArmObservation {
    return {
      frame: this.render(),
      armPos: this.armPos,
      timeS: this.simTime,
      lastDx: this.lastDx,
    };
  }

  step(command: ArmCommand): ArmObservation {
    this.lastDx = command.dx;
    this.armPos = clamp(this.armPos + command.dx * this.dt, -this.armLimit, this.armLimit);
    this.simTime += this.dt;
    return this.observe();
  }

  safetyCheck(): boolean {
    return Math.abs(this.armPos) < this.armLimit;
  }

  close(): void {
    this.lastDx = 0;
  }

  /** Pixel column of the marker centre for the current arm position. */
  markerX(): number {
    const xMin = FRAME.EDGE_MARGIN_PX;
    const xMax = this.frameWidth - FRAME.EDGE_MARGIN_PX - 1;
    const norm = (this.armPos + this.armLimit) / (2 * this.armLimit);
    return Math.round(xMin + norm * (xMax - xMin));
  }

  private render(): Frame {
    const frame = createFrame(this.frameWidth, this.frameHeight, BACKGROUND);

    const lineX = Math.floor(this.frameWidth / 2);
    fillRect(frame, lineX - 1, 0, lineX + 1, this.frameHeight, LINE_RGB);

    const x = this.markerX();
    const yMid = Math.floor(this.frameHeight / 2);
    fillRect(
      frame,
      x - FRAME.MARKER_HALF_WIDTH_PX,
      yMid - FRAME.MARKER_HALF_HEIGHT_PX,
      x + FRAME.MARKER_HALF_WIDTH_PX + 1,
      yMid + FRAME.MARKER_HALF_HEIGHT_PX + 1,
      MARKER_RGB,
    );

    return frame;
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
