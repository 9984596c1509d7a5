import type { ObservationCapture } from '../core/collaborators.js';
import type { Frame } from './frame.js';
import type { ArmEnvironment } from './mockArmEnv.js';

/** Frame capture backed by the environment's current render. */
export class EnvFrameCapture implements ObservationCapture {
  constructor(private readonly env: ArmEnvironment) {}

  async capture(): Promise<Frame> {
    return this.env.observe().frame;
  }
}
