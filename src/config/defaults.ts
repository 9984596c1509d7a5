/**
 * Default configuration values.
 * All values are overridable via config file.
 */

export const TIMEOUTS = {
  COLLABORATOR_CALL_TIMEOUT: 30_000,
  RETRY_WAIT: 500,
} as const;

export const LIMITS = {
  MAX_ATTEMPTS: 10,
  MAX_ATTEMPT_SECONDS: 10,
  COLLABORATOR_RETRIES: 2,
  AGENT_HISTORY_WINDOW: 4,
  MAX_LLM_RETRIES: 3,
} as const;

export const MOTION = {
  DEFAULT_SPEED: 0.35,
  DEFAULT_CHUNK_DURATION_S: 0.35,
  MIN_SPEED: 0.05,
  MAX_SPEED: 1.2,
  MIN_CHUNK_DURATION_S: 0.1,
  MAX_CHUNK_DURATION_S: 0.8,
} as const;

export const FRAME = {
  WIDTH: 96,
  HEIGHT: 96,
  EDGE_MARGIN_PX: 8,
  MARKER_HALF_WIDTH_PX: 3,
  MARKER_HALF_HEIGHT_PX: 6,
} as const;
