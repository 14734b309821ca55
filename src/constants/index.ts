// ============================================================================
// CENTRALIZED CONSTANTS
// ============================================================================
// All magic numbers and configuration values in one place for easy maintenance.

/**
 * Time conversion constants
 */
export const TIME = {
  /** Seconds per hour */
  SECONDS_PER_HOUR: 3600,
  /** Seconds per minute */
  SECONDS_PER_MINUTE: 60,
  /** Milliseconds per second */
  MS_PER_SECOND: 1000,
} as const;

/**
 * Project settings applied when the header omits a directive
 */
export const PROJECT_DEFAULTS = {
  PROJECT_NAME: 'Untitled Project',
  WIDTH: 1920,
  HEIGHT: 1080,
  FRAME_RATE: 30,
  FONT: 'Meiryo',
  FONT_SIZE: 24,
  TITLE_COLOR: '#FFFFFF',
  SUBTITLE_COLOR: '#FFFFFF',
  BACKGROUND_ALPHA: 0.8,
} as const;

/**
 * Re-evaluation pipeline constants
 */
export const PIPELINE = {
  /** Quiet window before a burst of edits is evaluated (ms) */
  DEBOUNCE_MS: 500,
  /** Separator between canonical command lines when fingerprinting */
  FINGERPRINT_SEPARATOR: '\n',
  /** Digest used for the command fingerprint */
  FINGERPRINT_ALGORITHM: 'sha256',
} as const;

/**
 * Media probing constants
 */
export const MEDIA = {
  /** Give up on a container that never reports its moov box (ms) */
  PROBE_TIMEOUT_MS: 5000,
} as const;

/**
 * Segment comparison constants
 */
export const SEGMENT = {
  /** Two segments closer than this (seconds) count as adjacent */
  ADJACENCY_TOLERANCE: 0.001,
} as const;
