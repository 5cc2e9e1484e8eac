/**
 * @fileoverview Landmark indices and the fixed constants of calibration and detection.
 */

/**
 * Number of landmarks in a complete hand frame.
 */
export const LANDMARK_COUNT = 21;

/**
 * MediaPipe hand landmark indices.
 */
export const LANDMARKS = {
  WRIST: 0,
  THUMB_CMC: 1,
  THUMB_MCP: 2,
  THUMB_IP: 3,
  THUMB_TIP: 4,
  INDEX_MCP: 5,
  INDEX_PIP: 6,
  INDEX_DIP: 7,
  INDEX_TIP: 8,
  MIDDLE_MCP: 9,
  MIDDLE_PIP: 10,
  MIDDLE_DIP: 11,
  MIDDLE_TIP: 12,
  RING_MCP: 13,
  RING_PIP: 14,
  RING_DIP: 15,
  RING_TIP: 16,
  PINKY_MCP: 17,
  PINKY_PIP: 18,
  PINKY_DIP: 19,
  PINKY_TIP: 20,
} as const;

// ============ Calibration ============

export const CALIBRATION = {
  /** Smallest plausible hand span in pixels (inclusive) */
  MIN_HAND_SPAN: 50,
  /** Largest plausible hand span in pixels (inclusive) */
  MAX_HAND_SPAN: 500,
  /** Click threshold as a fraction of hand span */
  CLICK_RATIO: 0.12,
  /** Exit threshold as a fraction of hand span */
  EXIT_RATIO: 0.1,
  CLICK_MIN: 30,
  CLICK_MAX: 70,
  EXIT_MIN: 25,
  EXIT_MAX: 60,
  /** Thresholds used until a calibration is installed */
  DEFAULT_CLICK_THRESHOLD: 50,
  DEFAULT_EXIT_THRESHOLD: 40,
} as const;

// ============ Calibration session ============

export const SESSION_DEFAULTS = {
  REQUIRED_SAMPLES: 30,
  COUNTDOWN_MS: 3000,
  TIMEOUT_MS: 60_000,
} as const;

// ============ Detection ============

export const DETECTOR_DEFAULTS = {
  CLICK_DELAY_MS: 500,
  SMOOTHING_WINDOW: 5,
  EXIT_HOLD_MS: 1500,
} as const;
