/**
 * @fileoverview Core type definitions shared by the detector, calibration and session.
 */

/**
 * A single hand landmark in pixel/camera space.
 */
export interface Landmark {
  x: number;
  y: number;
  z: number;
}

/**
 * The 21 ordered landmarks of one detected hand.
 * Index semantics follow the MediaPipe hand model (see LANDMARKS).
 */
export type LandmarkFrame = readonly Landmark[];

/**
 * Handedness label reported by the landmark model.
 * Note: "Left" means the hand appears on the left side of the camera image.
 */
export type Handedness = 'Left' | 'Right';

/**
 * Axis-aligned box around a detected hand, in pixels.
 */
export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * A single tracked hand as produced by the landmark source.
 */
export interface TrackedHand {
  handedness: Handedness;
  landmarks: LandmarkFrame;
  boundingBox?: BoundingBox | undefined;
}

/**
 * Everything the landmark source produced for one tick.
 */
export interface HandFrame {
  hands: readonly TrackedHand[];
  /** Capture time in milliseconds */
  timestamp: number;
}

/**
 * Per-user gesture thresholds.
 *
 * Values are always derived from a measured hand span (or restored from a
 * validated record); instances are frozen and replaced wholesale.
 */
export interface Calibration {
  /** Mean thumb-base to pinky-base distance in pixels, null when uncalibrated */
  readonly handSpan: number | null;
  /** Thumb–index distance below which a click is detected */
  readonly clickThreshold: number;
  /** Thumb–middle distance below which an exit is detected */
  readonly exitThreshold: number;
  readonly calibrated: boolean;
}

/**
 * Result of a single pinch measurement.
 */
export interface PinchResult {
  detected: boolean;
  /** Distance after smoothing (raw when smoothing is disabled) */
  distance: number;
}

/**
 * Result of offering one frame to the calibrator.
 */
export type SampleResult =
  | { accepted: true; span: number; collected: number }
  | { accepted: false; span: number | null; collected: number; reason: SampleRejection };

export type SampleRejection = 'span_out_of_range' | 'malformed_frame';
