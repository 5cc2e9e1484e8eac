/**
 * @fileoverview Gesture core: smoothing, hand calibration and pinch detection.
 *
 * This package provides:
 * - Landmark types and constants
 * - The moving-average filter and the click/exit detector
 * - Hand-span calibration, its persistence and the guided calibration session
 * - A hold-to-confirm timer and a small structured logger
 */

// Calibration
export {
  type CalibrationNotice,
  type CalibrationOutcome,
  CalibrationSession,
  type CalibrationSessionOptions,
  type CalibrationSessionSnapshot,
  type CalibrationState,
} from './CalibrationSession.js';
export {
  type CalibrationRecord,
  type CalibrationSink,
  CalibrationStore,
  fromCalibrationRecord,
  parseCalibrationRecord,
  toCalibrationRecord,
} from './CalibrationStore.js';
// Constants
export {
  CALIBRATION,
  DETECTOR_DEFAULTS,
  LANDMARK_COUNT,
  LANDMARKS,
  SESSION_DEFAULTS,
} from './constants.js';
// Errors
export {
  CalibrationError,
  ImplausibleHandSizeError,
  InsufficientSamplesError,
  MalformedLandmarkFrameError,
  PersistenceUnavailableError,
} from './errors.js';
// Detection
export { GestureDetector, type GestureDetectorOptions } from './GestureDetector.js';
export {
  assertLandmarkFrame,
  clamp,
  landmarkAt,
  landmarkDistance,
  planarDistance,
} from './geometry.js';
export {
  DEFAULT_CALIBRATION,
  deriveCalibration,
  HandCalibrator,
  isPlausibleHandSpan,
  measureHandSpan,
} from './HandCalibrator.js';
export { HoldTimer, type HoldTimerOptions } from './HoldTimer.js';
export { SmoothingFilter } from './SmoothingFilter.js';
// Types
export type {
  BoundingBox,
  Calibration,
  Handedness,
  HandFrame,
  Landmark,
  LandmarkFrame,
  PinchResult,
  SampleRejection,
  SampleResult,
  TrackedHand,
} from './types.js';
// Logging
export {
  createLogger,
  formatLog,
  getLogLevel,
  type LogEntry,
  type Logger,
  type LogLevel,
  logger,
  setLogLevel,
} from './utils/logger.js';
