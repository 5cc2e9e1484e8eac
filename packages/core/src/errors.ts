/**
 * @fileoverview Error classes for calibration, persistence and landmark input.
 *
 * None of these are fatal to the host: the session turns calibration errors
 * into an `error` outcome, the store turns persistence errors into the
 * uncalibrated defaults, and the calibrator turns malformed frames into
 * rejected samples.
 */

/**
 * Base class for failures that end a calibration attempt.
 */
export class CalibrationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CalibrationError';
  }
}

/**
 * Thrown when fewer valid samples were collected than required.
 */
export class InsufficientSamplesError extends CalibrationError {
  readonly collected: number;
  readonly required: number;

  constructor(collected: number, required: number) {
    super(`Insufficient samples: ${collected}/${required}`);
    this.name = 'InsufficientSamplesError';
    this.collected = collected;
    this.required = required;
  }
}

/**
 * Thrown when the mean hand span falls outside the plausible range.
 */
export class ImplausibleHandSizeError extends CalibrationError {
  readonly handSpan: number;

  constructor(handSpan: number) {
    super(
      `Invalid hand size detected: ${handSpan.toFixed(1)}px. Please ensure hand is clearly visible.`
    );
    this.name = 'ImplausibleHandSizeError';
    this.handSpan = handSpan;
  }
}

/**
 * Raised when the calibration record cannot be read or written.
 */
export class PersistenceUnavailableError extends Error {
  readonly path: string;

  constructor(path: string, detail: string) {
    super(`Calibration storage unavailable (${path}): ${detail}`);
    this.name = 'PersistenceUnavailableError';
    this.path = path;
  }
}

/**
 * Thrown when the landmark source hands over a frame without exactly 21 points.
 */
export class MalformedLandmarkFrameError extends Error {
  readonly length: number;

  constructor(length: number) {
    super(`Malformed landmark frame: expected 21 landmarks, got ${length}`);
    this.name = 'MalformedLandmarkFrameError';
    this.length = length;
  }
}
