/**
 * @fileoverview Hand-span sampling and adaptive threshold derivation.
 */

import { CALIBRATION, LANDMARKS, SESSION_DEFAULTS } from './constants.js';
import {
  ImplausibleHandSizeError,
  InsufficientSamplesError,
  MalformedLandmarkFrameError,
} from './errors.js';
import { assertLandmarkFrame, clamp, landmarkDistance } from './geometry.js';
import type { Calibration, LandmarkFrame, SampleResult } from './types.js';

/**
 * Thresholds in effect before any calibration.
 */
export const DEFAULT_CALIBRATION: Calibration = Object.freeze({
  handSpan: null,
  clickThreshold: CALIBRATION.DEFAULT_CLICK_THRESHOLD,
  exitThreshold: CALIBRATION.DEFAULT_EXIT_THRESHOLD,
  calibrated: false,
});

export function isPlausibleHandSpan(span: number): boolean {
  return span >= CALIBRATION.MIN_HAND_SPAN && span <= CALIBRATION.MAX_HAND_SPAN;
}

/**
 * Thumb-base to pinky-base distance of one frame.
 */
export function measureHandSpan(landmarks: LandmarkFrame): number {
  return landmarkDistance(landmarks, LANDMARKS.THUMB_MCP, LANDMARKS.PINKY_MCP);
}

/**
 * Derive thresholds from a mean hand span.
 *
 * Click is 12% and exit 10% of the span, rounded and clamped to [30, 70]
 * and [25, 60] pixels.
 * @throws {ImplausibleHandSizeError} if the span is outside [50, 500]
 */
export function deriveCalibration(handSpan: number): Calibration {
  if (!Number.isFinite(handSpan) || !isPlausibleHandSpan(handSpan)) {
    throw new ImplausibleHandSizeError(handSpan);
  }
  return Object.freeze({
    handSpan,
    clickThreshold: clamp(
      Math.round(handSpan * CALIBRATION.CLICK_RATIO),
      CALIBRATION.CLICK_MIN,
      CALIBRATION.CLICK_MAX
    ),
    exitThreshold: clamp(
      Math.round(handSpan * CALIBRATION.EXIT_RATIO),
      CALIBRATION.EXIT_MIN,
      CALIBRATION.EXIT_MAX
    ),
    calibrated: true,
  });
}

/**
 * Collects hand-span samples for one calibration attempt.
 *
 * Samples outside the plausible span range are rejected and not counted, so a
 * momentary false detection cannot drag the mean.
 */
export class HandCalibrator {
  private readonly samples: number[] = [];

  /**
   * Measure the hand span of a frame and keep it if plausible.
   * @throws {MalformedLandmarkFrameError} if the frame is not 21 landmarks
   */
  addSample(landmarks: LandmarkFrame): SampleResult {
    assertLandmarkFrame(landmarks);
    const span = measureHandSpan(landmarks);
    if (!isPlausibleHandSpan(span)) {
      return {
        accepted: false,
        span,
        collected: this.samples.length,
        reason: 'span_out_of_range',
      };
    }
    this.samples.push(span);
    return { accepted: true, span, collected: this.samples.length };
  }

  /**
   * Like addSample, but reports a malformed frame as a rejected sample.
   */
  offerSample(landmarks: LandmarkFrame): SampleResult {
    try {
      return this.addSample(landmarks);
    } catch (error) {
      if (error instanceof MalformedLandmarkFrameError) {
        return {
          accepted: false,
          span: null,
          collected: this.samples.length,
          reason: 'malformed_frame',
        };
      }
      throw error;
    }
  }

  /**
   * Compute a calibration from the collected samples.
   * @throws {InsufficientSamplesError} if fewer than `requiredCount` samples were kept
   * @throws {ImplausibleHandSizeError} if the mean span is outside [50, 500]
   */
  calibrate(requiredCount: number = SESSION_DEFAULTS.REQUIRED_SAMPLES): Calibration {
    if (this.samples.length === 0 || this.samples.length < requiredCount) {
      throw new InsufficientSamplesError(this.samples.length, requiredCount);
    }
    let sum = 0;
    for (const span of this.samples) {
      sum += span;
    }
    return deriveCalibration(sum / this.samples.length);
  }

  get sampleCount(): number {
    return this.samples.length;
  }

  /**
   * Fraction of `requiredCount` collected, capped at 1.
   */
  progress(requiredCount: number): number {
    if (requiredCount <= 0) return 1;
    return Math.min(1, this.samples.length / requiredCount);
  }

  /**
   * Discard all collected samples.
   */
  reset(): void {
    this.samples.length = 0;
  }
}
