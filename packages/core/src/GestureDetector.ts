/**
 * @fileoverview Click and exit pinch detection for one tracked hand.
 */

import { DETECTOR_DEFAULTS, LANDMARKS } from './constants.js';
import { landmarkDistance } from './geometry.js';
import { DEFAULT_CALIBRATION } from './HandCalibrator.js';
import { SmoothingFilter } from './SmoothingFilter.js';
import type { Calibration, LandmarkFrame, PinchResult } from './types.js';

export interface GestureDetectorOptions {
  /** Minimum time between two clicks in milliseconds */
  clickDelayMs?: number;
  /** Average distances over a moving window before comparing */
  smoothing?: boolean;
  smoothingWindow?: number;
  /** Initial calibration; the uncalibrated defaults when omitted */
  calibration?: Calibration;
}

/**
 * Detects click (thumb–index pinch) and exit (thumb–middle pinch) gestures.
 *
 * One instance tracks one hand across ticks. The click is level-triggered and
 * time-gated: a pinch that is held keeps firing once per click delay.
 */
export class GestureDetector {
  readonly clickDelayMs: number;
  private lastClickTime = Number.NEGATIVE_INFINITY;
  private readonly clickFilter: SmoothingFilter | null;
  private readonly exitFilter: SmoothingFilter | null;
  private activeCalibration: Calibration;
  private lastClickDistance: number | null = null;
  private lastExitDistance: number | null = null;

  constructor(options: GestureDetectorOptions = {}) {
    this.clickDelayMs = options.clickDelayMs ?? DETECTOR_DEFAULTS.CLICK_DELAY_MS;
    const windowSize = options.smoothingWindow ?? DETECTOR_DEFAULTS.SMOOTHING_WINDOW;
    const smoothing = options.smoothing ?? true;
    this.clickFilter = smoothing ? new SmoothingFilter(windowSize) : null;
    this.exitFilter = smoothing ? new SmoothingFilter(windowSize) : null;
    this.activeCalibration = frozen(options.calibration ?? DEFAULT_CALIBRATION);
  }

  /**
   * Measure the thumb–index distance and decide whether a click fires.
   * @param nowMs - Current time in milliseconds
   */
  detectClick(landmarks: LandmarkFrame, nowMs: number): PinchResult {
    const raw = landmarkDistance(landmarks, LANDMARKS.THUMB_TIP, LANDMARKS.INDEX_TIP);
    const distance = this.clickFilter ? this.clickFilter.push(raw) : raw;
    this.lastClickDistance = distance;

    if (
      distance < this.activeCalibration.clickThreshold &&
      nowMs - this.lastClickTime > this.clickDelayMs
    ) {
      this.lastClickTime = nowMs;
      return { detected: true, distance };
    }
    return { detected: false, distance };
  }

  /**
   * Measure the thumb–middle distance. No debounce: callers that need a
   * hold-to-confirm wrap this in a HoldTimer.
   */
  detectExit(landmarks: LandmarkFrame): PinchResult {
    const raw = landmarkDistance(landmarks, LANDMARKS.THUMB_TIP, LANDMARKS.MIDDLE_TIP);
    const distance = this.exitFilter ? this.exitFilter.push(raw) : raw;
    this.lastExitDistance = distance;
    return { detected: distance < this.activeCalibration.exitThreshold, distance };
  }

  /**
   * Clear both smoothing windows. Call when the tracked hand disappears.
   */
  resetSmoothing(): void {
    this.clickFilter?.reset();
    this.exitFilter?.reset();
    this.lastClickDistance = null;
    this.lastExitDistance = null;
  }

  /**
   * Milliseconds until the click gate reopens (0 when ready).
   */
  timeUntilNextClick(nowMs: number): number {
    return Math.max(0, this.clickDelayMs - (nowMs - this.lastClickTime));
  }

  /**
   * Replace the active calibration. Must be called between ticks.
   */
  installCalibration(calibration: Calibration): void {
    this.activeCalibration = frozen(calibration);
  }

  get calibration(): Calibration {
    return this.activeCalibration;
  }

  get isCalibrated(): boolean {
    return this.activeCalibration.calibrated;
  }

  get currentClickDistance(): number | null {
    return this.lastClickDistance;
  }

  get currentExitDistance(): number | null {
    return this.lastExitDistance;
  }

  get smoothingEnabled(): boolean {
    return this.clickFilter !== null;
  }
}

function frozen(calibration: Calibration): Calibration {
  return Object.isFrozen(calibration) ? calibration : Object.freeze({ ...calibration });
}
