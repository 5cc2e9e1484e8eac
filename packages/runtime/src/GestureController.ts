/**
 * @fileoverview Per-tick gesture loop: one frame in, discrete events out.
 */

import {
  assertLandmarkFrame,
  type Calibration,
  createLogger,
  DETECTOR_DEFAULTS,
  GestureDetector,
  type GestureDetectorOptions,
  type Handedness,
  type HandFrame,
  HoldTimer,
  MalformedLandmarkFrameError,
} from '@touchless/gesture-core';
import { type HandSource, selectHand } from './input/HandSource.js';

const log = createLogger('gestures');

export type GestureEvent =
  | { type: 'click_detected'; distance: number; timestamp: number; handedness: Handedness }
  | { type: 'exit_detected'; distance: number; timestamp: number; handedness: Handedness };

export type GestureEventCallback = (event: GestureEvent) => void;

export interface GestureDiagnostics {
  currentClickDistance: number | null;
  currentExitDistance: number | null;
  timeUntilNextClick: number;
  isCalibrated: boolean;
  clickThreshold: number;
  exitThreshold: number;
  /** Fraction of the exit hold completed, 0..1 */
  exitHoldProgress: number;
  activeHand: Handedness | null;
}

export interface GestureControllerOptions extends GestureDetectorOptions {
  /** How long the exit pinch must be held before exit fires */
  exitHoldMs?: number;
  /** Track this hand when several are visible */
  preferredHand?: Handedness | undefined;
}

export interface RunOptions {
  onEvent: GestureEventCallback;
  /** Invoked after each tick, e.g. to refresh a HUD */
  onTick?: (frame: HandFrame, events: readonly GestureEvent[]) => void;
  signal?: AbortSignal;
}

/**
 * Drives a GestureDetector from hand frames.
 *
 * Tracks a single hand. When it disappears (or a different hand takes its
 * place) the smoothing windows and the exit hold are reset, so a returning
 * hand is not averaged against stale distances. A new calibration requested
 * while frames are flowing is installed at the start of the next tick.
 */
export class GestureController {
  private readonly detector: GestureDetector;
  private readonly exitHold: HoldTimer;
  private readonly preferredHand: Handedness | undefined;
  private activeHand: Handedness | null = null;
  private pendingCalibration: Calibration | null = null;
  private lastTimestamp = 0;

  constructor(options: GestureControllerOptions = {}) {
    this.detector = new GestureDetector(options);
    this.exitHold = new HoldTimer({ holdMs: options.exitHoldMs ?? DETECTOR_DEFAULTS.EXIT_HOLD_MS });
    this.preferredHand = options.preferredHand;
  }

  /**
   * Process one frame and return the events it produced.
   */
  tick(frame: HandFrame): GestureEvent[] {
    this.applyPendingCalibration();
    this.lastTimestamp = frame.timestamp;

    const hand = selectHand(frame.hands, this.preferredHand);
    if (!hand) {
      this.loseHand();
      return [];
    }
    if (this.activeHand !== null && this.activeHand !== hand.handedness) {
      log.debug('Tracked hand changed', { from: this.activeHand, to: hand.handedness });
      this.loseHand();
    }
    this.activeHand = hand.handedness;

    const events: GestureEvent[] = [];
    try {
      assertLandmarkFrame(hand.landmarks);
      const click = this.detector.detectClick(hand.landmarks, frame.timestamp);
      if (click.detected) {
        events.push({
          type: 'click_detected',
          distance: click.distance,
          timestamp: frame.timestamp,
          handedness: hand.handedness,
        });
      }

      const exit = this.detector.detectExit(hand.landmarks);
      if (this.exitHold.update(exit.detected, frame.timestamp)) {
        events.push({
          type: 'exit_detected',
          distance: exit.distance,
          timestamp: frame.timestamp,
          handedness: hand.handedness,
        });
      }
    } catch (error) {
      if (!(error instanceof MalformedLandmarkFrameError)) {
        throw error;
      }
      log.warn('Skipping malformed landmark frame', { length: error.length });
      this.loseHand();
      return [];
    }

    return events;
  }

  /**
   * Read frames until the source ends or the signal aborts.
   * @returns the number of frames processed
   */
  async run(source: HandSource, options: RunOptions): Promise<number> {
    let ticks = 0;
    while (!options.signal?.aborted) {
      const frame = await source.readFrame();
      if (!frame) {
        log.info('Hand source ended', { ticks });
        break;
      }
      const events = this.tick(frame);
      ticks++;
      for (const event of events) {
        options.onEvent(event);
      }
      options.onTick?.(frame, events);
    }
    return ticks;
  }

  /**
   * Queue a calibration to replace the active one at the next tick boundary.
   */
  requestCalibrationInstall(calibration: Calibration): void {
    this.pendingCalibration = calibration;
  }

  getDiagnostics(nowMs: number = this.lastTimestamp): GestureDiagnostics {
    const calibration = this.detector.calibration;
    return {
      currentClickDistance: this.detector.currentClickDistance,
      currentExitDistance: this.detector.currentExitDistance,
      timeUntilNextClick: this.detector.timeUntilNextClick(nowMs),
      isCalibrated: this.detector.isCalibrated,
      clickThreshold: calibration.clickThreshold,
      exitThreshold: calibration.exitThreshold,
      exitHoldProgress: this.exitHold.progress(nowMs),
      activeHand: this.activeHand,
    };
  }

  get calibration(): Calibration {
    return this.detector.calibration;
  }

  get hasPendingCalibration(): boolean {
    return this.pendingCalibration !== null;
  }

  private applyPendingCalibration(): void {
    if (!this.pendingCalibration) {
      return;
    }
    this.detector.installCalibration(this.pendingCalibration);
    log.info('Installed calibration', {
      clickThreshold: this.pendingCalibration.clickThreshold,
      exitThreshold: this.pendingCalibration.exitThreshold,
    });
    this.pendingCalibration = null;
  }

  private loseHand(): void {
    if (this.activeHand !== null) {
      this.detector.resetSmoothing();
      this.exitHold.reset();
      this.activeHand = null;
    }
  }
}
