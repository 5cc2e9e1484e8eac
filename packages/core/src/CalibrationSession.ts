/**
 * @fileoverview Interactive calibration flow as a tick-driven state machine.
 *
 * countdown → collecting → complete, with cancelled, timed_out and error as
 * side exits. The session never touches the calibration currently in use;
 * a successful outcome carries a new Calibration for the caller to install.
 */

import type { CalibrationSink } from './CalibrationStore.js';
import { SESSION_DEFAULTS } from './constants.js';
import { CalibrationError } from './errors.js';
import { HandCalibrator } from './HandCalibrator.js';
import type { Calibration, SampleResult, TrackedHand } from './types.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('calibration');

export type CalibrationState =
  | 'countdown'
  | 'collecting'
  | 'complete'
  | 'cancelled'
  | 'timed_out'
  | 'error';

/**
 * Guidance for the user on the current tick.
 */
export type CalibrationNotice = 'position_hand' | 'hold_steady' | 'hand_lost';

export type CalibrationOutcome =
  | {
      status: 'completed';
      calibration: Calibration;
      /** Whether the store accepted the new record */
      persisted: boolean;
      samplesCollected: number;
    }
  | { status: 'cancelled'; reason: string; samplesCollected: number }
  | { status: 'timed_out'; reason: string; samplesCollected: number }
  | { status: 'error'; reason: string; error: CalibrationError; samplesCollected: number };

export interface CalibrationSessionSnapshot {
  state: CalibrationState;
  samplesCollected: number;
  requiredSamples: number;
  /** Collected / required, 0..1 */
  progress: number;
  /** Whole seconds left on the countdown, for display */
  countdownSeconds: number;
  elapsedMs: number;
  notice: CalibrationNotice | null;
  lastSample: SampleResult | null;
  outcome: CalibrationOutcome | null;
}

export interface CalibrationSessionOptions {
  requiredSamples?: number;
  countdownMs?: number;
  /** Wall-clock budget for the whole session */
  timeoutMs?: number;
  /** Where a successful calibration is persisted */
  store?: CalibrationSink;
  /** Sample collector for this session; a fresh HandCalibrator by default */
  calibrator?: HandCalibrator;
}

/**
 * One guided calibration attempt.
 *
 * Call `tick` once per captured frame with the hand to sample (or null when
 * no hand is visible). Cancellation and the timeout are checked at the start
 * of every tick.
 */
export class CalibrationSession {
  readonly requiredSamples: number;
  readonly countdownMs: number;
  readonly timeoutMs: number;
  readonly startTime: number;
  private readonly store: CalibrationSink | undefined;
  private readonly calibrator: HandCalibrator;
  private currentState: CalibrationState = 'countdown';
  private countdownDeadline: number;
  private cancelReason: string | null = null;
  private collected = 0;
  private notice: CalibrationNotice | null = null;
  private lastSample: SampleResult | null = null;
  private lastTick: number;
  private result: CalibrationOutcome | null = null;

  constructor(startTimeMs: number, options: CalibrationSessionOptions = {}) {
    this.requiredSamples = options.requiredSamples ?? SESSION_DEFAULTS.REQUIRED_SAMPLES;
    this.countdownMs = options.countdownMs ?? SESSION_DEFAULTS.COUNTDOWN_MS;
    this.timeoutMs = options.timeoutMs ?? SESSION_DEFAULTS.TIMEOUT_MS;
    if (!Number.isInteger(this.requiredSamples) || this.requiredSamples < 1) {
      throw new RangeError(`requiredSamples must be a positive integer, got ${this.requiredSamples}`);
    }
    this.store = options.store;
    this.calibrator = options.calibrator ?? new HandCalibrator();
    this.calibrator.reset();
    this.startTime = startTimeMs;
    this.lastTick = startTimeMs;
    this.countdownDeadline = startTimeMs + this.countdownMs;
    log.info('Starting calibration', {
      requiredSamples: this.requiredSamples,
      timeoutMs: this.timeoutMs,
    });
  }

  /**
   * Ask the session to stop. Takes effect on the next tick.
   */
  requestCancel(reason = 'Calibration cancelled by user'): void {
    this.cancelReason ??= reason;
  }

  /**
   * Advance the session by one frame.
   * @param hand - The hand to sample this tick, or null if none is visible
   */
  tick(hand: TrackedHand | null, nowMs: number): CalibrationSessionSnapshot {
    if (this.result) {
      return this.snapshot(nowMs);
    }
    this.lastTick = nowMs;

    if (this.cancelReason !== null) {
      this.resolve({
        status: 'cancelled',
        reason: this.cancelReason,
        samplesCollected: this.collected,
      });
      return this.snapshot(nowMs);
    }

    if (nowMs - this.startTime > this.timeoutMs) {
      this.resolve({
        status: 'timed_out',
        reason: `Calibration did not finish within ${this.timeoutMs / 1000} seconds`,
        samplesCollected: this.collected,
      });
      return this.snapshot(nowMs);
    }

    switch (this.currentState) {
      case 'countdown':
        this.tickCountdown(hand, nowMs);
        break;
      case 'collecting':
        this.tickCollecting(hand);
        break;
      default:
        break;
    }
    return this.snapshot(nowMs);
  }

  get state(): CalibrationState {
    return this.currentState;
  }

  get samplesCollected(): number {
    return this.collected;
  }

  get outcome(): CalibrationOutcome | null {
    return this.result;
  }

  get isFinished(): boolean {
    return this.result !== null;
  }

  snapshot(nowMs: number = this.lastTick): CalibrationSessionSnapshot {
    const countdownLeft =
      this.currentState === 'countdown' ? Math.max(0, this.countdownDeadline - nowMs) : 0;
    return {
      state: this.currentState,
      samplesCollected: this.collected,
      requiredSamples: this.requiredSamples,
      progress: Math.min(1, this.collected / this.requiredSamples),
      countdownSeconds: Math.ceil(countdownLeft / 1000),
      elapsedMs: nowMs - this.startTime,
      notice: this.notice,
      lastSample: this.lastSample,
      outcome: this.result,
    };
  }

  private tickCountdown(hand: TrackedHand | null, nowMs: number): void {
    if (!hand) {
      // The countdown only runs while a hand is in view.
      this.countdownDeadline = nowMs + this.countdownMs;
      this.notice = 'position_hand';
      return;
    }
    this.notice = null;
    if (nowMs >= this.countdownDeadline) {
      this.currentState = 'collecting';
      log.info('Starting sample collection');
    }
  }

  private tickCollecting(hand: TrackedHand | null): void {
    if (!hand) {
      this.notice = 'hand_lost';
      return;
    }

    const sample = this.calibrator.offerSample(hand.landmarks);
    this.lastSample = sample;
    if (!sample.accepted) {
      this.notice = 'hold_steady';
      if (sample.reason === 'malformed_frame') {
        log.warn('Ignoring malformed landmark frame', { length: hand.landmarks.length });
      } else {
        log.debug('Rejected implausible sample', { span: sample.span });
      }
      return;
    }

    this.notice = null;
    this.collected = sample.collected;
    if (this.collected >= this.requiredSamples) {
      this.currentState = 'complete';
      this.complete();
    }
  }

  private complete(): void {
    let calibration: Calibration;
    try {
      calibration = this.calibrator.calibrate(this.requiredSamples);
    } catch (error) {
      if (!(error instanceof CalibrationError)) {
        throw error;
      }
      this.resolve({
        status: 'error',
        reason: error.message,
        error,
        samplesCollected: this.collected,
      });
      return;
    }

    const persisted = this.persist(calibration);
    log.info('Calibration complete', {
      handSpan: calibration.handSpan,
      clickThreshold: calibration.clickThreshold,
      exitThreshold: calibration.exitThreshold,
      persisted,
    });
    this.resolve({
      status: 'completed',
      calibration,
      persisted,
      samplesCollected: this.collected,
    });
  }

  private persist(calibration: Calibration): boolean {
    if (!this.store) {
      return false;
    }
    try {
      return this.store.save(calibration);
    } catch (error) {
      log.error('Calibration store failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  private resolve(outcome: CalibrationOutcome): void {
    this.result = outcome;
    switch (outcome.status) {
      case 'completed':
        this.currentState = 'complete';
        break;
      case 'cancelled':
        this.currentState = 'cancelled';
        log.info(outcome.reason, { samplesCollected: outcome.samplesCollected });
        break;
      case 'timed_out':
        this.currentState = 'timed_out';
        log.warn(outcome.reason, { samplesCollected: outcome.samplesCollected });
        break;
      case 'error':
        this.currentState = 'error';
        log.warn('Calibration failed', { reason: outcome.reason });
        break;
    }
    this.notice = null;
    this.calibrator.reset();
  }
}
