/**
 * @fileoverview Hold-to-confirm timer for gestures that must be held.
 */

export interface HoldTimerOptions {
  /** How long the condition must hold continuously, in milliseconds */
  holdMs: number;
}

/**
 * Fires once when a condition has been true for `holdMs` without interruption.
 *
 * A single tick with the condition false restarts the timer. After firing,
 * the condition must be released before the timer can fire again.
 */
export class HoldTimer {
  readonly holdMs: number;
  private startTime: number | null = null;
  private fired = false;

  constructor(options: HoldTimerOptions) {
    if (!(options.holdMs >= 0)) {
      throw new RangeError(`holdMs must be >= 0, got ${options.holdMs}`);
    }
    this.holdMs = options.holdMs;
  }

  /**
   * Feed the condition for this tick.
   * @returns true on the tick the hold completes
   */
  update(active: boolean, nowMs: number): boolean {
    if (!active) {
      this.reset();
      return false;
    }
    if (this.startTime === null) {
      this.startTime = nowMs;
    }
    if (!this.fired && nowMs - this.startTime >= this.holdMs) {
      this.fired = true;
      return true;
    }
    return false;
  }

  reset(): void {
    this.startTime = null;
    this.fired = false;
  }

  /**
   * Fraction of the hold completed (0 when not holding).
   */
  progress(nowMs: number): number {
    if (this.startTime === null) return 0;
    if (this.holdMs === 0) return 1;
    return Math.min(1, Math.max(0, (nowMs - this.startTime) / this.holdMs));
  }

  get isHolding(): boolean {
    return this.startTime !== null;
  }
}
