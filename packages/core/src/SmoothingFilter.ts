/**
 * @fileoverview Moving-average filter for a single scalar signal.
 */

import { DETECTOR_DEFAULTS } from './constants.js';

/**
 * Fixed-window moving average.
 *
 * The output is the mean of whatever is buffered, so the very first push
 * returns the pushed value; there is no zero padding.
 */
export class SmoothingFilter {
  readonly windowSize: number;
  private readonly values: number[] = [];

  constructor(windowSize: number = DETECTOR_DEFAULTS.SMOOTHING_WINDOW) {
    if (!Number.isInteger(windowSize) || windowSize < 1) {
      throw new RangeError(`Smoothing window must be a positive integer, got ${windowSize}`);
    }
    this.windowSize = windowSize;
  }

  /**
   * Add a measurement and return the mean of the current window.
   */
  push(value: number): number {
    this.values.push(value);
    if (this.values.length > this.windowSize) {
      this.values.shift();
    }
    let sum = 0;
    for (const v of this.values) {
      sum += v;
    }
    return sum / this.values.length;
  }

  reset(): void {
    this.values.length = 0;
  }

  get size(): number {
    return this.values.length;
  }

  /**
   * True once the window is full.
   */
  get isReady(): boolean {
    return this.values.length === this.windowSize;
  }
}
