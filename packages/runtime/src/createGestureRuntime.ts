/**
 * @fileoverview Wires settings, the calibration store and the gesture loop together.
 */

import { isAbsolute, join } from 'node:path';
import {
  type CalibrationOutcome,
  CalibrationStore,
  type CalibrationSessionSnapshot,
  setLogLevel,
} from '@touchless/gesture-core';
import { runCalibration } from './calibration/runCalibration.js';
import type { Settings } from './config/settings.js';
import { GestureController } from './GestureController.js';
import type { HandSource } from './input/HandSource.js';

export interface GestureRuntime {
  readonly settings: Settings;
  readonly controller: GestureController;
  readonly store: CalibrationStore;
  /**
   * Run a calibration session on `source`. On success the new calibration is
   * queued for installation at the controller's next tick.
   */
  calibrate(
    source: HandSource,
    options?: {
      onUpdate?: (snapshot: CalibrationSessionSnapshot) => void;
      signal?: AbortSignal;
    }
  ): Promise<CalibrationOutcome>;
}

export interface GestureRuntimeOptions {
  /** Base directory for a relative calibration file (default: cwd) */
  baseDir?: string;
  /** Use this store instead of one built from settings */
  store?: CalibrationStore;
}

/**
 * Build the runtime from settings. The persisted calibration is loaded once
 * here; a missing or unreadable record leaves the default thresholds.
 */
export function createGestureRuntime(
  settings: Settings,
  options: GestureRuntimeOptions = {}
): GestureRuntime {
  setLogLevel(settings.logLevel);

  const baseDir = options.baseDir ?? process.cwd();
  const file = settings.calibration.file;
  const store =
    options.store ?? new CalibrationStore(isAbsolute(file) ? file : join(baseDir, file));

  const controller = new GestureController({
    clickDelayMs: settings.clickDelayMs,
    smoothing: settings.smoothing.enabled,
    smoothingWindow: settings.smoothing.window,
    exitHoldMs: settings.exitHoldMs,
    preferredHand: settings.preferredHand,
    calibration: store.load(),
  });

  return {
    settings,
    controller,
    store,
    async calibrate(source, calibrateOptions = {}) {
      const outcome = await runCalibration(source, {
        ...calibrateOptions,
        requiredSamples: settings.calibration.requiredSamples,
        countdownMs: settings.calibration.countdownMs,
        timeoutMs: settings.calibration.timeoutMs,
        preferredHand: settings.preferredHand,
        store,
      });
      if (outcome.status === 'completed') {
        controller.requestCalibrationInstall(outcome.calibration);
      }
      return outcome;
    },
  };
}
