/**
 * @fileoverview Gesture runtime: settings, landmark sources and the frame loop.
 */

export { type RunCalibrationOptions, runCalibration } from './calibration/runCalibration.js';
export {
  clearSettingsCache,
  DEFAULT_CALIBRATION_FILE,
  defaultSettings,
  InvalidSettingsError,
  loadSettings,
  parseSettings,
  resolveSettingsPath,
  type Settings,
} from './config/settings.js';
export {
  createGestureRuntime,
  type GestureRuntime,
  type GestureRuntimeOptions,
} from './createGestureRuntime.js';
export {
  GestureController,
  type GestureControllerOptions,
  type GestureDiagnostics,
  type GestureEvent,
  type GestureEventCallback,
  type RunOptions,
} from './GestureController.js';
export {
  type CapturedImage,
  createModelHandSource,
  type HandLandmarkModel,
  type HandSource,
  type ImageSource,
  selectHand,
} from './input/HandSource.js';
