/**
 * @fileoverview Drives a CalibrationSession from a hand source.
 */

import {
  type CalibrationOutcome,
  CalibrationSession,
  type CalibrationSessionOptions,
  type CalibrationSessionSnapshot,
  createLogger,
  type Handedness,
} from '@touchless/gesture-core';
import { type HandSource, selectHand } from '../input/HandSource.js';

const log = createLogger('calibration');

export interface RunCalibrationOptions extends CalibrationSessionOptions {
  /** Called with the session state after every tick */
  onUpdate?: (snapshot: CalibrationSessionSnapshot) => void;
  /** Aborting cancels the session on its next tick */
  signal?: AbortSignal;
  preferredHand?: Handedness | undefined;
}

/**
 * Run one calibration session to completion, one frame per tick.
 *
 * The session clock is the frame timestamps. If the source ends before the
 * session resolves, the session is cancelled. The caller decides whether to
 * install `outcome.calibration`; nothing else is changed here.
 */
export async function runCalibration(
  source: HandSource,
  options: RunCalibrationOptions = {}
): Promise<CalibrationOutcome> {
  const { onUpdate, signal, preferredHand, ...sessionOptions } = options;

  const first = await source.readFrame();
  if (!first) {
    log.warn('Failed to read frame during calibration');
    return { status: 'cancelled', reason: 'No frames available', samplesCollected: 0 };
  }

  const session = new CalibrationSession(first.timestamp, sessionOptions);
  const onAbort = () => session.requestCancel();
  signal?.addEventListener('abort', onAbort, { once: true });
  if (signal?.aborted) {
    session.requestCancel();
  }

  try {
    let frame: typeof first | null = first;
    let lastTimestamp = first.timestamp;
    while (frame) {
      lastTimestamp = frame.timestamp;
      const snapshot = session.tick(selectHand(frame.hands, preferredHand), frame.timestamp);
      onUpdate?.(snapshot);
      if (snapshot.outcome) {
        return snapshot.outcome;
      }
      frame = await source.readFrame();
    }

    log.warn('Hand source ended during calibration');
    session.requestCancel('Hand source ended');
    const snapshot = session.tick(null, lastTimestamp);
    onUpdate?.(snapshot);
    return (
      snapshot.outcome ?? {
        status: 'cancelled',
        reason: 'Hand source ended',
        samplesCollected: session.samplesCollected,
      }
    );
  } finally {
    signal?.removeEventListener('abort', onAbort);
  }
}
