import {
  DEFAULT_CALIBRATION,
  deriveCalibration,
  type HandFrame,
  setLogLevel,
} from '@touchless/gesture-core';
import {
  createFrameSequence,
  createMalformedHand,
  createMockHandFrame,
  createMockTrackedHand,
  createScriptedHandSource,
} from '@touchless/gesture-testing';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { GestureController, type GestureEvent } from '../src/index.js';

describe('GestureController', () => {
  const pinched = createMockTrackedHand({ pinching: true });
  const open = createMockTrackedHand();
  const exitPinch = createMockTrackedHand({ exitDistance: 10 });

  beforeEach(() => {
    setLogLevel('error');
  });

  afterEach(() => {
    setLogLevel('info');
  });

  async function collectEvents(
    controller: GestureController,
    frames: HandFrame[]
  ): Promise<GestureEvent[]> {
    const events: GestureEvent[] = [];
    await controller.run(createScriptedHandSource(frames), {
      onEvent: (event) => events.push(event),
    });
    return events;
  }

  it('should emit a click for a thumb-index pinch', () => {
    const controller = new GestureController({ smoothing: false });
    expect(controller.tick(createMockHandFrame([pinched], 0))).toEqual([
      { type: 'click_detected', distance: 10, timestamp: 0, handedness: 'Right' },
    ]);
  });

  it('should emit nothing for an open hand or an empty frame', () => {
    const controller = new GestureController({ smoothing: false });
    expect(controller.tick(createMockHandFrame([open], 0))).toEqual([]);
    expect(controller.tick(createMockHandFrame([], 100))).toEqual([]);
  });

  it('should emit exit once after the hold', async () => {
    const controller = new GestureController({ smoothing: false, exitHoldMs: 1500 });
    const frames = createFrameSequence({
      durationMs: 3000,
      intervalMs: 100,
      handAt: () => exitPinch,
    });

    const events = await collectEvents(controller, frames);

    expect(events).toEqual([
      { type: 'exit_detected', distance: 10, timestamp: 1500, handedness: 'Right' },
    ]);
  });

  it('should restart the exit hold when the hand disappears', async () => {
    const controller = new GestureController({ smoothing: false, exitHoldMs: 1500 });
    const frames = createFrameSequence({
      durationMs: 2700,
      intervalMs: 100,
      handAt: (timestamp) => (timestamp === 1100 ? null : exitPinch),
    });

    expect(await collectEvents(controller, frames)).toEqual([]);
    expect(controller.getDiagnostics(2600).exitHoldProgress).toBeCloseTo(1400 / 1500);

    expect(controller.tick(createMockHandFrame([exitPinch], 2700))).toEqual([
      { type: 'exit_detected', distance: 10, timestamp: 2700, handedness: 'Right' },
    ]);
  });

  it('should install a requested calibration at the next tick', () => {
    const calibration = deriveCalibration(250);
    const controller = new GestureController({ smoothing: false });
    const nearPinch = createMockTrackedHand({ pinchDistance: 40 });

    controller.requestCalibrationInstall(calibration);
    expect(controller.hasPendingCalibration).toBe(true);
    expect(controller.calibration).toBe(DEFAULT_CALIBRATION);

    // 40px clicks under the default 50px threshold but not under 30px
    expect(controller.tick(createMockHandFrame([nearPinch], 0))).toEqual([]);
    expect(controller.calibration).toBe(calibration);
    expect(controller.hasPendingCalibration).toBe(false);
  });

  it('should track the preferred hand', () => {
    const left = createMockTrackedHand({ handedness: 'Left', pinching: true });
    const right = createMockTrackedHand({ handedness: 'Right' });

    const preferRight = new GestureController({ smoothing: false, preferredHand: 'Right' });
    expect(preferRight.tick(createMockHandFrame([left, right], 0))).toEqual([]);

    const firstHand = new GestureController({ smoothing: false });
    expect(firstHand.tick(createMockHandFrame([left, right], 0))).toEqual([
      { type: 'click_detected', distance: 10, timestamp: 0, handedness: 'Left' },
    ]);
  });

  it('should not average distances across a change of hand', () => {
    const controller = new GestureController({ smoothingWindow: 5 });
    const rightOpen = createMockTrackedHand({ handedness: 'Right' });
    const leftPinched = createMockTrackedHand({ handedness: 'Left', pinching: true });

    controller.tick(createMockHandFrame([rightOpen], 0));
    controller.tick(createMockHandFrame([rightOpen], 100));
    controller.tick(createMockHandFrame([rightOpen], 200));

    expect(controller.tick(createMockHandFrame([leftPinched], 300))).toEqual([
      { type: 'click_detected', distance: 10, timestamp: 300, handedness: 'Left' },
    ]);
  });

  it('should skip a malformed frame and drop the tracked hand', () => {
    const controller = new GestureController({ smoothing: false });
    controller.tick(createMockHandFrame([open], 0));

    expect(controller.tick(createMockHandFrame([createMalformedHand()], 100))).toEqual([]);
    expect(controller.getDiagnostics().activeHand).toBeNull();
  });

  it('should skip a frame with extra landmarks even when it pinches', () => {
    const controller = new GestureController({ smoothing: false });
    const extra = createMockTrackedHand({ pinching: true });
    const oversized = {
      ...extra,
      landmarks: [...extra.landmarks, ...extra.landmarks.slice(0, 4)],
    };

    expect(controller.tick(createMockHandFrame([oversized], 0))).toEqual([]);
    expect(controller.getDiagnostics().activeHand).toBeNull();
    expect(controller.getDiagnostics().currentClickDistance).toBeNull();
  });

  it('should report diagnostics', () => {
    const controller = new GestureController({ smoothing: false });
    controller.tick(createMockHandFrame([open], 0));

    expect(controller.getDiagnostics()).toEqual({
      currentClickDistance: 120,
      currentExitDistance: 150,
      timeUntilNextClick: 0,
      isCalibrated: false,
      clickThreshold: 50,
      exitThreshold: 40,
      exitHoldProgress: 0,
      activeHand: 'Right',
    });
  });

  it('should report the click cooldown', () => {
    const controller = new GestureController({ smoothing: false, clickDelayMs: 500 });
    controller.tick(createMockHandFrame([pinched], 1000));
    expect(controller.getDiagnostics(1200).timeUntilNextClick).toBe(300);
  });

  it('should stop running when the signal aborts', async () => {
    const controller = new GestureController({ smoothing: false });
    const abort = new AbortController();
    const frames = createFrameSequence({ durationMs: 30, intervalMs: 10, handAt: () => pinched });
    const source = createScriptedHandSource(frames);
    const seen: number[] = [];

    const ticks = await controller.run(source, {
      onEvent: (event) => seen.push(event.timestamp),
      onTick: () => abort.abort(),
      signal: abort.signal,
    });

    expect(ticks).toBe(1);
    expect(seen).toEqual([0]);
    expect(source.framesRead).toBe(1);
  });
});
