import { createMalformedHand, createMockLandmarks } from '@touchless/gesture-testing';
import { beforeEach, describe, expect, it } from 'vitest';
import {
  DEFAULT_CALIBRATION,
  deriveCalibration,
  GestureDetector,
  HandCalibrator,
  ImplausibleHandSizeError,
  InsufficientSamplesError,
  MalformedLandmarkFrameError,
  measureHandSpan,
  planarDistance,
} from '../src/index.js';

function addSamples(calibrator: HandCalibrator, count: number, handSpan: number): void {
  for (let i = 0; i < count; i++) {
    calibrator.addSample(createMockLandmarks({ handSpan }));
  }
}

describe('planarDistance', () => {
  it('should ignore the z component', () => {
    expect(planarDistance({ x: 0, y: 0, z: 0 }, { x: 3, y: 4, z: 100 })).toBe(5);
  });
});

describe('measureHandSpan', () => {
  it('should measure thumb base to pinky base', () => {
    expect(measureHandSpan(createMockLandmarks({ handSpan: 240 }))).toBe(240);
  });
});

describe('HandCalibrator', () => {
  let calibrator: HandCalibrator;

  beforeEach(() => {
    calibrator = new HandCalibrator();
  });

  describe('addSample', () => {
    it('should accept a plausible span', () => {
      const result = calibrator.addSample(createMockLandmarks({ handSpan: 200 }));
      expect(result).toEqual({ accepted: true, span: 200, collected: 1 });
      expect(calibrator.sampleCount).toBe(1);
    });

    it('should accept the inclusive bounds', () => {
      expect(calibrator.addSample(createMockLandmarks({ handSpan: 50 })).accepted).toBe(true);
      expect(calibrator.addSample(createMockLandmarks({ handSpan: 500 })).accepted).toBe(true);
      expect(calibrator.sampleCount).toBe(2);
    });

    it('should reject implausible spans without counting them', () => {
      calibrator.addSample(createMockLandmarks({ handSpan: 200 }));

      const tooSmall = calibrator.addSample(createMockLandmarks({ handSpan: 40 }));
      const tooLarge = calibrator.addSample(createMockLandmarks({ handSpan: 600 }));

      expect(tooSmall).toEqual({
        accepted: false,
        span: 40,
        collected: 1,
        reason: 'span_out_of_range',
      });
      expect(tooLarge.accepted).toBe(false);
      expect(calibrator.sampleCount).toBe(1);
    });

    it('should throw on a frame without 21 landmarks', () => {
      expect(() => calibrator.addSample(createMalformedHand(20).landmarks)).toThrow(
        MalformedLandmarkFrameError
      );
    });
  });

  describe('offerSample', () => {
    it('should report a malformed frame as a rejected sample', () => {
      const result = calibrator.offerSample(createMalformedHand(17).landmarks);
      expect(result).toEqual({
        accepted: false,
        span: null,
        collected: 0,
        reason: 'malformed_frame',
      });
    });
  });

  describe('calibrate', () => {
    it('should fail with fewer samples than required', () => {
      addSamples(calibrator, 29, 200);
      expect(() => calibrator.calibrate(30)).toThrow(InsufficientSamplesError);
      expect(() => calibrator.calibrate(30)).toThrow('Insufficient samples: 29/30');
    });

    it('should fail with no samples even when nothing is required', () => {
      expect(() => calibrator.calibrate(0)).toThrow(InsufficientSamplesError);
    });

    it('should leave the installed calibration uncalibrated on failure', () => {
      const detector = new GestureDetector();
      addSamples(calibrator, 10, 200);
      expect(() => calibrator.calibrate(30)).toThrow(InsufficientSamplesError);
      expect(detector.isCalibrated).toBe(false);
      expect(detector.calibration).toBe(DEFAULT_CALIBRATION);
    });

    it('should floor-clamp thresholds for a 200px hand', () => {
      addSamples(calibrator, 30, 200);
      expect(calibrator.calibrate(30)).toEqual({
        handSpan: 200,
        clickThreshold: 30,
        exitThreshold: 25,
        calibrated: true,
      });
    });

    it('should scale thresholds for a 400px hand', () => {
      addSamples(calibrator, 30, 400);
      const calibration = calibrator.calibrate(30);
      expect(calibration.clickThreshold).toBe(48);
      expect(calibration.exitThreshold).toBe(40);
    });

    it('should use the mean of all samples', () => {
      addSamples(calibrator, 15, 300);
      addSamples(calibrator, 15, 500);
      const calibration = calibrator.calibrate(30);
      expect(calibration.handSpan).toBe(400);
      expect(calibration.clickThreshold).toBe(48);
    });

    it('should succeed at the 50px and 500px bounds', () => {
      addSamples(calibrator, 30, 50);
      expect(calibrator.calibrate(30)).toMatchObject({ clickThreshold: 30, exitThreshold: 25 });

      calibrator.reset();
      addSamples(calibrator, 30, 500);
      expect(calibrator.calibrate(30)).toMatchObject({ clickThreshold: 60, exitThreshold: 50 });
    });

    it('should return a frozen value', () => {
      addSamples(calibrator, 30, 200);
      expect(Object.isFrozen(calibrator.calibrate(30))).toBe(true);
    });
  });

  describe('progress and reset', () => {
    it('should report progress towards the required count', () => {
      addSamples(calibrator, 15, 200);
      expect(calibrator.progress(30)).toBe(0.5);
      addSamples(calibrator, 20, 200);
      expect(calibrator.progress(30)).toBe(1);
    });

    it('should discard samples on reset', () => {
      addSamples(calibrator, 5, 200);
      calibrator.reset();
      expect(calibrator.sampleCount).toBe(0);
    });
  });
});

describe('deriveCalibration', () => {
  it('should reject spans outside [50, 500]', () => {
    expect(() => deriveCalibration(49.9)).toThrow(ImplausibleHandSizeError);
    expect(() => deriveCalibration(500.1)).toThrow(ImplausibleHandSizeError);
    expect(() => deriveCalibration(Number.NaN)).toThrow(ImplausibleHandSizeError);
  });

  it('should describe the rejected size', () => {
    expect(() => deriveCalibration(42)).toThrow('Invalid hand size detected: 42.0px');
  });

  it('should round before clamping', () => {
    expect(deriveCalibration(458)).toMatchObject({ clickThreshold: 55, exitThreshold: 46 });
    expect(deriveCalibration(420)).toMatchObject({ clickThreshold: 50, exitThreshold: 42 });
  });
});
