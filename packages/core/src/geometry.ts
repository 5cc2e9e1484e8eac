/**
 * @fileoverview Planar landmark geometry.
 */

import { LANDMARK_COUNT } from './constants.js';
import { MalformedLandmarkFrameError } from './errors.js';
import type { Landmark, LandmarkFrame } from './types.js';

/**
 * Euclidean distance between two landmarks using x and y only.
 * Depth is ignored: pixel thresholds are defined in the image plane.
 */
export function planarDistance(a: Landmark, b: Landmark): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Assert that a frame carries exactly 21 landmarks.
 * @throws {MalformedLandmarkFrameError}
 */
export function assertLandmarkFrame(landmarks: LandmarkFrame): void {
  if (landmarks.length !== LANDMARK_COUNT) {
    throw new MalformedLandmarkFrameError(landmarks.length);
  }
}

/**
 * Read one landmark by index.
 * @throws {MalformedLandmarkFrameError} if the frame is too short
 */
export function landmarkAt(landmarks: LandmarkFrame, index: number): Landmark {
  const landmark = landmarks[index];
  if (!landmark) {
    throw new MalformedLandmarkFrameError(landmarks.length);
  }
  return landmark;
}

/**
 * Distance between two landmarks of the same frame.
 */
export function landmarkDistance(landmarks: LandmarkFrame, from: number, to: number): number {
  return planarDistance(landmarkAt(landmarks, from), landmarkAt(landmarks, to));
}
