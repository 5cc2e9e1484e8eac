/**
 * @fileoverview The landmark-source capability consumed by the gesture loop.
 *
 * Anything that turns images into 21-point hands can drive the runtime:
 * a learned model, classical computer vision or a different sensor.
 */

import type { HandFrame, TrackedHand } from '@touchless/gesture-core';

/**
 * Given an image, yield zero or more hands with 21 ordered points each.
 */
export interface HandLandmarkModel<TImage> {
  estimateHands(image: TImage): Promise<TrackedHand[]>;
}

/**
 * A captured image and its capture time in milliseconds.
 */
export interface CapturedImage<TImage> {
  image: TImage;
  timestamp: number;
}

/**
 * Produces images, e.g. from a camera. Returns null once no more frames can be read.
 */
export interface ImageSource<TImage> {
  read(): Promise<CapturedImage<TImage> | null>;
}

/**
 * One HandFrame per tick. Returns null when the stream has ended.
 */
export interface HandSource {
  readFrame(): Promise<HandFrame | null>;
}

/**
 * Compose an image source and a landmark model into a HandSource.
 */
export function createModelHandSource<TImage>(
  images: ImageSource<TImage>,
  model: HandLandmarkModel<TImage>
): HandSource {
  return {
    async readFrame() {
      const captured = await images.read();
      if (!captured) {
        return null;
      }
      const hands = await model.estimateHands(captured.image);
      return { hands, timestamp: captured.timestamp };
    },
  };
}

/**
 * Pick the hand to track: the preferred handedness if present, else the first hand.
 */
export function selectHand(
  hands: readonly TrackedHand[],
  preferred?: TrackedHand['handedness']
): TrackedHand | null {
  if (preferred) {
    const match = hands.find((hand) => hand.handedness === preferred);
    if (match) {
      return match;
    }
  }
  return hands[0] ?? null;
}
