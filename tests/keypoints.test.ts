import { describe, expect, it } from 'vitest';
import { cornerResponseMap, detectCorners, detectFast } from '../src/lib/keypoints';
import type { GrayImage, Keypoint } from '../src/lib/types';

const SIZE = 32;
const LOW = 10;
const HIGH = 19;
const CORNERS: Array<[number, number]> = [
  [LOW, LOW],
  [HIGH, LOW],
  [LOW, HIGH],
  [HIGH, HIGH],
];

/** A bright square spanning [10, 19] x [10, 19] on a dark background */
function squareImage(): GrayImage {
  const data = new Uint8Array(SIZE * SIZE).fill(20);
  for (let y = LOW; y <= HIGH; y++) {
    for (let x = LOW; x <= HIGH; x++) {
      data[y * SIZE + x] = 200;
    }
  }
  return { width: SIZE, height: SIZE, data };
}

function flatImage(value = 128): GrayImage {
  return { width: SIZE, height: SIZE, data: new Uint8Array(SIZE * SIZE).fill(value) };
}

function distanceToNearestCorner(kp: Keypoint): number {
  return Math.min(...CORNERS.map(([cx, cy]) => Math.max(Math.abs(kp.x - cx), Math.abs(kp.y - cy))));
}

describe('detectFast', () => {
  it('finds keypoints at each corner of a bright square and nowhere else', () => {
    const keypoints = detectFast(squareImage());

    expect(keypoints.length).toBeGreaterThan(0);
    for (const kp of keypoints) {
      expect(distanceToNearestCorner(kp)).toBeLessThanOrEqual(2);
      expect(kp.response).toBe(180);
    }
    for (const [cx, cy] of CORNERS) {
      expect(keypoints.some((kp) => Math.abs(kp.x - cx) <= 2 && Math.abs(kp.y - cy) <= 2)).toBe(true);
    }
  });

  it('rejects corners whose contrast does not exceed the threshold', () => {
    expect(detectFast(squareImage(), { threshold: 180 })).toEqual([]);
    expect(detectFast(squareImage(), { threshold: 179 }).length).toBeGreaterThan(0);
  });

  it('finds nothing on a flat image', () => {
    expect(detectFast(flatImage())).toEqual([]);
  });

  it('finds nothing on an image too small for the ring', () => {
    expect(detectFast({ width: 6, height: 6, data: new Uint8Array(36) })).toEqual([]);
  });

  it('does not modify the image', () => {
    const image = squareImage();
    const before = Uint8Array.from(image.data);
    detectFast(image);
    expect(image.data).toEqual(before);
  });
});

describe('detectCorners', () => {
  it('ranks a square corner strongest with the minimum eigenvalue', () => {
    const keypoints = detectCorners(squareImage());

    expect(keypoints.length).toBeGreaterThan(0);
    expect(distanceToNearestCorner(keypoints[0])).toBeLessThanOrEqual(2);
    expect(keypoints[0].response).toBeGreaterThan(0);
  });

  it('ranks a square corner strongest with the Harris measure', () => {
    const keypoints = detectCorners(squareImage(), { useHarris: true });

    expect(keypoints.length).toBeGreaterThan(0);
    expect(distanceToNearestCorner(keypoints[0])).toBeLessThanOrEqual(2);
  });

  it('returns responses strongest first', () => {
    const responses = detectCorners(squareImage()).map((kp) => kp.response);
    expect(responses).toEqual([...responses].sort((a, b) => b - a));
  });

  it('caps the number of corners', () => {
    expect(detectCorners(squareImage(), { maxCorners: 2 })).toHaveLength(2);
  });

  it('keeps returned corners apart by minDistance', () => {
    const keypoints = detectCorners(squareImage(), { minDistance: 5 });
    for (let i = 0; i < keypoints.length; i++) {
      for (let j = i + 1; j < keypoints.length; j++) {
        const dx = keypoints[i].x - keypoints[j].x;
        const dy = keypoints[i].y - keypoints[j].y;
        expect(dx * dx + dy * dy).toBeGreaterThanOrEqual(25);
      }
    }
  });

  it('finds nothing on a flat image', () => {
    expect(detectCorners(flatImage())).toEqual([]);
    expect(detectCorners(flatImage(), { useHarris: true })).toEqual([]);
  });

  it('gives a zero minimum eigenvalue along a straight edge', () => {
    const response = cornerResponseMap(squareImage());
    // Middle of the left edge, far from both corners
    expect(response[15 * SIZE + LOW]).toBeCloseTo(0, 5);
  });
});
