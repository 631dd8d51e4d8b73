/**
 * Keypoint detectors over 8-bit grayscale pixels.
 *
 * FAST-9 segment test and the Shi-Tomasi / Harris corner measures, each
 * producing a response per keypoint. Only the response distribution feeds the
 * statistics, positions are used for annotation and keypoint dumps.
 */
import type { GrayImage, Keypoint } from './types';

// ==========================================
// FAST
// ==========================================

export type FastOptions = {
  /** Intensity difference a ring pixel must exceed (default: 10) */
  threshold?: number;
  /** Keep only 3x3 local maxima of the score (default: true) */
  nonmaxSuppression?: boolean;
};

// Bresenham circle of radius 3, clockwise from 12 o'clock
const RING: ReadonlyArray<readonly [number, number]> = [
  [0, -3], [1, -3], [2, -2], [3, -1],
  [3, 0], [3, 1], [2, 2], [1, 3],
  [0, 3], [-1, 3], [-2, 2], [-3, 1],
  [-3, 0], [-3, -1], [-2, -2], [-1, -3],
];
const ARC_LENGTH = 9;
const FAST_KEYPOINT_SIZE = 7;

/**
 * Largest t for which 9 contiguous ring pixels are all brighter than
 * center + t or all darker than center - t. Zero when no such arc exists.
 */
function fastScore(image: GrayImage, x: number, y: number): number {
  const { width, data } = image;
  const center = data[y * width + x];
  const diffs = RING.map(([dx, dy]) => data[(y + dy) * width + (x + dx)] - center);

  let best = 0;
  for (let start = 0; start < RING.length; start++) {
    let minBright = Infinity;
    let minDark = Infinity;
    for (let k = 0; k < ARC_LENGTH; k++) {
      const d = diffs[(start + k) % RING.length];
      minBright = Math.min(minBright, d);
      minDark = Math.min(minDark, -d);
    }
    best = Math.max(best, minBright, minDark);
  }
  return best;
}

export function detectFast(image: GrayImage, options: FastOptions = {}): Keypoint[] {
  const threshold = options.threshold ?? 10;
  const nonmax = options.nonmaxSuppression ?? true;
  const { width, height } = image;
  const border = 3;

  if (width <= 2 * border || height <= 2 * border) return [];

  const scores = new Float32Array(width * height);
  for (let y = border; y < height - border; y++) {
    for (let x = border; x < width - border; x++) {
      const score = fastScore(image, x, y);
      if (score > threshold) scores[y * width + x] = score;
    }
  }

  const keypoints: Keypoint[] = [];
  for (let y = border; y < height - border; y++) {
    for (let x = border; x < width - border; x++) {
      const score = scores[y * width + x];
      if (score === 0) continue;
      if (nonmax && !isLocalMax(scores, width, height, x, y)) continue;
      keypoints.push({ x, y, size: FAST_KEYPOINT_SIZE, response: score });
    }
  }
  return keypoints;
}

// ==========================================
// CORNER MEASURES (Shi-Tomasi / Harris)
// ==========================================

export type CornerOptions = {
  /** Max keypoints returned, strongest first (default: 1000) */
  maxCorners?: number;
  /** Fraction of the strongest response a corner must reach (default: 0.01) */
  qualityLevel?: number;
  /** Minimum pixel distance between returned corners (default: 1) */
  minDistance?: number;
  /** Side of the window summing the gradient products (default: 3) */
  blockSize?: number;
  /** Use det - k * trace^2 instead of the minimum eigenvalue */
  useHarris?: boolean;
  /** Harris free parameter (default: 0.04) */
  k?: number;
};

function sobel(image: GrayImage): { gx: Float32Array; gy: Float32Array } {
  const { width, height, data } = image;
  const gx = new Float32Array(width * height);
  const gy = new Float32Array(width * height);
  const at = (x: number, y: number) =>
    data[Math.min(height - 1, Math.max(0, y)) * width + Math.min(width - 1, Math.max(0, x))];

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      gx[y * width + x] =
        at(x + 1, y - 1) + 2 * at(x + 1, y) + at(x + 1, y + 1) -
        at(x - 1, y - 1) - 2 * at(x - 1, y) - at(x - 1, y + 1);
      gy[y * width + x] =
        at(x - 1, y + 1) + 2 * at(x, y + 1) + at(x + 1, y + 1) -
        at(x - 1, y - 1) - 2 * at(x, y - 1) - at(x + 1, y - 1);
    }
  }
  return { gx, gy };
}

export function cornerResponseMap(image: GrayImage, options: CornerOptions = {}): Float32Array {
  const { width, height } = image;
  const blockSize = options.blockSize ?? 3;
  const useHarris = options.useHarris ?? false;
  const k = options.k ?? 0.04;
  const radius = Math.floor(blockSize / 2);
  const { gx, gy } = sobel(image);
  const response = new Float32Array(width * height);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let sxx = 0;
      let syy = 0;
      let sxy = 0;
      for (let wy = y - radius; wy <= y + radius; wy++) {
        if (wy < 0 || wy >= height) continue;
        for (let wx = x - radius; wx <= x + radius; wx++) {
          if (wx < 0 || wx >= width) continue;
          const ix = gx[wy * width + wx];
          const iy = gy[wy * width + wx];
          sxx += ix * ix;
          syy += iy * iy;
          sxy += ix * iy;
        }
      }

      if (useHarris) {
        const trace = sxx + syy;
        response[y * width + x] = sxx * syy - sxy * sxy - k * trace * trace;
      } else {
        const half = (sxx + syy) / 2;
        const root = Math.sqrt(((sxx - syy) / 2) ** 2 + sxy * sxy);
        response[y * width + x] = half - root;
      }
    }
  }
  return response;
}

export function detectCorners(image: GrayImage, options: CornerOptions = {}): Keypoint[] {
  const { width, height } = image;
  const maxCorners = options.maxCorners ?? 1000;
  const qualityLevel = options.qualityLevel ?? 0.01;
  const minDistance = options.minDistance ?? 1;
  const blockSize = options.blockSize ?? 3;

  const response = cornerResponseMap(image, options);
  let maxResponse = 0;
  for (const r of response) {
    if (r > maxResponse) maxResponse = r;
  }
  if (maxResponse <= 0) return [];

  const cutoff = maxResponse * qualityLevel;
  const candidates: Keypoint[] = [];
  for (let y = 1; y < height - 1; y++) {
    for (let x = 1; x < width - 1; x++) {
      const r = response[y * width + x];
      if (r < cutoff || r <= 0) continue;
      if (!isLocalMax(response, width, height, x, y)) continue;
      candidates.push({ x, y, size: blockSize, response: r });
    }
  }

  candidates.sort((a, b) => b.response - a.response);

  const kept: Keypoint[] = [];
  const minDistSq = minDistance * minDistance;
  for (const c of candidates) {
    if (kept.length >= maxCorners) break;
    const tooClose = kept.some((p) => (p.x - c.x) ** 2 + (p.y - c.y) ** 2 < minDistSq);
    if (!tooClose) kept.push(c);
  }
  return kept;
}

// ==========================================
// HELPERS
// ==========================================

function isLocalMax(
  values: Float32Array,
  width: number,
  height: number,
  x: number,
  y: number
): boolean {
  const v = values[y * width + x];
  for (let dy = -1; dy <= 1; dy++) {
    for (let dx = -1; dx <= 1; dx++) {
      if (dx === 0 && dy === 0) continue;
      const nx = x + dx;
      const ny = y + dy;
      if (nx < 0 || ny < 0 || nx >= width || ny >= height) continue;
      if (values[ny * width + nx] > v) return false;
    }
  }
  return true;
}
