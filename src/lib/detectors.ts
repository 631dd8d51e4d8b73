import { detectCorners, detectFast } from './keypoints';
import { ConfigError } from './detection-utils';
import type { GrayImage, Keypoint } from './types';

/**
 * A keypoint detector. Must be deterministic for the same pixels and must
 * not mutate the image.
 */
export interface FeatureDetector {
  readonly name: string;
  detect(image: GrayImage): Keypoint[];
}

export const DETECTOR_NAMES = ['FAST', 'GFTTDetector', 'Harris'] as const;
export type DetectorName = (typeof DETECTOR_NAMES)[number];

// OpenCV detector names and groups with no implementation here
const UNSUPPORTED = [
  'SIFT',
  'BRISK',
  'ORB',
  'AKAZE',
  'MSER',
  'SimpleBlobDetector',
  'blob',
  'AgastFeatureDetector',
  'Agast',
  'desc',
];

const ALIASES: Record<string, DetectorName> = {
  GFTT: 'GFTTDetector',
};

const FACTORIES: Record<DetectorName, () => FeatureDetector> = {
  FAST: () => ({
    name: 'FAST',
    detect: (image) => detectFast(image),
  }),
  GFTTDetector: () => ({
    name: 'GFTTDetector',
    detect: (image) => detectCorners(image),
  }),
  Harris: () => ({
    name: 'Harris',
    detect: (image) => detectCorners(image, { useHarris: true }),
  }),
};

function isDetectorName(value: string): value is DetectorName {
  return (DETECTOR_NAMES as readonly string[]).includes(value);
}

/**
 * Resolve a selection ("all", a name, an alias, or a comma-separated list)
 * into canonical detector names, in registry order, without duplicates.
 */
export function resolveDetectorNames(selection: string): DetectorName[] {
  const tokens = selection
    .split(',')
    .map((t) => t.trim())
    .filter(Boolean);

  if (tokens.length === 0) {
    throw new ConfigError('No detector selected');
  }

  const selected = new Set<DetectorName>();
  for (const token of tokens) {
    if (token === 'all') {
      for (const name of DETECTOR_NAMES) selected.add(name);
    } else if (isDetectorName(token)) {
      selected.add(token);
    } else if (Object.hasOwn(ALIASES, token)) {
      selected.add(ALIASES[token]);
    } else if (UNSUPPORTED.includes(token)) {
      throw new ConfigError(`Detector not available in this build: ${token}`);
    } else {
      throw new ConfigError(`Unknown detector: ${token}`);
    }
  }

  return DETECTOR_NAMES.filter((name) => selected.has(name));
}

export function createDetectors(names: readonly DetectorName[]): FeatureDetector[] {
  return names.map((name) => FACTORIES[name]());
}
