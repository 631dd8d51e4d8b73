import sharp from 'sharp';
import path from 'path';
import { clamp, escapeXml } from './detection-utils';
import type { Keypoint } from './types';

// Common detector colors for consistency, plus dynamic generation for others
const DETECTOR_COLORS: Record<string, string> = {
  FAST: '#e63946',
  GFTTDetector: '#2ec4b6',
  Harris: '#457b9d',
};

// Generate a consistent color from any string using a hash
function stringToColor(str: string): string {
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    hash = str.charCodeAt(i) + ((hash << 5) - hash);
  }
  // Use HSL for visually distinct, saturated colors
  const h = Math.abs(hash) % 360;
  const s = 0.7;
  const l = 0.5;
  const c = (1 - Math.abs(2 * l - 1)) * s;
  const x = c * (1 - Math.abs(((h / 60) % 2) - 1));
  const m = l - c / 2;
  let r = 0, g = 0, b = 0;
  if (h < 60) { r = c; g = x; }
  else if (h < 120) { r = x; g = c; }
  else if (h < 180) { g = c; b = x; }
  else if (h < 240) { g = x; b = c; }
  else if (h < 300) { r = x; b = c; }
  else { r = c; b = x; }
  const toHex = (v: number) => Math.round((v + m) * 255).toString(16).padStart(2, '0');
  return `#${toHex(r)}${toHex(g)}${toHex(b)}`;
}

export function getDetectorColor(detectorName: string): string {
  return DETECTOR_COLORS[detectorName] ?? stringToColor(detectorName);
}

export function buildKeypointSvg(
  width: number,
  height: number,
  keypoints: readonly Keypoint[],
  detectorName: string
): string {
  const color = getDetectorColor(detectorName);
  const thickness = Math.max(1, Math.round(Math.min(width, height) / 500));
  const fontSize = Math.max(12, Math.round(Math.min(width, height) / 50));

  const circles = keypoints
    .map((kp) => {
      const radius = Math.max(2, kp.size / 2);
      const cx = clamp(kp.x, 0, width - 1);
      const cy = clamp(kp.y, 0, height - 1);
      return `  <circle cx="${cx.toFixed(1)}" cy="${cy.toFixed(1)}" r="${radius.toFixed(1)}" fill="none" stroke="${color}" stroke-width="${thickness}" />`;
    })
    .join('\n');

  const label = escapeXml(`${detectorName}: ${keypoints.length} keypoints`);
  const labelWidth = Math.min(width, label.length * fontSize * 0.6 + 12);

  return `
<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">
${circles}
  <rect x="0" y="0" width="${labelWidth.toFixed(1)}" height="${fontSize + 10}" fill="rgba(0,0,0,0.7)" />
  <text x="6" y="5" font-size="${fontSize}" font-family="system-ui, -apple-system, Segoe UI, sans-serif" fill="#ffffff" dominant-baseline="hanging">${label}</text>
</svg>
`.trim();
}

function applyOutputFormat(
  pipeline: sharp.Sharp,
  outputPath: string
): sharp.Sharp {
  const ext = path.extname(outputPath).toLowerCase();
  if (ext === '.jpg' || ext === '.jpeg') return pipeline.jpeg();
  if (ext === '.webp') return pipeline.webp();
  return pipeline.png();
}

export async function annotateKeypoints(options: {
  imagePath: string;
  keypoints: readonly Keypoint[];
  detectorName: string;
  outputPath: string;
}): Promise<void> {
  const base = sharp(options.imagePath);
  const metadata = await base.metadata();

  if (!metadata.width || !metadata.height) {
    throw new Error('Unable to read image dimensions.');
  }

  const svg = buildKeypointSvg(metadata.width, metadata.height, options.keypoints, options.detectorName);
  const pipeline = applyOutputFormat(
    base.composite([{ input: Buffer.from(svg), top: 0, left: 0 }]),
    options.outputPath
  );

  await pipeline.toFile(options.outputPath);
}
