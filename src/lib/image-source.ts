import sharp from 'sharp';
import type { GrayImage, ImageSource, LoadResult } from './types';

export async function loadGrayImage(imagePath: string): Promise<GrayImage> {
  const { data, info } = await sharp(imagePath)
    .removeAlpha()
    .grayscale()
    .raw()
    .toBuffer({ resolveWithObject: true });

  if (!info.width || !info.height) {
    throw new Error('Unable to read image dimensions.');
  }

  // grayscale() on a CMYK or 16-bit input can still yield more than one channel
  if (info.channels === 1) {
    return { width: info.width, height: info.height, data: new Uint8Array(data) };
  }
  const gray = new Uint8Array(info.width * info.height);
  for (let i = 0; i < gray.length; i++) {
    gray[i] = data[i * info.channels];
  }
  return { width: info.width, height: info.height, data: gray };
}

/** Decodes files with sharp; undecodable or missing files come back as failures */
export class SharpImageSource implements ImageSource {
  async load(imagePath: string): Promise<LoadResult> {
    try {
      return { ok: true, image: await loadGrayImage(imagePath) };
    } catch (error) {
      return { ok: false, error };
    }
  }
}
