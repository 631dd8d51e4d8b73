import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { FeatureDetector } from '../src/lib/detectors';
import { listDirectory, type DirectoryLister } from '../src/lib/traversal';
import type { GrayImage, ImageSource, Keypoint, LoadResult, RunLogger } from '../src/lib/types';

/**
 * Fixture images are JSON files: { "X": [responses...], "delay": ms }.
 * A file containing "corrupt" fails to decode.
 */
export type FakeImage = Record<string, number[] | number>;

export async function makeTempDir(prefix = 'feature-stats-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writeTree(root: string, files: Record<string, FakeImage | string>): Promise<void> {
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(root, relative);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, typeof content === 'string' ? content : JSON.stringify(content));
  }
}

export async function readLines(file: string): Promise<string[]> {
  const text = await fs.readFile(file, 'utf-8');
  return text.split('\n').filter((line) => line.length > 0);
}

function sleep(ms: number) {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function field(json: unknown, key: string): unknown {
  return typeof json === 'object' && json !== null ? Reflect.get(json, key) : undefined;
}

export class FakeImageSource implements ImageSource {
  readonly loaded: string[] = [];

  async load(imagePath: string): Promise<LoadResult> {
    const text = await fs.readFile(imagePath, 'utf-8');
    if (text === 'corrupt') {
      return { ok: false, error: new Error('corrupt') };
    }
    const delay = field(JSON.parse(text), 'delay');
    if (typeof delay === 'number') {
      await sleep(delay);
    }
    this.loaded.push(imagePath);
    const data = new Uint8Array(Buffer.from(text));
    return { ok: true, image: { width: data.length, height: 1, data } };
  }
}

/** Reads its responses back out of the JSON the fake image source carried */
export function fakeDetector(name: string): FeatureDetector & { calls: number } {
  return {
    name,
    calls: 0,
    detect(image: GrayImage): Keypoint[] {
      this.calls++;
      const responses = field(JSON.parse(Buffer.from(image.data).toString('utf-8')), name);
      if (!Array.isArray(responses)) return [];
      return responses
        .filter((r): r is number => typeof r === 'number')
        .map((response, i) => ({ x: i, y: 0, size: 1, response }));
    },
  };
}

/** Pins a stable visiting order: names sorted by code point */
export const sortedLister: DirectoryLister = async (dir) => {
  const entries = await listDirectory(dir);
  return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
};

export function silentLogger(): RunLogger & { messages: string[]; warnings: string[] } {
  const messages: string[] = [];
  const warnings: string[] = [];
  return {
    messages,
    warnings,
    log: (...args: unknown[]) => {
      messages.push(args.join(' '));
    },
    warn: (...args: unknown[]) => {
      warnings.push(args.join(' '));
    },
    error: (...args: unknown[]) => {
      warnings.push(args.join(' '));
    },
  };
}
