/**
 * Shared utilities for feature statistics runs
 */
import path from 'path';

// ==========================================
// NUMERIC HELPERS
// ==========================================

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

// ==========================================
// ERRORS
// ==========================================

/** Merge across different detector identities; a composition bug, never a data problem */
export class DetectorMismatchError extends Error {
  constructor(
    readonly expected: string,
    readonly actual: string
  ) {
    super(`Detector mismatch: cannot merge ${actual} into ${expected}`);
    this.name = 'DetectorMismatchError';
  }
}

/** A directory's stats.csv could not be created or written */
export class OutputWriteError extends Error {
  constructor(
    readonly outputPath: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to write ${outputPath}`, options);
    this.name = 'OutputWriteError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ==========================================
// ERROR HANDLING
// ==========================================

// Read on each call: scripts load .env after this module is imported
function debugErrorsEnabled(): boolean {
  const value = process.env.DEBUG_ERRORS;
  return value === '1' || value === 'true' || value === 'yes';
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

export function formatError(error: unknown): string {
  if (error instanceof Error) {
    const parts: string[] = [];
    parts.push(`${error.name || 'Error'}: ${error.message || String(error)}`);
    const code: unknown = Reflect.get(error, 'code');
    if (typeof code === 'string' || typeof code === 'number') parts.push(`code=${code}`);
    if (error.cause !== undefined) {
      parts.push(`cause=${formatError(error.cause)}`);
    }
    return parts.join(' | ');
  }
  return safeStringify(error);
}

export function logErrorDetails(
  prefix: string,
  error: unknown,
  logger: Pick<Console, 'warn'> = console
): void {
  logger.warn(prefix + formatError(error));
  if (debugErrorsEnabled() && error instanceof Error && error.stack) {
    logger.warn(error.stack);
  }
}

// ==========================================
// FILE/PATH HELPERS
// ==========================================

/** Given foo/fee.jpg and SIFT, return foo/fee__SIFT.jpg */
export function annotationFileName(imagePath: string, detectorName: string, ext = 'jpg'): string {
  const stem = path.parse(imagePath).name;
  return `${stem}__${detectorName}.${ext}`;
}

export function keypointsFileName(imagePath: string, detectorName: string): string {
  const stem = path.parse(imagePath).name;
  return `${stem}__${detectorName}_keypoints.csv`;
}

/** True for files this tool wrote on an earlier run (annotations, keypoint dumps) */
export function isGeneratedFile(fileName: string, detectorNames: readonly string[]): boolean {
  const stem = path.parse(fileName).name;
  return detectorNames.some(
    (name) => stem.endsWith(`__${name}`) || stem.endsWith(`__${name}_keypoints`)
  );
}

export function hasImageExtension(fileName: string, extensions: readonly string[]): boolean {
  const ext = path.extname(fileName).toLowerCase();
  return extensions.some((e) => e.toLowerCase() === ext);
}

// ==========================================
// CONCURRENCY HELPERS
// ==========================================

export async function runWithConcurrency<T, R>(
  items: T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  const errors: unknown[] = [];
  let nextIndex = 0;

  // After the first failure no worker takes another item
  async function worker() {
    while (errors.length === 0) {
      const i = nextIndex;
      nextIndex += 1;
      if (i >= items.length) return;
      try {
        results[i] = await fn(items[i], i);
      } catch (error) {
        errors.push(error);
      }
    }
  }

  const workers = Array.from({ length: Math.min(concurrency, items.length) }, () =>
    worker()
  );
  // Settle every in-flight item before reporting the first failure
  await Promise.all(workers);
  if (errors.length > 0) {
    throw errors[0];
  }
  return results;
}

// ==========================================
// XML/SVG HELPERS
// ==========================================

export function escapeXml(text: string): string {
  return String(text)
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}
