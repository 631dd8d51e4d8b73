import fs from 'fs/promises';
import path from 'path';

import { AggregateNode, createDetection, detectionSummary } from './aggregate';
import { annotateKeypoints } from './annotator';
import {
  ConfigError,
  DetectorMismatchError,
  OutputWriteError,
  annotationFileName,
  hasImageExtension,
  isGeneratedFile,
  keypointsFileName,
  logErrorDetails,
  runWithConcurrency,
} from './detection-utils';
import type { FeatureDetector } from './detectors';
import { SharpImageSource } from './image-source';
import { STATS_FILE_NAME, StatsWriter, withStatsWriter, writeKeypointsCsv } from './stats-writer';
import type { Detection, ImageSource, PathStyle, RunLogger } from './types';

// ==========================================
// TYPES
// ==========================================

export type EntryKind = 'file' | 'directory' | 'other';

export type DirectoryEntry = {
  name: string;
  kind: EntryKind;
};

/** Lists a directory in the order entries should be visited */
export type DirectoryLister = (dir: string) => Promise<DirectoryEntry[]>;

export type PipelineConfig = {
  inputPath: string;
  detectors: FeatureDetector[];
  recurse: boolean;
  annotate?: boolean;
  dumpKeypoints?: boolean;
  /** Images decoded and detected at once within a directory (default: 1) */
  concurrency?: number;
  /** Lower-case, with leading dot (default: ['.jpg']) */
  imageExtensions?: string[];
  /** Mirror outputs under this directory instead of writing beside the images */
  outputRoot?: string | null;
  pathStyle?: PathStyle;
  verbose?: boolean;
  imageSource?: ImageSource;
  listDirectory?: DirectoryLister;
  logger?: RunLogger;
};

export type DirectoryAggregates = Map<string, AggregateNode>;

export type RunSummary = {
  totals: DirectoryAggregates;
  directories: number;
  images: number;
  failedImages: number;
};

type ImageResult = {
  imagePath: string;
  detections: Detection[];
} | null;

// ==========================================
// DIRECTORY LISTING
// ==========================================

export const listDirectory: DirectoryLister = async (dir) => {
  const dirents = await fs.readdir(dir, { withFileTypes: true });
  const entries: DirectoryEntry[] = [];
  for (const dirent of dirents) {
    let kind: EntryKind = 'other';
    if (dirent.isFile()) kind = 'file';
    else if (dirent.isDirectory()) kind = 'directory';
    else if (dirent.isSymbolicLink()) {
      const target = await fs.stat(path.join(dir, dirent.name)).catch(() => null);
      if (target?.isFile()) kind = 'file';
      else if (target?.isDirectory()) kind = 'directory';
    }
    entries.push({ name: dirent.name, kind });
  }
  return entries;
};

// ==========================================
// CLASS
// ==========================================

export class FeatureStatsPipeline {
  private readonly detectors: FeatureDetector[];
  private readonly detectorNames: string[];
  private readonly imageSource: ImageSource;
  private readonly listDirectory: DirectoryLister;
  private readonly logger: RunLogger;
  private readonly concurrency: number;
  private readonly imageExtensions: string[];
  private readonly pathStyle: PathStyle;
  private readonly outputRoot: string | null;
  private directories = 0;
  private images = 0;
  private failedImages = 0;

  constructor(private readonly config: PipelineConfig) {
    if (config.detectors.length === 0) {
      throw new ConfigError('At least one detector is required');
    }
    this.detectors = config.detectors;
    this.detectorNames = config.detectors.map((d) => d.name);
    if (new Set(this.detectorNames).size !== this.detectorNames.length) {
      throw new ConfigError(`Duplicate detector names: ${this.detectorNames.join(', ')}`);
    }
    this.imageSource = config.imageSource ?? new SharpImageSource();
    this.listDirectory = config.listDirectory ?? listDirectory;
    this.logger = config.logger ?? console;
    this.concurrency = Math.max(1, config.concurrency ?? 1);
    this.imageExtensions = config.imageExtensions ?? ['.jpg'];
    this.pathStyle = config.pathStyle ?? 'full';
    this.outputRoot = config.outputRoot ?? null;
  }

  async run(): Promise<RunSummary> {
    const stat = await fs.stat(this.config.inputPath).catch(() => null);
    if (!stat?.isDirectory()) {
      throw new ConfigError(`path must be a directory: ${this.config.inputPath}`);
    }

    this.directories = 0;
    this.images = 0;
    this.failedImages = 0;

    const totals = await this.processDirectory(this.config.inputPath);
    return {
      totals,
      directories: this.directories,
      images: this.images,
      failedImages: this.failedImages,
    };
  }

  /**
   * Write this directory's stats.csv and return its per-detector aggregates.
   *
   * Per-image rows are written as each image completes; subdirectories write
   * their own stats.csv and only hand back aggregates, which are merged here
   * and never re-emitted. The ** rows come last.
   */
  async processDirectory(dir: string): Promise<DirectoryAggregates> {
    const outputDir = await this.prepareOutputDir(dir);
    const statsPath = path.join(outputDir, STATS_FILE_NAME);
    this.directories++;
    this.debug(`📁 ${dir}`);

    return withStatsWriter(statsPath, async (writer) => {
      const aggregates: DirectoryAggregates = new Map(
        this.detectorNames.map((name) => [name, new AggregateNode(dir, name)])
      );

      const entries = await this.listDirectory(dir);
      let pendingImages: string[] = [];

      for (const entry of entries) {
        const entryPath = path.join(dir, entry.name);

        if (entry.kind === 'file') {
          if (!hasImageExtension(entry.name, this.imageExtensions)) continue;
          // Side outputs only land beside the images without an output root
          if (this.outputRoot === null && isGeneratedFile(entry.name, this.detectorNames)) {
            this.logger.log(`⏭️ Skipping generated file: ${entryPath}`);
            continue;
          }
          pendingImages.push(entryPath);
        } else if (entry.kind === 'directory' && this.config.recurse) {
          if (this.isOutputRoot(entryPath)) continue;

          // Images listed before this subdirectory are finished first
          await this.processImages(pendingImages, outputDir, writer, aggregates);
          pendingImages = [];

          const childAggregates = await this.processDirectory(entryPath);
          for (const [name, child] of childAggregates) {
            scopeNode(aggregates, name).merge(child);
          }
        }
      }

      await this.processImages(pendingImages, outputDir, writer, aggregates);

      for (const node of aggregates.values()) {
        await writer.write(node.toSummary());
      }

      // Cascade everything upward
      return aggregates;
    });
  }

  // ==========================================
  // IMAGES
  // ==========================================

  /**
   * Analyze a run of consecutive images, up to `concurrency` at a time.
   * Rows are flushed and merged strictly in listing order.
   */
  private async processImages(
    imagePaths: string[],
    outputDir: string,
    writer: StatsWriter,
    aggregates: DirectoryAggregates
  ): Promise<void> {
    if (imagePaths.length === 0) return;

    const ready = new Map<number, ImageResult>();
    let nextIndex = 0;
    let flushing: Promise<void> = Promise.resolve();
    let failed = false;

    const flush = async () => {
      for (let result = ready.get(nextIndex); result !== undefined; result = ready.get(nextIndex)) {
        ready.delete(nextIndex);
        nextIndex++;
        if (result) await this.emitImage(result, writer, aggregates);
      }
    };

    await runWithConcurrency(imagePaths, this.concurrency, async (imagePath, index) => {
      try {
        ready.set(index, await this.analyzeImage(imagePath, outputDir, () => failed));
        flushing = flushing.then(flush);
        await flushing;
      } catch (error) {
        failed = true;
        throw error;
      }
    });
  }

  /** Returns null for an image that failed to load, or once `stopped()` reports a failed sibling */
  private async analyzeImage(
    imagePath: string,
    outputDir: string,
    stopped: () => boolean
  ): Promise<ImageResult> {
    this.logger.log(`Open ${imagePath}`);
    const loaded = await this.imageSource.load(imagePath);
    if (stopped()) return null;
    if (!loaded.ok) {
      this.failedImages++;
      logErrorDetails(`⚠️ Failed to load image: ${imagePath} | `, loaded.error, this.logger);
      return null;
    }

    const detections: Detection[] = [];
    for (const detector of this.detectors) {
      if (stopped()) return null;
      const started = Date.now();
      const keypoints = detector.detect(loaded.image);
      this.debug(`   ${detector.name}: ${keypoints.length} keypoints in ${Date.now() - started}ms`);

      detections.push(
        createDetection(imagePath, detector.name, keypoints.map((kp) => kp.response))
      );

      if (this.config.dumpKeypoints) {
        const target = path.join(outputDir, keypointsFileName(imagePath, detector.name));
        await writeKeypointsCsv(target, keypoints).catch((error: unknown) =>
          logErrorDetails(`⚠️ Failed to write ${target} | `, error, this.logger)
        );
      }
      if (this.config.annotate) {
        const target = path.join(outputDir, annotationFileName(imagePath, detector.name));
        await annotateKeypoints({ imagePath, keypoints, detectorName: detector.name, outputPath: target }).catch(
          (error: unknown) => logErrorDetails(`⚠️ Failed to annotate ${target} | `, error, this.logger)
        );
      }
    }

    this.images++;
    return { imagePath, detections };
  }

  private async emitImage(
    result: NonNullable<ImageResult>,
    writer: StatsWriter,
    aggregates: DirectoryAggregates
  ): Promise<void> {
    const label = this.pathStyle === 'name' ? path.basename(result.imagePath) : result.imagePath;
    for (const detection of result.detections) {
      await writer.write(detectionSummary(detection, label));
      scopeNode(aggregates, detection.detectorName).merge(detection);
    }
  }

  // ==========================================
  // OUTPUT LOCATION
  // ==========================================

  private async prepareOutputDir(dir: string): Promise<string> {
    if (this.outputRoot === null) return dir;

    const outputDir = path.join(this.outputRoot, path.relative(this.config.inputPath, dir));
    try {
      await fs.mkdir(outputDir, { recursive: true });
    } catch (error) {
      throw new OutputWriteError(outputDir, { cause: error });
    }
    return outputDir;
  }

  private isOutputRoot(dir: string): boolean {
    return this.outputRoot !== null && path.resolve(dir) === path.resolve(this.outputRoot);
  }

  private debug(message: string) {
    if (this.config.verbose) {
      this.logger.log(message);
    }
  }
}

// ==========================================
// HELPERS
// ==========================================

function scopeNode(aggregates: DirectoryAggregates, detectorName: string): AggregateNode {
  const node = aggregates.get(detectorName);
  if (!node) {
    throw new DetectorMismatchError([...aggregates.keys()].join('|'), detectorName);
  }
  return node;
}
