import path from 'path';
import { formatSummary, SCOPE_MARKER } from './statistics';
import { DetectorMismatchError } from './detection-utils';
import type { Detection, SummaryRecord } from './types';

/**
 * Accumulates every response sample for one (scope, detector) pair.
 *
 * Raw samples are kept rather than running moments so that statistics at any
 * level of the tree equal a recomputation over the full sample set.
 */
export class AggregateNode {
  readonly kind = 'aggregate';
  readonly scopePath: string;
  readonly detectorName: string;
  private _count = 0;
  private _samples: number[] = [];

  constructor(directory: string, detectorName: string) {
    this.scopePath = path.join(directory, SCOPE_MARKER);
    this.detectorName = detectorName;
  }

  /** Number of images that contributed, not number of merges */
  get count(): number {
    return this._count;
  }

  get samples(): readonly number[] {
    return this._samples;
  }

  merge(other: Detection | AggregateNode): this {
    if (other.detectorName !== this.detectorName) {
      throw new DetectorMismatchError(this.detectorName, other.detectorName);
    }

    const incoming = other.kind === 'detection' ? other.responses : other.samples;
    // Length is fixed first: a self-merge reads the array it appends to.
    // push(...x) overflows the call stack on large directories
    const n = incoming.length;
    for (let i = 0; i < n; i++) {
      this._samples.push(incoming[i]);
    }
    this._count += other.kind === 'detection' ? 1 : other.count;
    return this;
  }

  toSummary(): SummaryRecord {
    return formatSummary(this.scopePath, this.detectorName, this._samples, this._count);
  }
}

export function createDetection(
  imagePath: string,
  detectorName: string,
  responses: readonly number[]
): Detection {
  return { kind: 'detection', imagePath, detectorName, responses: [...responses] };
}

export function detectionSummary(detection: Detection, label: string = detection.imagePath): SummaryRecord {
  return formatSummary(label, detection.detectorName, detection.responses, 1);
}

/** Fold detections and aggregates of one detector into a fresh node */
export function mergeAll(
  directory: string,
  detectorName: string,
  items: Iterable<Detection | AggregateNode>
): AggregateNode {
  const node = new AggregateNode(directory, detectorName);
  for (const item of items) {
    node.merge(item);
  }
  return node;
}
