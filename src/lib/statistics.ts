import type { SummaryRecord } from './types';

/**
 * Columns:
 *   path      File path, a trailing ** marks a directory aggregate
 *   detector  Name of the detector
 *   d_num     Number of detections (images processed)
 *   f_mean    Mean number of features per detection
 *   r_min     Minimum response value
 *   r_max     Maximum response value
 *   r_mean    Mean response value
 *   r_std     Population standard deviation of response values
 */
export const CSV_HEADER = 'path,detector,d_num,f_mean,r_min,r_max,r_mean,r_std';

export const SCOPE_MARKER = '**';

export function formatSummary(
  scope: string,
  detector: string,
  samples: readonly number[],
  count: number
): SummaryRecord {
  if (samples.length === 0 || count === 0) {
    return { path: scope, detector, d_num: count, f_mean: 0, r_min: 0, r_max: 0, r_mean: 0, r_std: 0 };
  }

  let min = samples[0];
  let max = samples[0];
  let sum = 0;
  for (const s of samples) {
    if (s < min) min = s;
    if (s > max) max = s;
    sum += s;
  }
  const mean = sum / samples.length;

  let sumSq = 0;
  for (const s of samples) {
    const diff = s - mean;
    sumSq += diff * diff;
  }

  return {
    path: scope,
    detector,
    d_num: count,
    f_mean: samples.length / count,
    r_min: min,
    r_max: max,
    r_mean: mean,
    r_std: Math.sqrt(sumSq / samples.length),
  };
}

// Paths containing separators or quotes are quoted, everything else is written as-is
function csvField(value: string): string {
  if (/[",\n\r]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function toCsvRow(record: SummaryRecord): string {
  return [
    csvField(record.path),
    csvField(record.detector),
    record.d_num,
    record.f_mean,
    record.r_min,
    record.r_max,
    record.r_mean,
    record.r_std,
  ].join(',');
}
