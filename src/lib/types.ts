export type Keypoint = {
  x: number;
  y: number;
  size: number;
  response: number;
};

/** 8-bit single-channel image, row-major */
export type GrayImage = {
  width: number;
  height: number;
  data: Uint8Array;
};

export type Detection = {
  kind: 'detection';
  imagePath: string;
  detectorName: string;
  responses: readonly number[];
};

export type SummaryRecord = {
  path: string;
  detector: string;
  d_num: number;
  f_mean: number;
  r_min: number;
  r_max: number;
  r_mean: number;
  r_std: number;
};

export type LoadResult =
  | { ok: true; image: GrayImage }
  | { ok: false; error: unknown };

export interface ImageSource {
  load(imagePath: string): Promise<LoadResult>;
}

export type PathStyle = 'full' | 'name';

export type RunLogger = Pick<Console, 'log' | 'warn' | 'error'>;
