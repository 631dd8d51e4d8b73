import fs from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import { CSV_HEADER, toCsvRow } from './statistics';
import { OutputWriteError } from './detection-utils';
import type { Keypoint, SummaryRecord } from './types';

export const STATS_FILE_NAME = 'stats.csv';

/**
 * One directory's stats.csv. Every row is handed to the OS before write()
 * resolves, so rows already written survive a later failure.
 */
export class StatsWriter {
  private constructor(
    readonly outputPath: string,
    private handle: FileHandle
  ) {}

  static async open(outputPath: string): Promise<StatsWriter> {
    let handle: FileHandle;
    try {
      handle = await fs.open(outputPath, 'w');
    } catch (error) {
      throw new OutputWriteError(outputPath, { cause: error });
    }
    const writer = new StatsWriter(outputPath, handle);
    try {
      await writer.writeLine(CSV_HEADER);
    } catch (error) {
      await writer.close().catch(() => undefined);
      throw error;
    }
    return writer;
  }

  async write(record: SummaryRecord): Promise<void> {
    await this.writeLine(toCsvRow(record));
  }

  async close(): Promise<void> {
    try {
      await this.handle.close();
    } catch (error) {
      throw new OutputWriteError(this.outputPath, { cause: error });
    }
  }

  private async writeLine(line: string): Promise<void> {
    try {
      await this.handle.write(`${line}\n`);
    } catch (error) {
      throw new OutputWriteError(this.outputPath, { cause: error });
    }
  }
}

/** Open, run, and always close; a close failure never masks the body's error */
export async function withStatsWriter<T>(
  outputPath: string,
  body: (writer: StatsWriter) => Promise<T>
): Promise<T> {
  const writer = await StatsWriter.open(outputPath);
  let result: T;
  try {
    result = await body(writer);
  } catch (error) {
    await writer.close().catch(() => undefined);
    throw error;
  }
  await writer.close();
  return result;
}

export async function writeKeypointsCsv(
  outputPath: string,
  keypoints: readonly Keypoint[]
): Promise<void> {
  const lines = ['x,y,size,response'];
  for (const kp of keypoints) {
    lines.push(`${kp.x},${kp.y},${kp.size},${kp.response}`);
  }
  await fs.writeFile(outputPath, lines.join('\n') + '\n');
}
