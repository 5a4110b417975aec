/**
 * FFProbe Wrapper
 *
 * Reads the two facts the bitrate planner needs from a source file:
 * the first audio stream's bit rate and the container duration.
 */

import { executeCommand, type CommandResult, type CommandRunner } from '@vidshrink/utils';
import {
  ProbeFailedError,
  ProbeParseError,
  ProbeUnavailableError,
  errorMessage,
  type SourceStats,
} from '@vidshrink/core';

// Prints `<bit_rate>\n<duration>\n`, stream section before format section
export const SOURCE_STATS_ARGS = [
  '-v', 'error',
  '-select_streams', 'a:0',
  '-show_entries', 'format=duration:stream=bit_rate',
  '-of', 'default=noprint_wrappers=1:nokey=1',
] as const;

const INTEGER = /^\d+$/;

export interface MediaProbeOptions {
  ffprobePath?: string;
  timeout?: number;
  run?: CommandRunner;
}

export class MediaProbe {
  private readonly ffprobePath: string;
  private readonly timeout: number;
  private readonly run: CommandRunner;

  constructor(options: MediaProbeOptions = {}) {
    this.ffprobePath = options.ffprobePath ?? 'ffprobe';
    this.timeout = options.timeout ?? 60000; // 1 minute
    this.run = options.run ?? executeCommand;
  }

  /**
   * Probe duration and audio bit rate of a media file
   */
  async probe(filePath: string): Promise<SourceStats> {
    let result: CommandResult;
    try {
      result = await this.run(this.ffprobePath, [...SOURCE_STATS_ARGS, filePath], {
        timeout: this.timeout,
      });
    } catch (error) {
      throw new ProbeUnavailableError(this.ffprobePath, errorMessage(error));
    }

    if (result.exitCode !== 0) {
      throw new ProbeFailedError(filePath, result.exitCode, result.stderr);
    }

    return parseSourceStats(filePath, result.stdout);
  }

  /**
   * Check if ffprobe is available
   */
  async isAvailable(): Promise<boolean> {
    try {
      const result = await this.run(this.ffprobePath, ['-version'], { timeout: 5000 });
      return result.exitCode === 0;
    } catch {
      return false;
    }
  }
}

/**
 * Parse `<bit_rate>\n<duration>` probe output
 */
export function parseSourceStats(filePath: string, stdout: string): SourceStats {
  const [bitrateLine, durationLine] = stdout.split(/\r?\n/).map((line) => line.trim());

  if (bitrateLine === undefined || !INTEGER.test(bitrateLine)) {
    throw new ProbeParseError(filePath, 'bit_rate', stdout);
  }

  const durationSeconds = durationLine ? Number(durationLine) : NaN;
  if (!Number.isFinite(durationSeconds)) {
    throw new ProbeParseError(filePath, 'duration', stdout);
  }

  return {
    durationSeconds,
    audioBitrateBps: Number(bitrateLine),
  };
}
