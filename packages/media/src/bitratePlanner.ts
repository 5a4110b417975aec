/**
 * Bitrate Planner
 *
 * Splits a target output size into video and audio bit rates for a
 * source of known duration.
 */

import { InvalidDurationError, type PlannedBitrate } from '@vidshrink/core';

// Decimal megabytes
export const BYTES_PER_MEGABYTE = 1_000_000;

// Legacy GiB/GB normalization; output sizes are labelled against it
export const SIZE_CORRECTION_FACTOR = 1.073741824;

export const MIN_AUDIO_BITRATE = 64_000;
export const MAX_AUDIO_BITRATE = 256_000;

// Audio may take at most 1/10 of the total budget before it is re-planned
const AUDIO_SHARE_DIVISOR = 10;

/**
 * Total bits per second that fit `targetSizeMb` into `durationSeconds`
 */
export function targetTotalBitrate(targetSizeMb: number, durationSeconds: number): number {
  if (!Number.isFinite(durationSeconds) || durationSeconds <= 0) {
    throw new InvalidDurationError(durationSeconds);
  }
  return (targetSizeMb * BYTES_PER_MEGABYTE * 8) / (SIZE_CORRECTION_FACTOR * durationSeconds);
}

/**
 * Plan the video/audio split.
 *
 * The source audio rate is kept when it fits in a tenth of the budget;
 * otherwise audio gets a tenth, clamped to [64 kb/s, 256 kb/s]. Video takes
 * the rest and bottoms out at 0 when the target cannot be reached.
 */
export function planBitrate(
  targetSizeMb: number,
  durationSeconds: number,
  sourceAudioBps: number
): PlannedBitrate {
  const total = targetTotalBitrate(targetSizeMb, durationSeconds);

  let audio = sourceAudioBps;
  if (AUDIO_SHARE_DIVISOR * sourceAudioBps > total) {
    audio = Math.trunc(total / AUDIO_SHARE_DIVISOR);
    audio = Math.min(MAX_AUDIO_BITRATE, Math.max(MIN_AUDIO_BITRATE, audio));
  }

  return {
    videoBitsPerSecond: Math.max(0, Math.trunc(total) - audio),
    audioBitsPerSecond: audio,
  };
}
