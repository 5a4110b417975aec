/**
 * Encoder Tables
 *
 * Fixed mapping from the user-facing settings to ffmpeg identifiers.
 * Nothing here is negotiated with the encoder at run time.
 */

import type { Encoder, Preset, Resolution } from '@vidshrink/core';

export type VideoCodec = 'libx264' | 'h264_nvenc';

export type AudioCodec = 'aac';

export const VIDEO_CODECS: Record<Encoder, VideoCodec> = {
  cpu: 'libx264',
  gpu: 'h264_nvenc',
};

export const AUDIO_CODEC: AudioCodec = 'aac';

export const OUTPUT_CONTAINER = 'mp4';

// Replaces the source extension: clip.mov → clip.compressed.mp4
export const OUTPUT_SUFFIX = `compressed.${OUTPUT_CONTAINER}`;

export const RESOLUTION_HEIGHTS: Record<Resolution, number> = {
  '1080p': 1080,
  '720p': 720,
  '480p': 480,
};

/**
 * ffmpeg `-preset` value, or undefined for "none"
 */
export function presetName(preset: Preset): string | undefined {
  return preset === 'none' ? undefined : preset;
}
