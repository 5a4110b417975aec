/**
 * Encoding Types
 */

export const ENCODERS = ['cpu', 'gpu'] as const;
export type Encoder = (typeof ENCODERS)[number];

export const RESOLUTIONS = ['1080p', '720p', '480p'] as const;
export type Resolution = (typeof RESOLUTIONS)[number];

// https://trac.ffmpeg.org/wiki/Encode/H.264#Preset
export const PRESETS = [
  'none',
  'ultrafast',
  'superfast',
  'veryfast',
  'faster',
  'fast',
  'medium',
  'slow',
  'slower',
  'veryslow',
] as const;
export type Preset = (typeof PRESETS)[number];

/**
 * Video/audio split that hits a target output size
 */
export interface PlannedBitrate {
  videoBitsPerSecond: number;
  audioBitsPerSecond: number;
}

/**
 * What the planner needs to know about a source file
 */
export interface SourceStats {
  durationSeconds: number;
  audioBitrateBps: number;
}
