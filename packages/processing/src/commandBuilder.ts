/**
 * FFmpeg Command Builder
 *
 * Fluent API for the single-pass, target-bitrate encode this tool runs,
 * plus a quoted rendering of the command for logs.
 *
 * Arguments are always handed to the encoder as a vector, never
 * through a shell; the rendering is for display only.
 */

import { replaceExtension } from '@vidshrink/utils';
import type { EncodeConfig, PlannedBitrate } from '@vidshrink/core';
import {
  AUDIO_CODEC,
  OUTPUT_SUFFIX,
  RESOLUTION_HEIGHTS,
  VIDEO_CODECS,
  presetName,
  type AudioCodec,
  type VideoCodec,
} from './presets.js';

export interface VideoCodecOptions {
  codec: VideoCodec;
  bitrate?: number; // bits per second
}

export interface AudioCodecOptions {
  codec: AudioCodec;
  bitrate?: number; // bits per second
}

export class FFmpegCommandBuilder {
  private inputs: string[] = [];
  private videoFilters: string[] = [];
  private videoCodec: VideoCodecOptions | null = null;
  private audioCodec: AudioCodecOptions | null = null;
  private preset: string | null = null;
  private overwriteOutput = true;
  private outputFile = '';

  /**
   * Add input file
   */
  addInput(file: string): this {
    this.inputs.push(file);
    return this;
  }

  /**
   * Add video filter
   */
  addVideoFilter(filter: string): this {
    this.videoFilters.push(filter);
    return this;
  }

  /**
   * Resample to a constant frame rate
   */
  setFrameRate(fps: number): this {
    return this.addVideoFilter(`fps=${fps}`);
  }

  /**
   * Scale to a height, keeping the aspect ratio
   */
  scaleToHeight(height: number): this {
    return this.addVideoFilter(`scale=-1:${height}`);
  }

  setVideoCodec(options: VideoCodecOptions): this {
    this.videoCodec = options;
    return this;
  }

  setAudioCodec(options: AudioCodecOptions): this {
    this.audioCodec = options;
    return this;
  }

  setPreset(preset: string): this {
    this.preset = preset;
    return this;
  }

  /**
   * `-y` when enabled (the default), `-n` otherwise
   */
  overwrite(enabled: boolean): this {
    this.overwriteOutput = enabled;
    return this;
  }

  setOutput(file: string): this {
    this.outputFile = file;
    return this;
  }

  /**
   * Build the command arguments array
   */
  build(): string[] {
    const args: string[] = [];

    for (const input of this.inputs) {
      args.push('-i', input);
    }

    if (this.videoFilters.length > 0) {
      args.push('-filter:v', this.videoFilters.join(','));
    }

    if (this.videoCodec) {
      args.push('-c:v', this.videoCodec.codec);
      if (this.videoCodec.bitrate !== undefined) args.push('-b:v', this.videoCodec.bitrate.toString());
    }

    if (this.audioCodec) {
      args.push('-c:a', this.audioCodec.codec);
      if (this.audioCodec.bitrate !== undefined) args.push('-b:a', this.audioCodec.bitrate.toString());
    }

    if (this.preset) {
      args.push('-preset', this.preset);
    }

    args.push(this.overwriteOutput ? '-y' : '-n');

    if (!this.outputFile) {
      throw new Error('Output file not specified');
    }
    args.push(this.outputFile);

    return args;
  }

  /**
   * Build command as string for logging
   */
  buildString(program: string = 'ffmpeg'): string {
    return renderCommand(program, this.build());
  }
}

/**
 * Quote an argument for display if it holds a space or a quote
 */
export function quoteArg(arg: string): string {
  if (/[ "']/.test(arg)) {
    return `"${arg.replace(/"/g, '\\"')}"`;
  }
  return arg;
}

export function renderCommand(program: string, args: readonly string[]): string {
  return [program, ...args].map(quoteArg).join(' ');
}

/**
 * Where the encode of `inputPath` is written
 */
export function compressedOutputPath(inputPath: string): string {
  return replaceExtension(inputPath, OUTPUT_SUFFIX);
}

/**
 * Encoder arguments for one job
 */
export function buildCompressionArgs(
  inputPath: string,
  outputPath: string,
  config: EncodeConfig,
  planned: PlannedBitrate
): string[] {
  const builder = new FFmpegCommandBuilder().addInput(inputPath);

  if (config.frameRate !== undefined) {
    builder.setFrameRate(config.frameRate);
  }
  if (config.resolution !== undefined) {
    builder.scaleToHeight(RESOLUTION_HEIGHTS[config.resolution]);
  }

  builder
    .setVideoCodec({ codec: VIDEO_CODECS[config.encoder], bitrate: planned.videoBitsPerSecond })
    .setAudioCodec({ codec: AUDIO_CODEC, bitrate: planned.audioBitsPerSecond });

  const preset = presetName(config.preset);
  if (preset) {
    builder.setPreset(preset);
  }

  return builder.overwrite(true).setOutput(outputPath).build();
}
