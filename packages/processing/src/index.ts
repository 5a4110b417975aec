/**
 * @vidshrink/processing
 *
 * Encoding layer: builds the ffmpeg command, runs one job at a time
 * and advances the queue as jobs finish.
 *
 * Rules:
 * - One encoder process at a time
 * - Arguments are passed as a vector, never through a shell
 * - Every ffmpeg command is logged before it runs
 */

// Command Builder
export {
  FFmpegCommandBuilder,
  buildCompressionArgs,
  compressedOutputPath,
  renderCommand,
  quoteArg,
  type VideoCodecOptions,
  type AudioCodecOptions,
} from './commandBuilder.js';

// Encoder tables
export {
  VIDEO_CODECS,
  AUDIO_CODEC,
  OUTPUT_CONTAINER,
  OUTPUT_SUFFIX,
  RESOLUTION_HEIGHTS,
  presetName,
  type VideoCodec,
  type AudioCodec,
} from './presets.js';

// Job Runner
export {
  JobRunner,
  JobHandle,
  spawnEncoder,
  type EncoderProcess,
  type ProcessLauncher,
  type SourceProbe,
  type JobRequest,
  type JobRunnerOptions,
  type SignalListener,
} from './jobRunner.js';

// Supervisor
export {
  CompressionSupervisor,
  type CompressionRunner,
  type CompressionSupervisorOptions,
} from './supervisor.js';
