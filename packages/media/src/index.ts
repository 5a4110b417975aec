/**
 * @vidshrink/media
 *
 * Source analysis: probing media files and planning bit rates.
 */

// Probing
export {
  MediaProbe,
  parseSourceStats,
  SOURCE_STATS_ARGS,
  type MediaProbeOptions,
} from './probes/ffprobe.js';

// Bitrate planning
export {
  planBitrate,
  targetTotalBitrate,
  BYTES_PER_MEGABYTE,
  SIZE_CORRECTION_FACTOR,
  MIN_AUDIO_BITRATE,
  MAX_AUDIO_BITRATE,
} from './bitratePlanner.js';
