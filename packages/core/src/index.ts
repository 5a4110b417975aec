/**
 * @vidshrink/core
 *
 * Core package containing:
 * - Job state machine
 * - Queue supervisor and log sink
 * - Encode settings
 * - Error handling
 * - Shared types
 */

// State machine
export {
  JOB_STATES,
  JobStateMachine,
  isValidTransition,
  type JobState,
  type JobResultKind,
  type JobStateTransition,
} from './stateMachine.js';

// Queue
export { QueueSupervisor } from './queue.js';

// Log sink
export { LogSink, type LogSinkOptions } from './logSink.js';

// Settings
export {
  encodeConfigSchema,
  DEFAULT_ENCODE_CONFIG,
  ENCODE_CONFIG_KEYS,
  isEncodeConfigKey,
  parseEncodeConfig,
  loadEncodeConfig,
  saveEncodeConfig,
  setEncodeConfigValue,
  type EncodeConfig,
  type EncodeConfigKey,
} from './config/encodeConfig.js';

// Types
export {
  ENCODERS,
  RESOLUTIONS,
  PRESETS,
  type Encoder,
  type Resolution,
  type Preset,
  type PlannedBitrate,
  type SourceStats,
} from './types/encoding.js';

export type {
  FileStatus,
  QueueItem,
  JobSignal,
  JobOutcome,
} from './types/job.js';

// Errors
export {
  CompressorError,
  ValidationError,
  NotFoundError,
  StateTransitionError,
  ProbeUnavailableError,
  ProbeFailedError,
  ProbeParseError,
  InvalidDurationError,
  SpawnFailedError,
  OutputSizeUnavailableError,
  errorMessage,
} from './errors/index.js';
