/**
 * @vidshrink/utils
 *
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Path utilities
 * - Formatting helpers
 * - Logger
 */

// Command execution
export {
  executeCommand,
  type CommandResult,
  type CommandOptions,
  type CommandRunner,
} from './command.js';

// File operations
export {
  ensureDir,
  safeWriteFile,
  safeReadFile,
  getFileSizeBytes,
  findFileSizeBytes,
  isErrnoException,
} from './file.js';

// Path utilities
export { replaceExtension, getFilename } from './path.js';

// Formatting
export { formatBytes, formatDuration, formatBitrate } from './format.js';

// Logger
export { logger, createLogger, createJobLogger, type Logger, type JobBindings } from './logger.js';
