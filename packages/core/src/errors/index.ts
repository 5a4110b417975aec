/**
 * Custom Error Classes
 */

import type { JobState } from '../stateMachine.js';

/**
 * Base error class for all vidshrink errors
 */
export class CompressorError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CompressorError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid inputs
 */
export class ValidationError extends CompressorError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * Not found error for missing resources
 */
export class NotFoundError extends CompressorError {
  constructor(resource: string, identifier: string) {
    super(
      `${resource} not found: ${identifier}`,
      'NOT_FOUND',
      { resource, identifier }
    );
    this.name = 'NotFoundError';
  }
}

/**
 * State transition error for invalid state changes
 */
export class StateTransitionError extends CompressorError {
  constructor(
    jobId: string,
    fromState: JobState,
    toState: JobState,
    message?: string
  ) {
    super(
      message ?? `Invalid state transition from ${fromState} to ${toState}`,
      'STATE_TRANSITION_ERROR',
      { jobId, fromState, toState }
    );
    this.name = 'StateTransitionError';
  }
}

/**
 * The probe executable could not be started
 */
export class ProbeUnavailableError extends CompressorError {
  constructor(command: string, cause: string) {
    super(
      `Could not start ${command}: ${cause}`,
      'PROBE_UNAVAILABLE',
      { command, cause }
    );
    this.name = 'ProbeUnavailableError';
  }
}

/**
 * The probe ran but exited non-zero
 */
export class ProbeFailedError extends CompressorError {
  constructor(filePath: string, exitCode: number, stderr: string) {
    super(
      `Probe of ${filePath} failed with exit code ${exitCode}: ${stderr.trim() || 'no output'}`,
      'PROBE_FAILED',
      { filePath, exitCode, stderr: stderr.substring(0, 1000) }
    );
    this.name = 'ProbeFailedError';
  }
}

/**
 * The probe output did not carry the expected numeric fields
 */
export class ProbeParseError extends CompressorError {
  constructor(filePath: string, field: 'bit_rate' | 'duration', stdout: string) {
    super(
      `Could not read ${field} of ${filePath} from probe output`,
      'PROBE_PARSE_ERROR',
      { filePath, field, stdout: stdout.substring(0, 200) }
    );
    this.name = 'ProbeParseError';
  }
}

export class InvalidDurationError extends CompressorError {
  constructor(durationSeconds: number) {
    super(
      `Duration must be positive, got ${durationSeconds}`,
      'INVALID_DURATION',
      { durationSeconds }
    );
    this.name = 'InvalidDurationError';
  }
}

/**
 * The encoder executable could not be started
 */
export class SpawnFailedError extends CompressorError {
  constructor(command: string, cause: string) {
    super(
      `Could not start ${command}: ${cause}`,
      'SPAWN_FAILED',
      { command, cause }
    );
    this.name = 'SpawnFailedError';
  }
}

export class OutputSizeUnavailableError extends CompressorError {
  constructor(outputPath: string) {
    super(
      `Output file was not produced: ${outputPath}`,
      'OUTPUT_SIZE_UNAVAILABLE',
      { outputPath }
    );
    this.name = 'OutputSizeUnavailableError';
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
