/**
 * Job Types
 */

export type FileStatus = 'WAITING' | 'PROCESSING' | 'DONE';

export interface QueueItem {
  id: string;
  path: string;
  status: FileStatus;
  inputSizeBytes: number;
  outputSizeBytes?: number;
  enqueuedAt: Date;
  startedAt?: Date;
  finishedAt?: Date;
  // Set when the job ended without a usable encode
  error?: string;
}

/**
 * Messages from a running job, in emission order. `done` is always last.
 */
export type JobSignal =
  | { type: 'line'; text: string }
  | { type: 'outputSize'; bytes: number }
  | { type: 'done' };

export interface JobOutcome {
  path: string;
  outputPath: string;
  result: 'success' | 'failure';
  outputSizeBytes?: number;
  exitCode?: number | null;
  error?: string;
  command?: string;
  durationMs: number;
}
