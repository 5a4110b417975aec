/**
 * Job Runner
 *
 * Runs one compression job end to end: probe the source, plan the
 * bitrate split, spawn ffmpeg, relay its stderr line by line, wait for
 * exit, then measure the output file.
 *
 * Signals reach the caller in emission order and `done` is always last.
 * A job is complete only after the process has been waited on, the
 * relay has drained and the output size has been read.
 */

import { spawn } from 'node:child_process';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import { createJobLogger, createLogger, findFileSizeBytes, type Logger } from '@vidshrink/utils';
import {
  JobStateMachine,
  OutputSizeUnavailableError,
  SpawnFailedError,
  errorMessage,
  type EncodeConfig,
  type JobOutcome,
  type JobSignal,
  type JobState,
  type JobStateTransition,
  type PlannedBitrate,
  type SourceStats,
} from '@vidshrink/core';
import { planBitrate } from '@vidshrink/media';
import { buildCompressionArgs, compressedOutputPath, renderCommand } from './commandBuilder.js';

const log = createLogger({ component: 'job-runner' });

/**
 * The part of a child process the runner relies on
 */
export interface EncoderProcess {
  readonly stderr: Readable | null;
  once(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
  kill(signal?: NodeJS.Signals): boolean;
}

export type ProcessLauncher = (command: string, args: string[]) => EncoderProcess;

export interface SourceProbe {
  probe(filePath: string): Promise<SourceStats>;
}

export interface JobRequest {
  id: string;
  path: string;
  // Snapshot taken when the job starts
  config: EncodeConfig;
}

export type SignalListener = (signal: JobSignal) => void;

export interface JobRunnerOptions {
  probe: SourceProbe;
  ffmpegPath?: string;
  launch?: ProcessLauncher;
}

/**
 * Spawn ffmpeg with only stderr piped
 */
export const spawnEncoder: ProcessLauncher = (command, args) =>
  spawn(command, args, { stdio: ['ignore', 'ignore', 'pipe'] });

/**
 * A started job. Await `done` for its outcome.
 */
export class JobHandle {
  readonly id: string;
  readonly path: string;
  readonly outputPath: string;
  readonly done: Promise<JobOutcome>;
  private readonly machine: JobStateMachine;
  private readonly controller: AbortController;

  constructor(
    request: JobRequest,
    outputPath: string,
    machine: JobStateMachine,
    controller: AbortController,
    done: Promise<JobOutcome>
  ) {
    this.id = request.id;
    this.path = request.path;
    this.outputPath = outputPath;
    this.machine = machine;
    this.controller = controller;
    this.done = done;
  }

  get state(): JobState {
    return this.machine.getState();
  }

  get history(): ReadonlyArray<JobStateTransition> {
    return this.machine.getHistory();
  }

  /**
   * Stop the job. A running encoder gets SIGTERM; a job still probing
   * never starts one. The outcome is a failure with error "Cancelled".
   * Once the encoder has exited, cancelling has no effect.
   */
  cancel(): void {
    this.controller.abort();
  }
}

interface EncoderExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  // Aborted while the encoder was still running
  cancelled: boolean;
}

interface JobContext {
  request: JobRequest;
  outputPath: string;
  machine: JobStateMachine;
  signal: AbortSignal;
  emit: SignalListener;
  startTime: number;
  log: Logger;
}

export class JobRunner {
  private readonly probe: SourceProbe;
  private readonly ffmpegPath: string;
  private readonly launch: ProcessLauncher;

  constructor(options: JobRunnerOptions) {
    this.probe = options.probe;
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.launch = options.launch ?? spawnEncoder;
  }

  /**
   * Start a job. `onSignal` receives every signal of this job, starting
   * after this call returns.
   */
  run(request: JobRequest, onSignal: SignalListener): JobHandle {
    const machine = new JobStateMachine(request.id);
    const controller = new AbortController();
    const outputPath = compressedOutputPath(request.path);

    const jobLog = createJobLogger(log, request);
    machine.transitionTo('PROBING');
    jobLog.info('Starting compression job');

    const done = this.execute({
      request,
      outputPath,
      machine,
      signal: controller.signal,
      emit: onSignal,
      startTime: Date.now(),
      log: jobLog,
    });

    return new JobHandle(request, outputPath, machine, controller, done);
  }

  private async execute(ctx: JobContext): Promise<JobOutcome> {
    const { request, emit } = ctx;

    let planned: PlannedBitrate;
    try {
      const stats = await this.probe.probe(request.path);
      planned = planBitrate(request.config.targetSizeMb, stats.durationSeconds, stats.audioBitrateBps);
    } catch (error) {
      const reason = errorMessage(error);
      ctx.log.warn({ error: reason }, 'Bitrate planning failed');
      emit({ type: 'line', text: `Failed to calculate bitrate: ${reason}` });
      return this.finish(ctx, { error: reason });
    }

    if (ctx.signal.aborted) {
      return this.finish(ctx, { error: 'Cancelled' });
    }

    const args = buildCompressionArgs(request.path, ctx.outputPath, request.config, planned);
    const command = renderCommand(this.ffmpegPath, args);

    ctx.machine.transitionTo('RUNNING');
    ctx.log.debug({ command, ...planned }, 'FFmpeg command');
    emit({ type: 'line', text: `$ ${command}` });

    let exit: EncoderExit;
    try {
      exit = await this.spawnAndRelay(args, ctx);
    } catch (error) {
      const failure = new SpawnFailedError(this.ffmpegPath, errorMessage(error));
      ctx.log.error({ err: failure }, 'Encoder could not be started');
      emit({ type: 'line', text: failure.message });
      this.finish(ctx, { error: failure.message, command });
      throw failure;
    }

    ctx.machine.transitionTo('FINALIZING');
    const outputSizeBytes = await this.measureOutput(ctx);

    let error: string | undefined;
    if (exit.cancelled) {
      error = 'Cancelled';
    } else if (exit.code === null) {
      error = `Encoder was killed by ${exit.signal ?? 'a signal'}`;
    } else if (exit.code !== 0) {
      error = `Encoder exited with code ${exit.code}`;
    } else if (outputSizeBytes === undefined) {
      error = new OutputSizeUnavailableError(ctx.outputPath).message;
    }

    if (error) {
      emit({ type: 'line', text: error });
    }
    if (outputSizeBytes !== undefined) {
      emit({ type: 'outputSize', bytes: outputSizeBytes });
    }

    return this.finish(ctx, { error, command, outputSizeBytes, exitCode: exit.code });
  }

  /**
   * Spawn the encoder and relay its stderr until it exits.
   * Rejects when the process cannot be started.
   */
  private async spawnAndRelay(
    args: string[],
    ctx: JobContext
  ): Promise<EncoderExit> {
    const child = this.launch(this.ffmpegPath, args);
    let closed = false;
    let cancelled = false;

    const exited = new Promise<EncoderExit>((resolve, reject) => {
      child.once('error', reject);
      child.once('close', (code, signal) => {
        closed = true;
        resolve({ code, signal, cancelled });
      });
    });
    const relayed = relayLines(child.stderr, (text) => ctx.emit({ type: 'line', text }));

    // Only an abort that reaches a live encoder cancels the job
    const onAbort = (): void => {
      if (closed) return;
      cancelled = true;
      ctx.log.info('Cancelling job');
      child.kill('SIGTERM');
    };
    ctx.signal.addEventListener('abort', onAbort, { once: true });
    if (ctx.signal.aborted) {
      onAbort();
    }

    try {
      const exit = await exited;
      await relayed;
      return exit;
    } finally {
      ctx.signal.removeEventListener('abort', onAbort);
    }
  }

  private async measureOutput(ctx: JobContext): Promise<number | undefined> {
    try {
      return await findFileSizeBytes(ctx.outputPath);
    } catch (error) {
      ctx.log.warn({ outputPath: ctx.outputPath, error: errorMessage(error) }, 'Could not read output size');
      return undefined;
    }
  }

  private finish(
    ctx: JobContext,
    result: Pick<JobOutcome, 'error' | 'command' | 'outputSizeBytes' | 'exitCode'>
  ): JobOutcome {
    const outcome: JobOutcome = {
      path: ctx.request.path,
      outputPath: ctx.outputPath,
      result: result.error === undefined ? 'success' : 'failure',
      durationMs: Date.now() - ctx.startTime,
      ...result,
    };

    ctx.machine.complete(outcome.result, result.error);
    ctx.emit({ type: 'done' });

    ctx.log.info({
      result: outcome.result,
      exitCode: outcome.exitCode,
      outputSizeBytes: outcome.outputSizeBytes,
      durationMs: outcome.durationMs,
    }, 'Compression job complete');

    return outcome;
  }
}

/**
 * Forward each line of a stream as it arrives; resolves when the stream ends
 */
function relayLines(stream: Readable | null, onLine: (text: string) => void): Promise<void> {
  if (!stream) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    const lines = createInterface({ input: stream, crlfDelay: Infinity });
    lines.on('line', onLine);
    lines.once('close', () => resolve());
  });
}
