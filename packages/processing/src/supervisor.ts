/**
 * Compression Supervisor
 *
 * Drives the queue: claims the next waiting file, runs it, records the
 * result and moves on when the job settles. One job at a time.
 *
 * Events:
 * - `queued` (item)
 * - `jobStarted` (item, handle)
 * - `signal` (itemId, signal)
 * - `jobCompleted` (item, outcome)
 * - `drained` ()
 * - `fatal` (error)
 */

import { EventEmitter } from 'node:events';
import { createJobLogger, createLogger, getFileSizeBytes } from '@vidshrink/utils';
import {
  LogSink,
  QueueSupervisor,
  errorMessage,
  type EncodeConfig,
  type JobOutcome,
  type QueueItem,
} from '@vidshrink/core';
import { compressedOutputPath } from './commandBuilder.js';
import type { JobHandle, JobRequest, SignalListener } from './jobRunner.js';

const log = createLogger({ component: 'supervisor' });

export interface CompressionRunner {
  run(request: JobRequest, onSignal: SignalListener): JobHandle;
}

export interface CompressionSupervisorOptions {
  runner: CompressionRunner;
  // Read once per job, after the item is claimed
  config: () => EncodeConfig | Promise<EncodeConfig>;
  queue?: QueueSupervisor;
  logSink?: LogSink;
  measureInput?: (path: string) => Promise<number>;
}

export class CompressionSupervisor extends EventEmitter {
  readonly queue: QueueSupervisor;
  readonly logSink: LogSink;
  private readonly runner: CompressionRunner;
  private readonly config: () => EncodeConfig | Promise<EncodeConfig>;
  private readonly measureInput: (path: string) => Promise<number>;
  private current: JobHandle | undefined;
  private halted = false;

  constructor(options: CompressionSupervisorOptions) {
    super();
    this.runner = options.runner;
    this.config = options.config;
    this.queue = options.queue ?? new QueueSupervisor();
    this.logSink = options.logSink ?? new LogSink();
    this.measureInput = options.measureInput ?? getFileSizeBytes;
  }

  /**
   * Queue a file. Its size is read now, for the before/after report.
   */
  async enqueue(path: string): Promise<QueueItem> {
    const inputSizeBytes = await this.measureInput(path);
    const item = this.queue.enqueue(path, inputSizeBytes);
    this.emit('queued', item);
    return item;
  }

  /**
   * Claim the oldest waiting file and start it once its settings are
   * read. Returns false when a job is already running, nothing is
   * waiting or the supervisor has halted.
   */
  startNext(): boolean {
    if (this.halted) {
      return false;
    }

    const item = this.queue.claimNext();
    if (!item) {
      return false;
    }

    this.launch(item).catch((error: unknown) => {
      createJobLogger(log, item).error({ error: errorMessage(error) }, 'Supervisor failed while running a job');
      this.halted = true;
      this.emit('fatal', error);
    });

    return true;
  }

  /**
   * Start work and resolve once the queue has drained
   */
  runUntilIdle(): Promise<void> {
    return new Promise((resolve, reject) => {
      const onDrained = (): void => {
        this.off('fatal', onFatal);
        resolve();
      };
      const onFatal = (error: unknown): void => {
        this.off('drained', onDrained);
        reject(error);
      };
      this.once('drained', onDrained);
      this.once('fatal', onFatal);

      if (this.halted) {
        onFatal(new Error('Supervisor has halted'));
      } else if (!this.queue.isBusy() && !this.startNext()) {
        this.emit('drained');
      }
    });
  }

  /**
   * Cancel the running job, if any. The queue moves on to the next file.
   */
  cancelCurrent(): boolean {
    if (!this.current) {
      return false;
    }
    this.current.cancel();
    return true;
  }

  isHalted(): boolean {
    return this.halted;
  }

  /**
   * Read the settings, run the claimed item and record its result
   */
  private async launch(item: QueueItem): Promise<void> {
    let config: EncodeConfig;
    try {
      config = { ...(await this.config()) };
    } catch (error) {
      this.skip(item, error);
      return;
    }

    let outputSizeBytes: number | undefined;
    const handle = this.runner.run({ id: item.id, path: item.path, config }, (signal) => {
      if (signal.type === 'line') {
        this.logSink.append(signal.text);
      } else if (signal.type === 'outputSize') {
        outputSizeBytes = signal.bytes;
      }
      this.emit('signal', item.id, signal);
    });
    this.current = handle;

    createJobLogger(log, item).info({ config }, 'Job started');
    this.emit('jobStarted', item, handle);

    let outcome: JobOutcome;
    try {
      outcome = await handle.done;
    } catch (error) {
      this.halt(item, error, outputSizeBytes);
      return;
    }
    this.complete(item, outcome);
  }

  // Settings could not be read: the item fails without an encode
  private skip(item: QueueItem, error: unknown): void {
    const reason = `Could not read encode settings: ${errorMessage(error)}`;
    createJobLogger(log, item).warn({ error: errorMessage(error) }, 'Skipping job');
    this.logSink.append(reason);

    const done = this.queue.markDone(item.path, undefined, reason);
    const outcome: JobOutcome = {
      path: item.path,
      outputPath: compressedOutputPath(item.path),
      result: 'failure',
      error: reason,
      durationMs: 0,
    };
    this.emit('jobCompleted', done, outcome);
    this.advance();
  }

  private complete(item: QueueItem, outcome: JobOutcome): void {
    this.current = undefined;
    const done = this.queue.markDone(item.path, outcome.outputSizeBytes, outcome.error);
    this.emit('jobCompleted', done, outcome);
    this.advance();
  }

  private halt(item: QueueItem, error: unknown, outputSizeBytes: number | undefined): void {
    this.current = undefined;
    this.queue.markDone(item.path, outputSizeBytes, errorMessage(error));
    this.queue.consumeStartNext();
    this.halted = true;

    createJobLogger(log, item).error({ error: errorMessage(error) }, 'Job failed fatally, halting queue');
    this.emit('fatal', error);
  }

  private advance(): void {
    if (this.queue.consumeStartNext() && this.startNext()) {
      return;
    }
    if (this.queue.isDrained()) {
      log.info({ items: this.queue.items().length }, 'Queue drained');
      this.emit('drained');
    }
  }
}
