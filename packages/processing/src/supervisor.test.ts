import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  DEFAULT_ENCODE_CONFIG,
  SpawnFailedError,
  ValidationError,
  type EncodeConfig,
  type QueueItem,
} from '@vidshrink/core';
import { planBitrate } from '@vidshrink/media';
import { JobRunner, type ProcessLauncher } from './jobRunner.js';
import { CompressionSupervisor } from './supervisor.js';
import { FakeEncoder, fixedProbe, scriptedLauncher, type EncoderScript } from './__tests__/fakeEncoder.js';

const STATS = { durationSeconds: 60, audioBitrateBps: 320_000 };

function createSupervisor(
  launch: ProcessLauncher,
  config: () => EncodeConfig | Promise<EncodeConfig> = () => DEFAULT_ENCODE_CONFIG
) {
  const runner = new JobRunner({ probe: fixedProbe(STATS), launch });
  return new CompressionSupervisor({
    runner,
    config,
    measureInput: async () => 50_000_000,
  });
}

describe('CompressionSupervisor', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'vidshrink-supervisor-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('runs queued files one after another in enqueue order', async () => {
    const { launch, launched } = scriptedLauncher({ lines: ['frame=  1'] });
    const supervisor = createSupervisor(launch);
    const first = join(dir, 'a.mov');
    const second = join(dir, 'b.mov');
    await writeFile(join(dir, 'a.compressed.mp4'), Buffer.alloc(1000));

    const processingCounts: number[] = [];
    supervisor.on('jobStarted', () => {
      processingCounts.push(supervisor.queue.items().filter((i) => i.status === 'PROCESSING').length);
    });

    await supervisor.enqueue(first);
    await supervisor.enqueue(second);
    await supervisor.runUntilIdle();

    expect(launched.map((l) => l.args[1])).toEqual([first, second]);
    expect(processingCounts).toEqual([1, 1]);

    const [a, b] = supervisor.queue.items();
    expect(a).toMatchObject({ path: first, status: 'DONE', inputSizeBytes: 50_000_000, outputSizeBytes: 1000 });
    expect(a?.error).toBeUndefined();
    expect(b).toMatchObject({ path: second, status: 'DONE', error: `Output file was not produced: ${join(dir, 'b.compressed.mp4')}` });
    expect(b?.outputSizeBytes).toBeUndefined();
    expect(supervisor.queue.isBusy()).toBe(false);
  });

  it('collects every job line in the log sink', async () => {
    const supervisor = createSupervisor(scriptedLauncher({ lines: ['one', 'two'] }).launch);
    await supervisor.enqueue(join(dir, 'a.mov'));

    await supervisor.runUntilIdle();

    expect(supervisor.logSink.lines().slice(1, 4)).toEqual([
      'one',
      'two',
      `Output file was not produced: ${join(dir, 'a.compressed.mp4')}`,
    ]);
    expect(supervisor.logSink.lines()[0]).toMatch(/^\$ ffmpeg -i /);
  });

  it('reads the config afresh for every job', async () => {
    const { launch, launched } = scriptedLauncher({});
    let config: EncodeConfig = { ...DEFAULT_ENCODE_CONFIG, targetSizeMb: 10 };
    const supervisor = createSupervisor(launch, () => config);
    supervisor.once('jobStarted', () => {
      config = { ...config, targetSizeMb: 8 };
    });

    await supervisor.enqueue(join(dir, 'a.mov'));
    await supervisor.enqueue(join(dir, 'b.mov'));
    await supervisor.runUntilIdle();

    const videoBitrate = (args: string[] | undefined): string | undefined => args?.[args.indexOf('-b:v') + 1];
    expect(videoBitrate(launched[0]?.args)).toBe(String(planBitrate(10, 60, 320_000).videoBitsPerSecond));
    expect(videoBitrate(launched[1]?.args)).toBe(String(planBitrate(8, 60, 320_000).videoBitsPerSecond));
  });

  it('awaits an async settings source before each job', async () => {
    const { launch, launched } = scriptedLauncher({});
    const sizes = [10, 8];
    let reads = 0;
    const supervisor = createSupervisor(launch, async () => ({
      ...DEFAULT_ENCODE_CONFIG,
      targetSizeMb: sizes[reads++] ?? 10,
    }));

    await supervisor.enqueue(join(dir, 'a.mov'));
    await supervisor.enqueue(join(dir, 'b.mov'));
    await supervisor.runUntilIdle();

    expect(reads).toBe(2);
    const videoBitrate = (args: string[] | undefined): string | undefined => args?.[args.indexOf('-b:v') + 1];
    expect(videoBitrate(launched[0]?.args)).toBe(String(planBitrate(10, 60, 320_000).videoBitsPerSecond));
    expect(videoBitrate(launched[1]?.args)).toBe(String(planBitrate(8, 60, 320_000).videoBitsPerSecond));
  });

  it('fails a file whose settings cannot be read and moves on', async () => {
    const { launch, launched } = scriptedLauncher({});
    let reads = 0;
    const supervisor = createSupervisor(launch, async () => {
      reads++;
      if (reads === 1) {
        throw new ValidationError('targetSizeMb', 'Expected number, received string');
      }
      return DEFAULT_ENCODE_CONFIG;
    });
    const first = join(dir, 'a.mov');
    const second = join(dir, 'b.mov');
    const reason = 'Could not read encode settings: Validation failed for targetSizeMb: Expected number, received string';

    await supervisor.enqueue(first);
    await supervisor.enqueue(second);
    await supervisor.runUntilIdle();

    expect(launched.map((l) => l.args[1])).toEqual([second]);
    expect(supervisor.queue.items()[0]).toMatchObject({ path: first, status: 'DONE', error: reason });
    expect(supervisor.queue.items()[1]?.status).toBe('DONE');
    expect(supervisor.logSink.lines()[0]).toBe(reason);
    expect(supervisor.isHalted()).toBe(false);
  });

  it('does nothing when started while a job is running', async () => {
    const supervisor = createSupervisor(scriptedLauncher({}).launch);
    await supervisor.enqueue(join(dir, 'a.mov'));
    await supervisor.enqueue(join(dir, 'b.mov'));

    expect(supervisor.startNext()).toBe(true);
    expect(supervisor.startNext()).toBe(false);
    expect(supervisor.queue.waitingCount()).toBe(1);

    await supervisor.runUntilIdle();
    expect(supervisor.queue.isDrained()).toBe(true);
  });

  it('resolves at once when nothing is queued', async () => {
    const supervisor = createSupervisor(scriptedLauncher({}).launch);
    await expect(supervisor.runUntilIdle()).resolves.toBeUndefined();
  });

  it('halts when the encoder cannot be started', async () => {
    const { launch, launched } = scriptedLauncher({ spawnError: new Error('spawn ffmpeg ENOENT') });
    const supervisor = createSupervisor(launch);
    await supervisor.enqueue(join(dir, 'a.mov'));
    await supervisor.enqueue(join(dir, 'b.mov'));

    await expect(supervisor.runUntilIdle()).rejects.toBeInstanceOf(SpawnFailedError);

    expect(launched).toHaveLength(1);
    expect(supervisor.queue.items().map((i) => i.status)).toEqual(['DONE', 'WAITING']);
    expect(supervisor.queue.items()[0]?.error).toBe('Could not start ffmpeg: spawn ffmpeg ENOENT');
    expect(supervisor.isHalted()).toBe(true);
    expect(supervisor.startNext()).toBe(false);
    expect(supervisor.queue.consumeStartNext()).toBe(false);
  });

  it('moves on to the next file after a cancel', async () => {
    const scripts: EncoderScript[] = [{ lines: ['frame=  1'], holdOpen: true }, { lines: ['frame=  1'] }];
    const started: FakeEncoder[] = [];
    const launch: ProcessLauncher = () => {
      const child = new FakeEncoder(scripts[started.length] ?? {});
      started.push(child);
      child.play();
      return child;
    };
    const supervisor = createSupervisor(launch);
    let cancelled = false;
    supervisor.on('signal', (_itemId: string, signal: { type: string }) => {
      if (!cancelled && signal.type === 'line' && supervisor.logSink.tail(1)[0] === 'frame=  1') {
        cancelled = supervisor.cancelCurrent();
      }
    });
    const completed: QueueItem[] = [];
    supervisor.on('jobCompleted', (item: QueueItem) => completed.push(item));

    await supervisor.enqueue(join(dir, 'a.mov'));
    await supervisor.enqueue(join(dir, 'b.mov'));
    await supervisor.runUntilIdle();

    expect(started[0]?.killSignals).toEqual(['SIGTERM']);
    expect(started).toHaveLength(2);
    expect(completed.map((i) => i.error)).toEqual([
      'Cancelled',
      `Output file was not produced: ${join(dir, 'b.compressed.mp4')}`,
    ]);
  });
});
