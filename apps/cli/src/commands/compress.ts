/**
 * Compress Command
 *
 * Queue the given files and encode them one after another.
 */

import ora from 'ora';
import chalk from 'chalk';
import { isErrnoException } from '@vidshrink/utils';
import { errorMessage, loadEncodeConfig, type EncodeConfig, type JobSignal, type QueueItem } from '@vidshrink/core';
import { MediaProbe } from '@vidshrink/media';
import { CompressionSupervisor, JobRunner } from '@vidshrink/processing';
import { config } from '../config/index.js';
import {
  jobLabel,
  jobResultLine,
  printEncoderLine,
  printError,
  printJson,
  printQueueSummary,
  printWarning,
  progressSuffix,
} from '../lib/output.js';
import { applyOverrides, type EncodeOverrides } from '../lib/settings.js';
import { failedCount } from '../lib/summary.js';

export interface CompressOptions extends EncodeOverrides {
  verbose?: boolean;
  json?: boolean;
}

export async function compressCommand(files: string[], options: CompressOptions): Promise<void> {
  // Read again for every file; edits during a batch apply to the files still waiting
  const readSettings = async (): Promise<EncodeConfig> =>
    applyOverrides(await loadEncodeConfig(config.configFile), options);

  try {
    await readSettings();
  } catch (error) {
    printError(errorMessage(error));
    process.exit(1);
  }

  const probe = new MediaProbe({ ffprobePath: config.tools.ffprobe });
  if (!(await probe.isAvailable())) {
    printWarning(`${config.tools.ffprobe} did not answer -version; bitrate planning will fail`);
  }

  const supervisor = new CompressionSupervisor({
    runner: new JobRunner({ probe, ffmpegPath: config.tools.ffmpeg }),
    config: readSettings,
  });

  for (const file of files) {
    try {
      await supervisor.enqueue(file);
    } catch (error) {
      const reason = isErrnoException(error) && error.code === 'ENOENT' ? 'file not found' : errorMessage(error);
      printError(`Skipping ${file}: ${reason}`);
    }
  }

  const total = supervisor.queue.items().length;
  if (total === 0) {
    printError('Nothing to compress');
    process.exit(1);
  }

  const spinner = ora({ isSilent: options.json === true });
  let position = 0;

  supervisor.on('jobStarted', (item: QueueItem) => {
    position++;
    spinner.start(jobLabel(position, total, item.path));
  });

  supervisor.on('signal', (_itemId: string, signal: JobSignal) => {
    if (signal.type !== 'line' || options.json) return;
    if (options.verbose) {
      spinner.clear();
      printEncoderLine(signal.text);
      spinner.render();
    } else {
      spinner.suffixText = chalk.gray(progressSuffix(signal.text));
    }
  });

  supervisor.on('jobCompleted', (item: QueueItem) => {
    spinner.suffixText = '';
    const result = jobResultLine(item);
    if (result.ok) {
      spinner.succeed(result.text);
    } else {
      spinner.fail(result.text);
    }
  });

  // First Ctrl+C cancels the running file, a second one quits
  let interrupted = false;
  const onInterrupt = (): void => {
    if (interrupted) {
      process.exit(130);
    }
    interrupted = true;
    supervisor.cancelCurrent();
  };
  process.on('SIGINT', onInterrupt);

  try {
    await supervisor.runUntilIdle();
  } catch (error) {
    spinner.fail('Queue halted');
    printError(errorMessage(error));
    process.exitCode = 1;
  } finally {
    process.off('SIGINT', onInterrupt);
  }

  const items = supervisor.queue.items();
  if (options.json) {
    printJson(items);
  } else {
    printQueueSummary(items);
  }

  if (failedCount(items) > 0) {
    process.exitCode = 1;
  }
}
