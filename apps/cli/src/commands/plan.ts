/**
 * Plan Command
 *
 * Show the bitrate split and encoder command for a file without
 * running it.
 */

import ora from 'ora';
import { formatBitrate, formatDuration } from '@vidshrink/utils';
import { errorMessage, loadEncodeConfig } from '@vidshrink/core';
import { MediaProbe, planBitrate } from '@vidshrink/media';
import { buildCompressionArgs, compressedOutputPath, renderCommand } from '@vidshrink/processing';
import { config } from '../config/index.js';
import { printError, printHeader, printJson, printKeyValue } from '../lib/output.js';
import { applyOverrides, type EncodeOverrides } from '../lib/settings.js';

export interface PlanOptions extends EncodeOverrides {
  json?: boolean;
}

export async function planCommand(file: string, options: PlanOptions): Promise<void> {
  const spinner = ora({ text: 'Probing source...', isSilent: options.json === true }).start();

  try {
    const settings = applyOverrides(await loadEncodeConfig(config.configFile), options);
    const probe = new MediaProbe({ ffprobePath: config.tools.ffprobe });
    const stats = await probe.probe(file);
    const planned = planBitrate(settings.targetSizeMb, stats.durationSeconds, stats.audioBitrateBps);

    const outputPath = compressedOutputPath(file);
    const args = buildCompressionArgs(file, outputPath, settings, planned);
    const command = renderCommand(config.tools.ffmpeg, args);

    spinner.stop();

    if (options.json) {
      printJson({ file, outputPath, settings, stats, planned, args });
      return;
    }

    printHeader('Compression Plan');
    printKeyValue('File', file);
    printKeyValue('Duration', formatDuration(Math.round(stats.durationSeconds * 1000)));
    printKeyValue('Source audio', formatBitrate(stats.audioBitrateBps));
    printKeyValue('Target size', `${settings.targetSizeMb} MB`);
    printKeyValue('Video bitrate', formatBitrate(planned.videoBitsPerSecond));
    printKeyValue('Audio bitrate', formatBitrate(planned.audioBitsPerSecond));
    printKeyValue('Output', outputPath);
    console.log();
    console.log(command);
  } catch (error) {
    spinner.fail('Could not plan compression');
    printError(errorMessage(error));
    process.exit(1);
  }
}
