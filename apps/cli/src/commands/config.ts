/**
 * Config Command
 *
 * View and manage the stored encode settings.
 */

import chalk from 'chalk';
import {
  DEFAULT_ENCODE_CONFIG,
  ENCODE_CONFIG_KEYS,
  errorMessage,
  isEncodeConfigKey,
  loadEncodeConfig,
  saveEncodeConfig,
  setEncodeConfigValue,
  type EncodeConfig,
  type EncodeConfigKey,
} from '@vidshrink/core';
import { config } from '../config/index.js';
import { printError, printHeader, printKeyValue, printSuccess } from '../lib/output.js';

export interface ConfigOptions {
  list?: boolean;
  get?: string;
  set?: string;
  reset?: boolean;
}

const configDescriptions: Record<EncodeConfigKey, string> = {
  targetSizeMb: 'Target output size in megabytes',
  frameRate: 'Output frame rate (none keeps the source rate)',
  encoder: 'cpu (libx264) or gpu (h264_nvenc)',
  resolution: '1080p, 720p or 480p (none keeps the source size)',
  preset: 'x264 speed preset, or none',
};

export async function configCommand(options: ConfigOptions): Promise<void> {
  try {
    if (options.reset) {
      await saveEncodeConfig(config.configFile, DEFAULT_ENCODE_CONFIG);
      printSuccess('Settings reset to defaults');
      return;
    }

    const current = await loadEncodeConfig(config.configFile);

    if (options.set !== undefined) {
      const separator = options.set.indexOf('=');
      if (separator <= 0) {
        printError('Usage: vidshrink config --set <key=value>');
        process.exit(1);
      }
      const key = options.set.slice(0, separator).trim();
      const value = options.set.slice(separator + 1);
      await saveEncodeConfig(config.configFile, setEncodeConfigValue(current, key, value));
      printSuccess(`Set ${key} = ${value.trim() || 'none'}`);
      return;
    }

    if (options.get !== undefined) {
      if (!isEncodeConfigKey(options.get)) {
        printError(`Unknown setting: ${options.get}`);
        console.log(chalk.gray(`Valid keys: ${ENCODE_CONFIG_KEYS.join(', ')}`));
        process.exit(1);
      }
      printKeyValue(options.get, displayValue(current, options.get));
      return;
    }

    listConfig(current);
  } catch (error) {
    printError(errorMessage(error));
    process.exit(1);
  }
}

function listConfig(current: EncodeConfig): void {
  printHeader('Encode Settings');

  for (const key of ENCODE_CONFIG_KEYS) {
    console.log(`${chalk.cyan(key)}: ${displayValue(current, key)}`);
    console.log(`  ${chalk.gray(configDescriptions[key])}`);
    console.log();
  }

  console.log(chalk.gray(`Stored in ${config.configFile}`));
  console.log(chalk.gray('Use "vidshrink config --set <key=value>" to change a value'));
}

function displayValue(current: EncodeConfig, key: EncodeConfigKey): string {
  const value = current[key];
  return value === undefined ? chalk.gray('not set') : String(value);
}
