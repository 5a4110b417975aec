/**
 * Output Formatter
 *
 * Status lines and the queue report. Line builders return plain text;
 * colour is applied when printing.
 */

import chalk from 'chalk';
import { formatBytes, getFilename } from '@vidshrink/utils';
import type { QueueItem } from '@vidshrink/core';
import { failedCount, savedRatio, summaryRows } from './summary.js';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${String(value)}`);
}

/**
 * Encoder output, dimmed so it reads apart from status lines
 */
export function printEncoderLine(line: string): void {
  console.log(chalk.gray(line));
}

// Spinner text for a running file, e.g. `[2/5] clip.mov`
export function jobLabel(position: number, total: number, path: string): string {
  return `[${position}/${total}] ${getFilename(path)}`;
}

/**
 * Latest encoder line, shortened to fit beside the spinner
 */
export function progressSuffix(line: string, width = 60): string {
  return line.trim().slice(0, width);
}

export interface JobResultLine {
  ok: boolean;
  text: string;
}

/**
 * One line per finished file: sizes when it succeeded, the error otherwise
 */
export function jobResultLine(item: QueueItem): JobResultLine {
  const name = getFilename(item.path);
  if (item.error === undefined && item.outputSizeBytes !== undefined) {
    return {
      ok: true,
      text: `${name} ${formatBytes(item.inputSizeBytes)} → ${formatBytes(item.outputSizeBytes)} ` +
        `(${savedRatio(item.inputSizeBytes, item.outputSizeBytes)} saved)`,
    };
  }
  return { ok: false, text: `${name}: ${item.error ?? 'failed'}` };
}

/**
 * Totals over the files that compressed
 */
export function totalsLine(items: readonly QueueItem[]): string {
  let before = 0;
  let after = 0;
  let compressed = 0;
  for (const item of items) {
    if (item.error === undefined && item.outputSizeBytes !== undefined) {
      before += item.inputSizeBytes;
      after += item.outputSizeBytes;
      compressed++;
    }
  }
  return `${compressed} compressed, ${failedCount(items)} failed, ` +
    `${formatBytes(before)} → ${formatBytes(after)}`;
}

export function printQueueSummary(items: readonly QueueItem[]): void {
  if (items.length === 0) {
    console.log(chalk.blue('i'), 'No files to display');
    return;
  }
  console.log();
  console.table(summaryRows(items));
  console.log(chalk.bold(totalsLine(items)));
}
