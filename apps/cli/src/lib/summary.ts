/**
 * Before/after report of a finished queue
 */

import { formatBytes, getFilename } from '@vidshrink/utils';
import type { QueueItem } from '@vidshrink/core';

export type SummaryRow = {
  File: string;
  Status: string;
  Before: string;
  After: string;
  Saved: string;
};

export function itemStatus(item: QueueItem): string {
  if (item.status !== 'DONE') {
    return item.status.toLowerCase();
  }
  return item.error === undefined ? 'done' : 'failed';
}

/**
 * Share of the input size saved, e.g. `80.0%`
 */
export function savedRatio(inputSizeBytes: number, outputSizeBytes: number | undefined): string {
  if (outputSizeBytes === undefined || inputSizeBytes <= 0) {
    return '-';
  }
  return `${((1 - outputSizeBytes / inputSizeBytes) * 100).toFixed(1)}%`;
}

export function summaryRows(items: readonly QueueItem[]): SummaryRow[] {
  return items.map((item) => ({
    File: getFilename(item.path),
    Status: itemStatus(item),
    Before: formatBytes(item.inputSizeBytes),
    After: item.outputSizeBytes === undefined ? '-' : formatBytes(item.outputSizeBytes),
    Saved: savedRatio(item.inputSizeBytes, item.outputSizeBytes),
  }));
}

export function failedCount(items: readonly QueueItem[]): number {
  return items.filter((item) => item.error !== undefined).length;
}
