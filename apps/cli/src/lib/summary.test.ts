import { describe, expect, it } from 'vitest';
import type { QueueItem } from '@vidshrink/core';
import { failedCount, savedRatio, summaryRows } from './summary.js';

function item(overrides: Partial<QueueItem>): QueueItem {
  return {
    id: 'item-1',
    path: '/videos/clip.mov',
    status: 'DONE',
    inputSizeBytes: 50 * 1024 * 1024,
    enqueuedAt: new Date(0),
    ...overrides,
  };
}

describe('savedRatio', () => {
  it('gives the share of the input saved', () => {
    expect(savedRatio(1000, 200)).toBe('80.0%');
  });

  it('is a dash without an output or an input size', () => {
    expect(savedRatio(1000, undefined)).toBe('-');
    expect(savedRatio(0, 10)).toBe('-');
  });
});

describe('summaryRows', () => {
  it('reports sizes and status per file', () => {
    const rows = summaryRows([
      item({ outputSizeBytes: 10 * 1024 * 1024 }),
      item({ id: 'item-2', path: '/videos/broken.mkv', error: 'Encoder exited with code 1' }),
      item({ id: 'item-3', path: '/videos/next.mp4', status: 'WAITING' }),
    ]);

    expect(rows).toEqual([
      { File: 'clip.mov', Status: 'done', Before: '50.0 MB', After: '10.0 MB', Saved: '80.0%' },
      { File: 'broken.mkv', Status: 'failed', Before: '50.0 MB', After: '-', Saved: '-' },
      { File: 'next.mp4', Status: 'waiting', Before: '50.0 MB', After: '-', Saved: '-' },
    ]);
  });
});

describe('failedCount', () => {
  it('counts items carrying an error', () => {
    expect(failedCount([item({}), item({ error: 'Cancelled' })])).toBe(1);
  });
});
