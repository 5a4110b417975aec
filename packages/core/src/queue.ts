/**
 * Queue Supervisor
 *
 * Owns the ordered list of compression jobs and is the only writer of
 * their status and output size. Jobs run strictly one at a time.
 *
 * Status Flow:
 * WAITING → PROCESSING → DONE
 *
 * Rules:
 * - Items are claimed in enqueue order
 * - Nothing is claimed while another item is PROCESSING
 * - Statuses never move backward
 * - Every completion arms the auto-advance flag exactly once
 */

import { randomUUID } from 'node:crypto';
import { createLogger } from '@vidshrink/utils';
import { NotFoundError } from './errors/index.js';
import type { QueueItem } from './types/job.js';

const log = createLogger({ component: 'queue' });

export class QueueSupervisor {
  private readonly queue: QueueItem[] = [];
  private startNextArmed = false;

  /**
   * Append a WAITING item. The same path may be queued more than once;
   * each entry is an independent job.
   */
  enqueue(path: string, inputSizeBytes: number): QueueItem {
    const item: QueueItem = {
      id: randomUUID(),
      path,
      status: 'WAITING',
      inputSizeBytes,
      enqueuedAt: new Date(),
    };
    this.queue.push(item);

    log.debug({ itemId: item.id, path, inputSizeBytes }, 'Item queued');
    return { ...item };
  }

  /**
   * Claim the oldest WAITING item and mark it PROCESSING.
   * Returns undefined while busy or when nothing is waiting.
   */
  claimNext(): QueueItem | undefined {
    if (this.isBusy()) {
      return undefined;
    }

    const item = this.queue.find((i) => i.status === 'WAITING');
    if (!item) {
      return undefined;
    }

    item.status = 'PROCESSING';
    item.startedAt = new Date();

    log.info({ itemId: item.id, path: item.path }, 'Item claimed');
    return { ...item };
  }

  /**
   * Mark the PROCESSING item for `path` as DONE and arm auto-advance.
   * An absent output size means the encode produced nothing.
   */
  markDone(path: string, outputSizeBytes?: number, error?: string): QueueItem {
    const item = this.queue.find((i) => i.status === 'PROCESSING' && i.path === path);
    if (!item) {
      throw new NotFoundError('Processing item', path);
    }

    item.status = 'DONE';
    item.finishedAt = new Date();
    if (outputSizeBytes !== undefined) item.outputSizeBytes = outputSizeBytes;
    if (error !== undefined) item.error = error;

    this.startNextArmed = true;

    log.info({
      itemId: item.id,
      path,
      outputSizeBytes,
      error,
    }, 'Item done');
    return { ...item };
  }

  isBusy(): boolean {
    return this.queue.some((i) => i.status === 'PROCESSING');
  }

  /**
   * Read and reset the auto-advance flag. True at most once per completion.
   */
  consumeStartNext(): boolean {
    if (!this.startNextArmed) {
      return false;
    }
    this.startNextArmed = false;
    return true;
  }

  /**
   * Snapshot of all items in enqueue order
   */
  items(): QueueItem[] {
    return this.queue.map((i) => ({ ...i }));
  }

  get(id: string): QueueItem | undefined {
    const item = this.queue.find((i) => i.id === id);
    return item ? { ...item } : undefined;
  }

  waitingCount(): number {
    return this.queue.filter((i) => i.status === 'WAITING').length;
  }

  /**
   * Nothing running and nothing left to claim
   */
  isDrained(): boolean {
    return !this.isBusy() && this.waitingCount() === 0;
  }
}
