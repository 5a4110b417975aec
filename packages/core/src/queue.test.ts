import { describe, expect, it } from 'vitest';
import { QueueSupervisor } from './queue.js';
import { NotFoundError } from './errors/index.js';

describe('QueueSupervisor', () => {
  it('queues items as WAITING without an output size', () => {
    const queue = new QueueSupervisor();
    const item = queue.enqueue('/videos/a.mov', 5_000_000);

    expect(item.status).toBe('WAITING');
    expect(item.inputSizeBytes).toBe(5_000_000);
    expect(item.outputSizeBytes).toBeUndefined();
    expect(queue.isBusy()).toBe(false);
  });

  it('claims waiting items in enqueue order', () => {
    const queue = new QueueSupervisor();
    queue.enqueue('/videos/a.mov', 1);
    queue.enqueue('/videos/b.mov', 2);
    queue.enqueue('/videos/c.mov', 3);

    expect(queue.claimNext()?.path).toBe('/videos/a.mov');
    queue.markDone('/videos/a.mov', 100);
    expect(queue.claimNext()?.path).toBe('/videos/b.mov');
    queue.markDone('/videos/b.mov', 200);
    expect(queue.claimNext()?.path).toBe('/videos/c.mov');
  });

  it('refuses a second claim while an item is processing', () => {
    const queue = new QueueSupervisor();
    queue.enqueue('/videos/a.mov', 1);
    queue.enqueue('/videos/b.mov', 2);

    expect(queue.claimNext()?.status).toBe('PROCESSING');
    expect(queue.claimNext()).toBeUndefined();
    expect(queue.isBusy()).toBe(true);
    expect(queue.items().map((i) => i.status)).toEqual(['PROCESSING', 'WAITING']);
  });

  it('returns undefined when nothing is waiting', () => {
    const queue = new QueueSupervisor();
    expect(queue.claimNext()).toBeUndefined();

    queue.enqueue('/videos/a.mov', 1);
    queue.claimNext();
    queue.markDone('/videos/a.mov');
    expect(queue.claimNext()).toBeUndefined();
    expect(queue.isDrained()).toBe(true);
  });

  it('records the output size and clears busy on completion', () => {
    const queue = new QueueSupervisor();
    queue.enqueue('/videos/a.mov', 50_000_000);
    queue.claimNext();

    const done = queue.markDone('/videos/a.mov', 9_800_000);

    expect(done.status).toBe('DONE');
    expect(done.outputSizeBytes).toBe(9_800_000);
    expect(done.finishedAt).toBeInstanceOf(Date);
    expect(queue.isBusy()).toBe(false);
  });

  it('leaves the output size unset when the encode produced nothing', () => {
    const queue = new QueueSupervisor();
    queue.enqueue('/videos/a.mov', 1);
    queue.claimNext();

    const done = queue.markDone('/videos/a.mov', undefined, 'Encoder exited with code 1');

    expect(done.status).toBe('DONE');
    expect(done.outputSizeBytes).toBeUndefined();
    expect(done.error).toBe('Encoder exited with code 1');
  });

  it('arms the auto-advance flag once per completion', () => {
    const queue = new QueueSupervisor();
    queue.enqueue('/videos/a.mov', 1);

    expect(queue.consumeStartNext()).toBe(false);

    queue.claimNext();
    queue.markDone('/videos/a.mov', 10);

    expect(queue.consumeStartNext()).toBe(true);
    expect(queue.consumeStartNext()).toBe(false);
  });

  it('treats duplicate paths as independent jobs', () => {
    const queue = new QueueSupervisor();
    const first = queue.enqueue('/videos/a.mov', 1);
    const second = queue.enqueue('/videos/a.mov', 1);
    expect(first.id).not.toBe(second.id);

    queue.claimNext();
    queue.markDone('/videos/a.mov', 10);
    const claimed = queue.claimNext();
    expect(claimed?.id).toBe(second.id);

    queue.markDone('/videos/a.mov', 20);
    expect(queue.items().map((i) => i.outputSizeBytes)).toEqual([10, 20]);
  });

  it('never moves a finished item backward', () => {
    const queue = new QueueSupervisor();
    queue.enqueue('/videos/a.mov', 1);
    queue.claimNext();
    queue.markDone('/videos/a.mov', 10);

    expect(() => queue.markDone('/videos/a.mov', 20)).toThrow(NotFoundError);
    expect(queue.items()[0]?.outputSizeBytes).toBe(10);
  });

  it('hands out copies so callers cannot change item state', () => {
    const queue = new QueueSupervisor();
    const item = queue.enqueue('/videos/a.mov', 1);
    item.status = 'DONE';

    expect(queue.get(item.id)?.status).toBe('WAITING');
  });
});
