import { describe, expect, it, vi } from 'vitest';
import { LogSink } from './logSink.js';

describe('LogSink', () => {
  it('keeps lines in append order', () => {
    const sink = new LogSink();
    sink.append('frame=1');
    sink.append('frame=2');

    expect(sink.lines()).toEqual(['frame=1', 'frame=2']);
    expect(sink.size).toBe(2);
  });

  it('notifies line listeners as lines arrive', () => {
    const sink = new LogSink();
    const listener = vi.fn();
    sink.on('line', listener);

    sink.append('Press [q] to stop');

    expect(listener).toHaveBeenCalledWith('Press [q] to stop');
  });

  it('drops the oldest lines past maxLines', () => {
    const sink = new LogSink({ maxLines: 2 });
    sink.append('a');
    sink.append('b');
    sink.append('c');

    expect(sink.lines()).toEqual(['b', 'c']);
  });

  it('returns the tail', () => {
    const sink = new LogSink();
    ['a', 'b', 'c'].forEach((line) => sink.append(line));

    expect(sink.tail(2)).toEqual(['b', 'c']);
    expect(sink.tail(0)).toEqual([]);
    expect(sink.tail(10)).toEqual(['a', 'b', 'c']);
  });

  it('clears the buffer', () => {
    const sink = new LogSink();
    sink.append('a');
    sink.clear();
    expect(sink.lines()).toEqual([]);
  });
});
