/**
 * Log Sink
 *
 * Buffer of encoder diagnostic lines for display. Appends are relayed
 * to `line` listeners as they arrive.
 */

import { EventEmitter } from 'node:events';

export interface LogSinkOptions {
  // Oldest lines are dropped past this count; unbounded when unset
  maxLines?: number;
}

export class LogSink extends EventEmitter {
  private buffer: string[] = [];
  private readonly maxLines: number | undefined;

  constructor(options: LogSinkOptions = {}) {
    super();
    this.maxLines = options.maxLines;
  }

  append(line: string): void {
    this.buffer.push(line);
    if (this.maxLines !== undefined && this.buffer.length > this.maxLines) {
      this.buffer.splice(0, this.buffer.length - this.maxLines);
    }
    this.emit('line', line);
  }

  lines(): string[] {
    return [...this.buffer];
  }

  /**
   * Last `count` lines
   */
  tail(count: number): string[] {
    if (count <= 0) return [];
    return this.buffer.slice(-count);
  }

  get size(): number {
    return this.buffer.length;
  }

  clear(): void {
    this.buffer = [];
  }
}
