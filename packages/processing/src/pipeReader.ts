/**
 * Pipe Reader
 *
 * Drains one child-process stream line by line into a queue shared by both
 * of the child's streams. Sequence numbers are assigned on arrival, so
 * interleaved stdout/stderr is replayed in the order it was read.
 */

import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';

export type StreamTag = 'stdout' | 'stderr';

export interface PipeMessage {
  seq: number;
  stream: StreamTag;
  data: string;
}

export class PipeMessageQueue {
  private items: PipeMessage[] = [];
  private nextSeq = 0;
  private openWriters = 0;
  private waiters: Array<() => void> = [];

  get length(): number {
    return this.items.length;
  }

  /**
   * Register a producer. The queue counts as drained only once every
   * registered producer has called `closeWriter()` and nothing is left.
   */
  openWriter(): void {
    this.openWriters++;
  }

  closeWriter(): void {
    if (this.openWriters > 0) {
      this.openWriters--;
    }
    this.wake();
  }

  push(stream: StreamTag, data: string): void {
    this.items.push({ seq: this.nextSeq++, stream, data });
    this.wake();
  }

  isDrained(): boolean {
    return this.openWriters === 0 && this.items.length === 0;
  }

  /**
   * Take the oldest message, waiting up to `timeoutMs` for one to arrive.
   * Resolves null on timeout, on abort, or once the queue is drained.
   */
  async pop(timeoutMs: number, signal?: AbortSignal): Promise<PipeMessage | null> {
    const head = this.items.shift();
    if (head) return head;
    if (this.openWriters === 0 || signal?.aborted) return null;

    await new Promise<void>(resolve => {
      const done = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', done);
        this.waiters = this.waiters.filter(waiter => waiter !== done);
        resolve();
      };
      const timer = setTimeout(done, timeoutMs);
      signal?.addEventListener('abort', done, { once: true });
      this.waiters.push(done);
    });

    return this.items.shift() ?? null;
  }

  /**
   * Everything currently queued, oldest first
   */
  drain(): PipeMessage[] {
    const all = this.items;
    this.items = [];
    return all;
  }

  private wake(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}

export interface PipeReaderOptions {
  /** Once a line matches, it and every later line are dropped */
  ignoreFrom?: RegExp;
}

export class PipeReader {
  private readonly finished: Promise<void>;

  constructor(
    stream: Readable | null | undefined,
    readonly tag: StreamTag,
    queue: PipeMessageQueue,
    options: PipeReaderOptions = {}
  ) {
    if (!stream) {
      this.finished = Promise.resolve();
      return;
    }

    queue.openWriter();
    let ignoring = false;

    const lines = createInterface({ input: stream, crlfDelay: Infinity });

    this.finished = new Promise<void>(resolve => {
      lines.on('line', line => {
        if (!ignoring && options.ignoreFrom?.test(line)) {
          ignoring = true;
        }
        if (!ignoring) {
          queue.push(tag, line);
        }
      });
      lines.once('close', () => {
        queue.closeWriter();
        resolve();
      });
    });

    // A broken pipe is end-of-stream
    stream.once('error', () => lines.close());
  }

  /**
   * Resolves once the stream has reached its end
   */
  done(): Promise<void> {
    return this.finished;
  }
}
