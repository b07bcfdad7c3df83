import { describe, it, expect } from 'vitest';
import { PassThrough } from 'node:stream';
import { PipeMessageQueue, PipeReader } from './pipeReader.js';

describe('PipeMessageQueue', () => {
  it('should number messages in arrival order across streams', () => {
    const queue = new PipeMessageQueue();
    queue.push('stdout', 'a');
    queue.push('stderr', 'b');
    queue.push('stdout', 'c');

    expect(queue.drain()).toEqual([
      { seq: 0, stream: 'stdout', data: 'a' },
      { seq: 1, stream: 'stderr', data: 'b' },
      { seq: 2, stream: 'stdout', data: 'c' },
    ]);
  });

  it('should return null at once when no writer is open', async () => {
    const queue = new PipeMessageQueue();
    expect(await queue.pop(5000)).toBeNull();
    expect(queue.isDrained()).toBe(true);
  });

  it('should wake a waiting pop when a message arrives', async () => {
    const queue = new PipeMessageQueue();
    queue.openWriter();
    setTimeout(() => queue.push('stderr', 'late'), 10);

    const message = await queue.pop(5000);

    expect(message).toEqual({ seq: 0, stream: 'stderr', data: 'late' });
  });

  it('should time out with null while a writer is still open', async () => {
    const queue = new PipeMessageQueue();
    queue.openWriter();

    expect(await queue.pop(20)).toBeNull();
    expect(queue.isDrained()).toBe(false);
  });

  it('should stop waiting when aborted', async () => {
    const queue = new PipeMessageQueue();
    queue.openWriter();
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);

    const started = Date.now();
    expect(await queue.pop(5000, controller.signal)).toBeNull();
    expect(Date.now() - started).toBeLessThan(2000);
  });
});

describe('PipeReader', () => {
  it('should push each line and release its writer at end of stream', async () => {
    const queue = new PipeMessageQueue();
    const stream = new PassThrough();
    const reader = new PipeReader(stream, 'stdout', queue);

    stream.write('first line\nsecond');
    stream.end(' line\n');
    await reader.done();

    expect(queue.drain().map(m => m.data)).toEqual(['first line', 'second line']);
    expect(queue.isDrained()).toBe(true);
  });

  it('should produce nothing for a missing stream', async () => {
    const queue = new PipeMessageQueue();
    const reader = new PipeReader(null, 'stderr', queue);
    await reader.done();

    expect(queue.length).toBe(0);
    expect(queue.isDrained()).toBe(true);
  });

  it('should drop lines from the ignore marker onward', async () => {
    const queue = new PipeMessageQueue();
    const stream = new PassThrough();
    const reader = new PipeReader(stream, 'stderr', queue, { ignoreFrom: /ffmpeg version/ });

    stream.end('[debug] one\nffmpeg version 6.0\n  configuration: x\n');
    await reader.done();

    expect(queue.drain().map(m => m.data)).toEqual(['[debug] one']);
  });

  it('should interleave two readers into one ordered queue', async () => {
    const queue = new PipeMessageQueue();
    const out = new PassThrough();
    const err = new PassThrough();
    const readers = [
      new PipeReader(out, 'stdout', queue),
      new PipeReader(err, 'stderr', queue),
    ];

    out.write('o1\n');
    await new Promise(resolve => setTimeout(resolve, 10));
    err.write('e1\n');
    await new Promise(resolve => setTimeout(resolve, 10));
    out.end('o2\n');
    err.end();
    await Promise.all(readers.map(r => r.done()));

    expect(queue.drain().map(m => `${m.seq}:${m.stream}:${m.data}`)).toEqual([
      '0:stdout:o1',
      '1:stderr:e1',
      '2:stdout:o2',
    ]);
  });
});
