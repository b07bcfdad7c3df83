import { describe, it, expect } from 'vitest';
import { SpawnFailedError } from '@reelkeeper/core';
import { ChildProcessRunner, formatCommand, quoteShellArg } from './childProcessRunner.js';
import { PipeMessageQueue } from './pipeReader.js';

const node = process.execPath;
const posixIt = process.platform === 'win32' ? it.skip : it;

async function collect(queue: PipeMessageQueue): Promise<string[]> {
  const lines: string[] = [];
  for (;;) {
    const message = await queue.pop(50);
    if (message) {
      lines.push(`${message.stream}:${message.data}`);
    } else if (queue.isDrained()) {
      return lines;
    }
  }
}

describe('ChildProcessRunner', () => {
  const runner = new ChildProcessRunner();

  it('should feed both streams into the queue and report the exit code', async () => {
    const queue = new PipeMessageQueue();
    const handle = await runner.spawn(
      [node, '-e', 'console.log("to out"); console.error("to err"); process.exitCode = 4'],
      queue
    );

    const lines = await collect(queue);
    const code = await handle.wait();

    expect(code).toBe(4);
    expect(handle.isAlive()).toBe(false);
    expect(lines.sort()).toEqual(['stderr:to err', 'stdout:to out']);
  });

  it('should reject with not-found for a missing executable', async () => {
    const queue = new PipeMessageQueue();
    const attempt = runner.spawn(['/nonexistent/reelkeeper-tool', '--help'], queue);

    await expect(attempt).rejects.toBeInstanceOf(SpawnFailedError);
    await expect(attempt).rejects.toMatchObject({ reason: 'not-found' });
    expect(queue.isDrained()).toBe(true);
  });

  it('should reject an empty or malformed argument list', async () => {
    const queue = new PipeMessageQueue();
    await expect(runner.spawn([], queue)).rejects.toMatchObject({ reason: 'malformed-argv' });
    await expect(runner.spawn(['ffmpeg', 'a\0b'], queue)).rejects.toMatchObject({
      reason: 'malformed-argv',
    });
    await expect(runner.spawn(['ffmpeg', '&&'], queue)).rejects.toMatchObject({
      reason: 'malformed-argv',
    });
  });

  it('should kill a running child idempotently', async () => {
    const queue = new PipeMessageQueue();
    const handle = await runner.spawn([node, '-e', 'setTimeout(() => {}, 30000)'], queue);
    expect(handle.isAlive()).toBe(true);

    handle.kill();
    handle.kill();
    await handle.wait();

    expect(handle.isAlive()).toBe(false);
    handle.kill();
  });

  posixIt('should run a && chain in one process group and kill all of it', async () => {
    const queue = new PipeMessageQueue();
    const handle = await runner.spawn(
      [node, '-e', 'console.log("first")', '&&', node, '-e', 'console.log("second stage"); setTimeout(() => {}, 30000)'],
      queue
    );

    const first = await queue.pop(5000);
    expect(first?.data).toBe('first');
    const second = await queue.pop(5000);
    expect(second?.data).toBe('second stage');

    const started = Date.now();
    handle.kill();
    await handle.wait();
    expect(Date.now() - started).toBeLessThan(5000);
    expect(await collect(queue)).toEqual([]);
  });
});

describe('shell formatting', () => {
  posixIt('should quote only arguments that need it', () => {
    expect(quoteShellArg('/videos/clip.mp4')).toBe('/videos/clip.mp4');
    expect(quoteShellArg('[0:v][1:v] paletteuse')).toBe(`'[0:v][1:v] paletteuse'`);
    expect(quoteShellArg(`it's`)).toBe(`'it'\\''s'`);
  });

  posixIt('should leave the chain operator bare', () => {
    expect(formatCommand(['ffmpeg', '-i', 'my file.mp4', '&&', 'ffmpeg'])).toBe(
      `ffmpeg -i 'my file.mp4' && ffmpeg`
    );
  });
});
