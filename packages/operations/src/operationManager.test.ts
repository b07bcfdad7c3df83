import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DestinationConflictError, OperationState } from '@reelkeeper/core';
import {
  OperationManager,
  type OperationContext,
  type OperationProgress,
  type OperationResult,
} from './operationManager.js';
import { UpdateManager } from './updateManager.js';
import { FakeLauncher, testContext, type TestContext } from './testing.js';

interface ListTally {
  done: string[];
}

/** Handles plain string items; 'bad' fails the unit, 'conflict' halts the run */
class ListManager extends OperationManager<string, ListTally> {
  constructor(context: OperationContext, items: readonly string[]) {
    super('refresh', context, items, { done: [] }, 0);
  }

  protected override async processItem(item: string): Promise<void> {
    if (item === 'bad') throw new Error('bad item');
    if (item === 'conflict') throw new DestinationConflictError(item);
    this.tally.done.push(item);
  }

  protected override describeItem(item: string): string {
    return item;
  }

  protected override summarise(): string[] {
    return [`Done: ${this.tally.done.length}`];
  }
}

describe('OperationManager', () => {
  let dataDir: string;
  let ctx: TestContext;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'reelkeeper-operation-'));
    ctx = testContext(dataDir);
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it('should carry on past a failed unit', async () => {
    const manager = new ListManager(ctx, ['a', 'bad', 'b']);
    const progress: OperationProgress[] = [];
    manager.on('progress', (event: OperationProgress) => progress.push(event));

    const result = await manager.start();

    expect(result.state).toBe(OperationState.COMPLETED);
    expect(result.tally.done).toEqual(['a', 'b']);
    expect(result.jobCount).toBe(3);
    expect(result.error).toBeNull();
    expect(ctx.sink.errors).toEqual(['bad item']);
    expect(progress.map(event => `${event.label} ${event.jobCount}/${event.jobTotal}`)).toEqual([
      'a 1/3',
      'bad 2/3',
      'b 3/3',
    ]);
  });

  it('should halt on a fatal error', async () => {
    const manager = new ListManager(ctx, ['a', 'conflict', 'b']);

    const result = await manager.start();

    expect(result.state).toBe(OperationState.FATAL);
    expect(manager.getState()).toBe(OperationState.FATAL);
    expect(result.tally.done).toEqual(['a']);
    expect(result.jobCount).toBe(1);
    expect(result.error).toBe("A channel, playlist or folder called 'conflict' already exists");
    expect(ctx.sink.errors).toEqual(["A channel, playlist or folder called 'conflict' already exists"]);
    expect(ctx.sink.info).toEqual(['Done: 1', expect.stringMatching(/^Refresh operation halted \(/)]);
  });

  it('should emit finished once with the result', async () => {
    const manager = new ListManager(ctx, ['a']);
    const finished: OperationResult<ListTally>[] = [];
    manager.on('finished', (result: OperationResult<ListTally>) => finished.push(result));

    const result = await manager.start();

    expect(finished).toEqual([result]);
    expect(manager.isRunning()).toBe(false);
    expect(ctx.sink.calls[0]).toEqual({ method: 'updateProgress', label: 'a', done: 1, total: 1 });
    expect(ctx.sink.calls.at(-1)).toEqual({
      method: 'writeInfo',
      channel: 2,
      text: expect.stringMatching(/^Refresh operation finished \(/),
    });
  });

  it('should kill the active child when stopped', async () => {
    const launcher = new FakeLauncher(() => ({ hang: true }));
    ctx = testContext(dataDir, launcher);
    const manager = new UpdateManager(ctx);

    const running = manager.start();
    await vi.waitFor(() => expect(launcher.calls).toHaveLength(1));
    manager.stop();
    const result = await running;

    expect(result.state).toBe(OperationState.CANCELLED);
    expect(launcher.killCount).toBe(1);
    expect(ctx.sink.commands).toEqual(['pip3 install --upgrade yt-dlp']);
    expect(ctx.sink.calls.at(-1)).toEqual({
      method: 'writeInfo',
      channel: 4,
      text: expect.stringMatching(/^Update operation stopped \(/),
    });

    const callCount = ctx.sink.calls.length;
    manager.stop();
    expect(ctx.sink.calls).toHaveLength(callCount);
  });
});
