import { describe, it, expect } from 'vitest';
import { sleep, formatDuration } from './time.js';

describe('sleep', () => {
  it('should return early when the signal is aborted', async () => {
    const controller = new AbortController();
    const started = Date.now();
    setTimeout(() => controller.abort(), 20);

    await sleep(5000, controller.signal);

    expect(Date.now() - started).toBeLessThan(2000);
  });

  it('should resolve immediately for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(sleep(5000, controller.signal)).resolves.toBeUndefined();
  });
});

describe('formatDuration', () => {
  it('should format milliseconds, seconds and minutes', () => {
    expect(formatDuration(250)).toBe('250ms');
    expect(formatDuration(42000)).toBe('42s');
    expect(formatDuration(125000)).toBe('2m 5s');
    expect(formatDuration(3723000)).toBe('1h 2m 3s');
  });
});
