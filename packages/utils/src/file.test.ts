import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { mkdtemp, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { isFile, moveFile } from './file.js';

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return { ...actual, rename: vi.fn(actual.rename) };
});

function errnoError(code: string): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(`${code}: rename failed`);
  error.code = code;
  return error;
}

describe('moveFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'reelkeeper-file-'));
    vi.mocked(rename).mockClear();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should rename into a new directory', async () => {
    await writeFile(join(dir, 'a.mp4'), 'video');

    await moveFile(join(dir, 'a.mp4'), join(dir, 'sub', 'b.mp4'));

    expect(await readFile(join(dir, 'sub', 'b.mp4'), 'utf-8')).toBe('video');
    expect(await isFile(join(dir, 'a.mp4'))).toBe(false);
  });

  it('should copy and remove the source across filesystems', async () => {
    await writeFile(join(dir, 'a.jpg'), 'thumb');
    vi.mocked(rename).mockRejectedValueOnce(errnoError('EXDEV'));

    await moveFile(join(dir, 'a.jpg'), join(dir, 'thumbs', 'a.jpg'));

    expect(rename).toHaveBeenCalledTimes(1);
    expect(await readFile(join(dir, 'thumbs', 'a.jpg'), 'utf-8')).toBe('thumb');
    expect(await isFile(join(dir, 'a.jpg'))).toBe(false);
  });

  it('should rethrow other rename errors', async () => {
    await writeFile(join(dir, 'a.jpg'), 'thumb');
    vi.mocked(rename).mockRejectedValueOnce(errnoError('EACCES'));

    await expect(moveFile(join(dir, 'a.jpg'), join(dir, 'b.jpg'))).rejects.toThrow('EACCES: rename failed');
    expect(await isFile(join(dir, 'a.jpg'))).toBe(true);
  });
});
