import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SpawnFailedError, type Channel, type Video } from '@reelkeeper/core';
import { isFile } from '@reelkeeper/utils';
import type { CorruptionProbe } from './corruptionProbe.js';
import { TidyManager } from './tidyManager.js';
import { FakeLauncher, testContext, type TestContext } from './testing.js';

describe('TidyManager', () => {
  let dataDir: string;
  let ctx: TestContext;
  let channel: Channel;
  let dir: string;

  const addVideo = (stem: string, downloaded: boolean): Video => {
    const video = ctx.registry.createVideo(channel, stem);
    ctx.registry.setFile(video, stem, '.mp4');
    ctx.registry.markDownloaded(video, downloaded);
    return video;
  };

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'reelkeeper-tidy-'));
    ctx = testContext(dataDir);
    channel = ctx.registry.addChannel('Chan', 'https://example.com/c/chan');
    dir = join(dataDir, 'Chan');
    await mkdir(dir);
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  describe('shared files', () => {
    it('should keep a slave file the master still uses', async () => {
      const slave = ctx.registry.addPlaylist('Slave', 'https://example.com/p/slave');
      ctx.registry.setMasterDestination(slave, channel);
      addVideo('shared', true);
      const slaveShared = ctx.registry.createVideo(slave, 'shared');
      ctx.registry.setFile(slaveShared, 'shared', '.mp4');
      const slaveSolo = ctx.registry.createVideo(slave, 'solo');
      ctx.registry.setFile(slaveSolo, 'solo', '.mp4');

      await writeFile(join(dir, 'shared.description'), 'text');
      await writeFile(join(dir, 'solo.description'), 'text');

      const result = await new TidyManager(ctx, { deleteDescription: true }, { scope: slave }).start();

      expect(await isFile(join(dir, 'shared.description'))).toBe(true);
      expect(await isFile(join(dir, 'solo.description'))).toBe(false);
      expect(result.tally.descriptionDeletedCount).toBe(1);
    });

    it('should delete the file from the master itself', async () => {
      addVideo('shared', true);
      await writeFile(join(dir, 'shared.description'), 'text');

      const result = await new TidyManager(ctx, { deleteDescription: true }, { scope: channel }).start();

      expect(await isFile(join(dir, 'shared.description'))).toBe(false);
      expect(result.tally.descriptionDeletedCount).toBe(1);
    });
  });

  it('should reconcile downloaded flags with the files present', async () => {
    const present = addVideo('present', false);
    const absent = addVideo('absent', true);
    await writeFile(join(dir, 'present.mp4'), 'video');

    const result = await new TidyManager(ctx, { exist: true }).start();

    expect(present.dlFlag).toBe(true);
    expect(present.newFlag).toBe(false);
    expect(absent.dlFlag).toBe(false);
    expect(result.tally.existCount).toBe(1);
    expect(result.tally.noExistCount).toBe(1);
    expect(ctx.sink.info).toContain("   Video file exists: 'present'");
    expect(ctx.sink.info).toContain("   Video file doesn't exist: 'absent'");
  });

  it('should delete files the probe finds corrupt', async () => {
    const bad = addVideo('bad', true);
    addVideo('good', true);
    await writeFile(join(dir, 'bad.mp4'), 'broken');
    await writeFile(join(dir, 'good.mp4'), 'fine');

    const probe: CorruptionProbe = {
      check: async path => (path.endsWith('bad.mp4') ? 'corrupt' : 'ok'),
    };
    const result = await new TidyManager(ctx, { corrupt: true, deleteCorrupt: true }, { probe }).start();

    expect(await isFile(join(dir, 'bad.mp4'))).toBe(false);
    expect(await isFile(join(dir, 'good.mp4'))).toBe(true);
    expect(bad.dlFlag).toBe(false);
    expect(result.tally.corruptCount).toBe(1);
    expect(result.tally.corruptDeletedCount).toBe(1);
    expect(ctx.sink.info).toContain("   Deleted (possibly) corrupted video file: 'bad'");
  });

  it('should count a probe timeout as possibly corrupt', async () => {
    addVideo('slow', true);
    await writeFile(join(dir, 'slow.mp4'), 'data');

    const probe: CorruptionProbe = { check: async () => 'timeout' };
    const result = await new TidyManager(ctx, { corrupt: true }, { probe }).start();

    expect(result.tally.corruptCount).toBe(1);
    expect(await isFile(join(dir, 'slow.mp4'))).toBe(true);
    expect(ctx.sink.info).toContain("   Video file might be corrupt: 'slow'");
  });

  it('should stop probing once the decoder cannot be started', async () => {
    addVideo('one', true);
    addVideo('two', true);
    await writeFile(join(dir, 'one.mp4'), 'data');
    await writeFile(join(dir, 'two.mp4'), 'data');

    let calls = 0;
    const probe: CorruptionProbe = {
      check: async () => {
        calls++;
        throw new SpawnFailedError('ffmpeg', 'not-found');
      },
    };
    const result = await new TidyManager(ctx, { corrupt: true }, { probe }).start();

    expect(calls).toBe(1);
    expect(result.tally.corruptCount).toBe(0);
    expect(ctx.sink.errors).toEqual(['Failed to start ffmpeg: executable not found']);
  });

  it('should delete videos with their leftovers', async () => {
    const video = addVideo('a', true);
    await writeFile(join(dir, 'a.mp4'), 'video');
    await writeFile(join(dir, 'a.m4a'), 'audio');
    await writeFile(join(dir, 'a.f137.mp4'), 'fragment');
    await writeFile(join(dir, 'keep.txt'), 'other');

    const result = await new TidyManager(ctx, { deleteVideo: true, deleteOthers: true }).start();

    expect(video.dlFlag).toBe(false);
    expect(result.tally.videoDeletedCount).toBe(1);
    expect(result.tally.otherDeletedCount).toBe(2);
    expect(await isFile(join(dir, 'a.f137.mp4'))).toBe(false);
    expect(await isFile(join(dir, 'keep.txt'))).toBe(true);
  });

  it('should delete the download archive', async () => {
    await writeFile(join(dir, 'ytdl-archive.txt'), 'youtube abc\n');

    const result = await new TidyManager(ctx, { deleteArchive: true }).start();

    expect(result.tally.archiveDeletedCount).toBe(1);
    expect(await isFile(join(dir, 'ytdl-archive.txt'))).toBe(false);
  });

  it('should move thumbnails and metadata into their sub-directories', async () => {
    addVideo('a', true);
    await writeFile(join(dir, 'a.jpg'), 'image');
    await writeFile(join(dir, 'a.info.json'), '{}');

    const result = await new TidyManager(ctx, { moveThumb: true, moveData: true }).start();

    expect(await isFile(join(dir, '.thumbs', 'a.jpg'))).toBe(true);
    expect(await isFile(join(dir, '.data', 'a.info.json'))).toBe(true);
    expect(result.tally.thumbMovedCount).toBe(1);
    expect(result.tally.dataMovedCount).toBe(1);
  });

  it('should convert WebP thumbnails to JPEG', async () => {
    const launcher = new FakeLauncher(argv => ({
      effect: async () => {
        const output = argv[argv.length - 1];
        if (output !== undefined) await writeFile(output, 'jpeg');
      },
    }));
    ctx = { ...ctx, launcher };
    addVideo('a', true);
    await writeFile(join(dir, 'a.webp'), Buffer.from('RIFF\0\0\0\0WEBPVP8 ', 'latin1'));

    const result = await new TidyManager(ctx, { convertWebp: true }).start();

    expect(launcher.calls).toEqual([
      ['ffmpeg', '-y', '-i', join(dir, 'a.webp'), join(dir, 'a.jpg')],
    ]);
    expect(result.tally.webpConvertedCount).toBe(1);
    expect(await isFile(join(dir, 'a.webp'))).toBe(false);
    expect(await isFile(join(dir, 'a.jpg'))).toBe(true);
  });

  it('should write a summary line per chosen check', async () => {
    await new TidyManager(ctx, { deleteArchive: true, deleteJson: true }).start();

    expect(ctx.sink.info).toEqual([
      "Checking: 'Chan'",
      'Archive files deleted: 0',
      'Metadata (JSON) files deleted: 0',
      expect.stringMatching(/^Tidy operation finished \(/),
    ]);
  });
});
