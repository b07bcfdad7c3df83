import { describe, it, expect, beforeEach } from 'vitest';
import { MediaRegistry, type Channel, type Video } from '@reelkeeper/core';
import { reconcileDirectory, toDiskFile } from './reconcile.js';

const layout = { dataDir: '/archive', thumbsSubDir: '.thumbs', metadataSubDir: '.data' };

describe('reconcileDirectory', () => {
  let registry: MediaRegistry;
  let channel: Channel;

  const videoWithFile = (stem: string, ext: string, downloaded: boolean): Video => {
    const video = registry.createVideo(channel, stem);
    registry.setFile(video, stem, ext);
    registry.markDownloaded(video, downloaded);
    return video;
  };

  beforeEach(() => {
    registry = new MediaRegistry(layout);
    channel = registry.addChannel('Chan', 'https://example.com/c/chan');
  });

  it('should create one video per new stem and keep duplicates as alternates', () => {
    const vid2 = videoWithFile('vid2', '.mkv', true);

    const plan = reconcileDirectory(['vid1.mp4', 'vid1.webm', 'vid2.mkv'], [vid2]);

    expect(plan.created).toEqual([{ name: 'vid1.mp4', stem: 'vid1', ext: '.mp4' }]);
    expect(plan.alternates).toEqual([{ name: 'vid1.webm', stem: 'vid1', ext: '.webm' }]);
    expect(plan.matched).toEqual([
      { video: vid2, file: { name: 'vid2.mkv', stem: 'vid2', ext: '.mkv' }, extChanged: false },
    ]);
    expect(plan.missing).toEqual([]);
    expect(plan.skipped).toEqual([]);
  });

  it('should take the first listed file of a stem as the primary', () => {
    const plan = reconcileDirectory(['clip.webm', 'clip.mp4'], []);

    expect(plan.created.map(file => file.name)).toEqual(['clip.webm']);
    expect(plan.alternates.map(file => file.name)).toEqual(['clip.mp4']);
  });

  it('should flag an extension change', () => {
    const video = videoWithFile('talk', '.mkv', true);

    const plan = reconcileDirectory(['talk.mp4'], [video]);

    expect(plan.matched).toEqual([
      { video, file: { name: 'talk.mp4', stem: 'talk', ext: '.mp4' }, extChanged: true },
    ]);
  });

  it('should keep the extension when the own file is an alternate', () => {
    const video = videoWithFile('talk', '.webm', true);

    const plan = reconcileDirectory(['talk.mp4', 'talk.webm'], [video]);

    expect(plan.matched).toEqual([
      { video, file: { name: 'talk.webm', stem: 'talk', ext: '.webm' }, extChanged: false },
    ]);
    expect(plan.created).toEqual([]);
  });

  it('should skip stems claimed by a slave container', () => {
    const slave = registry.addPlaylist('Slave', 'https://example.com/p/slave');
    const claimed = registry.createVideo(slave, 'shared');
    registry.setFile(claimed, 'shared', '.mp4');

    const plan = reconcileDirectory(['shared.mp4', 'own.mp4'], [], [claimed]);

    expect(plan.skipped.map(file => file.name)).toEqual(['shared.mp4']);
    expect(plan.created.map(file => file.name)).toEqual(['own.mp4']);
  });

  it('should ignore files that are not media', () => {
    const plan = reconcileDirectory(['notes.txt', 'cover.jpg', 'talk.info.json'], []);

    expect(plan.created).toEqual([]);
    expect(plan.alternates).toEqual([]);
  });

  it('should report downloaded videos whose file is gone', () => {
    const gone = videoWithFile('gone', '.mp4', true);
    videoWithFile('never', '.mp4', false);

    const plan = reconcileDirectory([], registry.childVideos(channel));

    expect(plan.missing).toEqual([gone]);
  });
});

describe('toDiskFile', () => {
  it('should split on the last dot', () => {
    expect(toDiskFile('a.b.mp4')).toEqual({ name: 'a.b.mp4', stem: 'a.b', ext: '.mp4' });
  });
});
