import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { MediaRegistry, type Video } from '@reelkeeper/core';
import { isFile } from '@reelkeeper/utils';
import {
  FFmpegCommandBuilder,
  compileCommand,
  compileConcatCommand,
  concatListContents,
  keptSegments,
  resolveCommandInput,
  specimenInput,
  transformFilename,
  type CommandInput,
} from './commandBuilder.js';
import { createFFmpegOptions } from './ffmpegOptions.js';

const input: CommandInput = {
  binary: 'ffmpeg',
  videoPath: '/v/a.mp4',
  thumbnailPath: null,
  audioPath: null,
  specimen: false,
};

describe('FFmpegCommandBuilder', () => {
  it('should order global, input, codec and output arguments', () => {
    const args = new FFmpegCommandBuilder()
      .addGlobalArg('-y')
      .addInput('in.mkv', { hwaccel: 'auto' })
      .setVideoCodec({ codec: 'libx264', preset: 'fast', crf: 20 })
      .setAudioCodec({ codec: 'aac', bitrate: '96k' })
      .setOutputOptions({ movflags: 'faststart' })
      .setOutput('out.mp4')
      .build();

    expect(args).toEqual([
      '-y', '-hwaccel', 'auto', '-i', 'in.mkv',
      '-c:v', 'libx264', '-preset', 'fast', '-crf', '20',
      '-c:a', 'aac', '-b:a', '96k',
      '-movflags', 'faststart',
      'out.mp4',
    ]);
  });

  it('should drop video filters on a stream copy', () => {
    const args = new FFmpegCommandBuilder()
      .addInput('in.mkv')
      .setVideoCodec('copy')
      .addVideoFilter('scale=640:-1')
      .setOutput('out.mkv')
      .build();

    expect(args).toEqual(['-i', 'in.mkv', '-c:v', 'copy', 'out.mkv']);
  });

  it('should require an output file', () => {
    expect(() => new FFmpegCommandBuilder().addInput('in.mkv').build()).toThrow('Output file not specified');
  });
});

describe('compileCommand', () => {
  it('should be deterministic', () => {
    const options = createFFmpegOptions({ changeFileExt: 'mkv' });
    expect(compileCommand(options, input)).toEqual(compileCommand(options, input));
  });

  it('should compile a single-pass transcode into a staging file when names collide', () => {
    const compiled = compileCommand(createFFmpegOptions(), input);

    expect(compiled).toEqual({
      sourcePath: '/v/a.mp4',
      destPath: '/v/a.mp4',
      stagingPath: '/v/a.tmp.mp4',
      intermediates: [],
      argv: [
        'ffmpeg', '-y', '-i', '/v/a.mp4',
        '-c:v', 'libx264', '-preset', 'medium', '-crf', '23',
        '-x264-params', 'keyint=15', '-vsync', '2', '-enc_time_base', '-1',
        '-c:a', 'aac', '-b:a', '128k',
        '-movflags', 'faststart',
        '/v/a.tmp.mp4',
      ],
    });
  });

  it('should chain two passes for average bitrate mode', () => {
    const options = createFFmpegOptions({
      qualityMode: 'abr',
      targetBitrate: 800,
      hwAccel: 'vaapi',
      seekFlag: false,
      fastStartFlag: false,
      audioFlag: false,
      changeFileExt: 'mkv',
      limitFlag: true,
      limitMbps: 2,
      limitBuffer: 3,
      profileFlag: true,
      tuningFilmFlag: true,
      extraCmdString: '-threads 2',
    });

    const video = (pass: string): string[] => [
      '-c:v', 'libx264', '-preset', 'medium', '-b:v', '800k', '-pass', pass,
      '-maxrate', '2M', '-bufsize', '6M', '-profile:v', 'baseline', '-level', '3.0',
      '-tune', 'film', '-vsync', '2', '-enc_time_base', '-1',
    ];

    const compiled = compileCommand(options, input);

    expect(compiled?.argv).toEqual([
      'ffmpeg', '-y', '-hwaccel', 'vaapi', '-i', '/v/a.mp4', ...video('1'), '-f', 'mp4', '/v/a.mkv',
      '&&',
      'ffmpeg', '-y', '-hwaccel', 'vaapi', '-i', '/v/a.mp4', ...video('2'), '-threads', '2', '/v/a.mkv',
    ]);
    expect(compiled?.stagingPath).toBeNull();
    expect(compiled?.intermediates).toEqual([]);
  });

  it('should write the first pass to a named dummy file', () => {
    const options = createFFmpegOptions({ qualityMode: 'abr', targetBitrate: 500, dummyFile: 'pass.mp4', changeFileExt: 'mkv' });
    const compiled = compileCommand(options, input);

    expect(compiled?.argv).toContain('/v/pass.mp4');
    expect(compiled?.intermediates).toEqual(['/v/pass.mp4']);
  });

  it('should leave an absolute dummy file alone', () => {
    for (const dummyFile of ['/dev/null', '/home/user/keep.mp4']) {
      const options = createFFmpegOptions({ qualityMode: 'abr', targetBitrate: 800, dummyFile, changeFileExt: 'mkv' });
      const compiled = compileCommand(options, input);
      const argv = compiled?.argv ?? [];

      expect(argv[argv.indexOf('&&') - 1]).toBe(dummyFile);
      expect(compiled?.intermediates).toEqual([]);
    }
  });

  it('should omit the profile when the rate factor is zero', () => {
    const options = createFFmpegOptions({ profileFlag: true, rateFactor: 0, changeFileExt: 'mkv' });
    expect(compileCommand(options, input)?.argv).not.toContain('-profile:v');
  });

  it('should compile a fast GIF', () => {
    const compiled = compileCommand(createFFmpegOptions({ outputMode: 'gif' }), input);

    expect(compiled?.argv).toEqual(['ffmpeg', '-y', '-i', '/v/a.mp4', '/v/a.gif']);
    expect(compiled?.destPath).toBe('/v/a.gif');
  });

  it('should compile a palette GIF in two stages', () => {
    const compiled = compileCommand(createFFmpegOptions({ outputMode: 'gif', paletteMode: 'better' }), input);

    expect(compiled?.argv).toEqual([
      'ffmpeg', '-y', '-i', '/v/a.mp4', '-vf', 'palettegen', '/v/a.palette.png',
      '&&',
      'ffmpeg', '-y', '-i', '/v/a.mp4', '-i', '/v/a.palette.png',
      '-filter_complex', '[0:v][1:v] paletteuse', '/v/a.gif',
    ]);
    expect(compiled?.intermediates).toEqual(['/v/a.palette.png']);
  });

  it('should merge companion audio with stream copy', () => {
    const options = createFFmpegOptions({ outputMode: 'merge' });

    expect(compileCommand(options, input)).toBeNull();
    expect(compileCommand(options, { ...input, audioPath: '/v/a.m4a' })?.argv).toEqual([
      'ffmpeg', '-y', '-i', '/v/a.mp4', '-i', '/v/a.m4a', '-c:v', 'copy', '-c:a', 'copy', '/v/a.tmp.mp4',
    ]);
  });

  it('should trim one clip per split entry', () => {
    const options = createFFmpegOptions({ outputMode: 'split' });

    expect(compileCommand(options, input, { start: '0:10', stop: '0:20', title: 'Intro', dir: null })?.argv).toEqual([
      'ffmpeg', '-y', '-i', '/v/a.mp4', '-ss', '0:10', '-to', '0:20', '/v/Intro.mp4',
    ]);
    expect(compileCommand(options, input, { start: '1:00', stop: null, title: null, dir: '/clips' })?.destPath)
      .toBe('/clips/clip.mp4');
  });

  it('should apply suffix before the regex rename and the extension last', () => {
    const options = createFFmpegOptions({
      addEndFilename: '_x  ',
      regexMatchFilename: '_',
      regexApplySubst: '-',
      changeFileExt: '.MKV',
    });

    const compiled = compileCommand(options, { ...input, videoPath: '/v/a_b.mp4' });

    expect(transformFilename('a_b', options)).toBe('a-b-x');
    expect(compiled?.destPath).toBe('/v/a-b-x.mkv');
    expect(compiled?.stagingPath).toBeNull();
  });

  it('should convert a thumbnail without video encoder settings', () => {
    const options = createFFmpegOptions({ inputMode: 'thumbnail', changeFileExt: 'png', hwAccel: 'auto' });
    const compiled = compileCommand(options, { ...input, thumbnailPath: '/v/a.jpg' });

    expect(compiled?.argv).toEqual(['ffmpeg', '-y', '-i', '/v/a.jpg', '/v/a.png']);
    expect(compiled?.destPath).toBe('/v/a.png');
  });

  it('should return null without a thumbnail in thumbnail mode', () => {
    expect(compileCommand(createFFmpegOptions({ inputMode: 'thumbnail' }), input)).toBeNull();
  });

  it('should produce bare placeholder names for a specimen', () => {
    const split = compileCommand(createFFmpegOptions({ outputMode: 'split' }), specimenInput('ffmpeg'));
    expect(split?.argv).toEqual(['ffmpeg', '-y', '-i', 'source.ext', '-ss', '0:00', 'clip.ext']);

    const slice = compileCommand(createFFmpegOptions({ outputMode: 'slice' }), specimenInput('ffmpeg'));
    expect(slice?.argv).toEqual(['ffmpeg', '-y', '-i', 'source.ext', '-ss', '0', 'clip.ext']);

    const gif = compileCommand(createFFmpegOptions({ outputMode: 'gif' }), specimenInput('ffmpeg'));
    expect(gif?.argv).toEqual(['ffmpeg', '-y', '-i', 'source.ext', 'source.gif']);
    expect(gif?.stagingPath).toBeNull();
  });
});

describe('slice helpers', () => {
  it('should keep the pieces between removed ranges', () => {
    expect(keptSegments([{ start: 30, stop: null }, { start: 10, stop: 20 }])).toEqual([
      { start: '0', stop: '10' },
      { start: '20', stop: '30' },
    ]);
    expect(keptSegments([{ start: 0, stop: 5 }])).toEqual([{ start: '5', stop: null }]);
  });

  it('should compile the concat step', () => {
    expect(compileConcatCommand('ffmpeg', '/v/list.txt', '/v/out.mp4')).toEqual([
      'ffmpeg', '-y', '-f', 'concat', '-safe', '0', '-i', '/v/list.txt', '-c', 'copy', '/v/out.mp4',
    ]);
    expect(concatListContents(['/v/a b.mp4', "/v/it's.mp4"])).toBe(
      "file '/v/a b.mp4'\nfile '/v/it'\\''s.mp4'\n"
    );
  });
});

describe('resolveCommandInput', () => {
  let dataDir: string;
  let registry: MediaRegistry;
  let video: Video;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'reelkeeper-cmd-'));
    registry = new MediaRegistry({ dataDir, thumbsSubDir: '.thumbs', metadataSubDir: '.data' });
    const channel = registry.addChannel('Chan', 'https://example.com/c');
    video = registry.createVideo(channel, 'First');
    registry.setFile(video, 'first', '.mp4');
    await mkdir(join(dataDir, 'Chan'), { recursive: true });
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it('should refuse a video that is not downloaded or missing', async () => {
    const options = createFFmpegOptions();
    expect(await resolveCommandInput(registry, video, options, 'ffmpeg')).toBeNull();

    registry.markDownloaded(video, true);
    expect(await resolveCommandInput(registry, video, options, 'ffmpeg')).toBeNull();
  });

  it('should find the video, its thumbnail and companion audio', async () => {
    registry.markDownloaded(video, true);
    await writeFile(join(dataDir, 'Chan', 'first.mp4'), 'video');
    await writeFile(join(dataDir, 'Chan', 'first.m4a'), 'audio');
    await mkdir(join(dataDir, 'Chan', '.thumbs'));
    await writeFile(join(dataDir, 'Chan', '.thumbs', 'first.webp'), 'image');

    const resolved = await resolveCommandInput(registry, video, createFFmpegOptions({ outputMode: 'merge' }), 'ffmpeg');

    expect(resolved).toEqual({
      binary: 'ffmpeg',
      videoPath: join(dataDir, 'Chan', 'first.mp4'),
      thumbnailPath: join(dataDir, 'Chan', '.thumbs', 'first.webp'),
      audioPath: join(dataDir, 'Chan', 'first.m4a'),
      specimen: false,
    });
  });

  it('should give a mislabelled thumbnail its real extension', async () => {
    registry.markDownloaded(video, true);
    await writeFile(join(dataDir, 'Chan', 'first.mp4'), 'video');
    const webp = Buffer.concat([Buffer.from('RIFF'), Buffer.from([0x10, 0, 0, 0]), Buffer.from('WEBPVP8 ')]);
    await writeFile(join(dataDir, 'Chan', 'first.jpg'), webp);

    const resolved = await resolveCommandInput(registry, video, createFFmpegOptions({ inputMode: 'thumbnail' }), 'ffmpeg');

    expect(resolved?.thumbnailPath).toBe(join(dataDir, 'Chan', 'first.webp'));
    expect(await isFile(join(dataDir, 'Chan', 'first.jpg'))).toBe(false);
  });

  it('should refuse merge mode without companion audio', async () => {
    registry.markDownloaded(video, true);
    await writeFile(join(dataDir, 'Chan', 'first.mp4'), 'video');

    expect(await resolveCommandInput(registry, video, createFFmpegOptions({ outputMode: 'merge' }), 'ffmpeg')).toBeNull();
  });
});
