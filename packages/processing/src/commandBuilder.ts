/**
 * FFmpeg Command Builder
 *
 * Fluent API for building one FFmpeg invocation, plus the compiler that
 * turns an FFmpegOptions recipe and a source into the full argument vector
 * (possibly several invocations chained with `&&`).
 *
 * Compilation is pure: the same options and input always give the same argv.
 * Filesystem checks live in `resolveCommandInput`.
 */

import { basename, dirname, join } from 'node:path';
import { AUDIO_FORMATS, type MediaRegistry, type SliceRange, type Video } from '@reelkeeper/core';
import { isFile, parseOptionString, splitFilename } from '@reelkeeper/utils';
import { tuningList, type FFmpegOptions } from './ffmpegOptions.js';
import { correctThumbnailFormat, findThumbnail } from './thumbnail.js';

export interface InputOptions {
  hwaccel?: string;       // -hwaccel (before -i)
  extraArgs?: string[];   // Additional input args
}

export interface OutputOptions {
  seekTo?: string;        // -ss
  stopAt?: string;        // -to
  format?: string;        // -f format
  movflags?: string;      // -movflags for mp4
  extraArgs?: string[];   // Additional output args
}

export interface VideoCodecOptions {
  codec: string;
  preset?: string;
  crf?: number;
  bitrate?: string;
  pass?: 1 | 2;
  maxrate?: string;
  bufsize?: string;
  profile?: string;
  level?: string;
  tune?: string;
  extraArgs?: string[];
}

export interface AudioCodecOptions {
  codec: string;
  bitrate?: string;
}

export interface FilterGraph {
  video?: string[];
  complex?: string;
}

export class FFmpegCommandBuilder {
  private inputs: { file: string; options: InputOptions }[] = [];
  private videoCodec: VideoCodecOptions | null = null;
  private audioCodec: AudioCodecOptions | null = null;
  private filters: FilterGraph = {};
  private outputOpts: OutputOptions = {};
  private outputFile: string = '';
  private globalArgs: string[] = [];

  /**
   * Add global arguments (before inputs)
   */
  addGlobalArg(...args: string[]): this {
    this.globalArgs.push(...args);
    return this;
  }

  /**
   * Add input file
   */
  addInput(file: string, options: InputOptions = {}): this {
    this.inputs.push({ file, options });
    return this;
  }

  /**
   * Set video codec (copy = no re-encode)
   */
  setVideoCodec(options: VideoCodecOptions | 'copy'): this {
    this.videoCodec = options === 'copy' ? { codec: 'copy' } : options;
    return this;
  }

  /**
   * Set audio codec (copy = no re-encode)
   */
  setAudioCodec(options: AudioCodecOptions | 'copy'): this {
    this.audioCodec = options === 'copy' ? { codec: 'copy' } : options;
    return this;
  }

  addVideoFilter(filter: string): this {
    if (!this.filters.video) this.filters.video = [];
    this.filters.video.push(filter);
    return this;
  }

  setComplexFilter(filterGraph: string): this {
    this.filters.complex = filterGraph;
    return this;
  }

  setOutputOptions(options: OutputOptions): this {
    this.outputOpts = { ...this.outputOpts, ...options };
    return this;
  }

  setOutput(file: string): this {
    this.outputFile = file;
    return this;
  }

  /**
   * Build the command arguments array (without the binary)
   */
  build(): string[] {
    const args: string[] = [];

    // Global args
    args.push(...this.globalArgs);

    // Inputs
    for (const input of this.inputs) {
      if (input.options.hwaccel) {
        args.push('-hwaccel', input.options.hwaccel);
      }
      if (input.options.extraArgs) {
        args.push(...input.options.extraArgs);
      }
      args.push('-i', input.file);
    }

    if (this.filters.complex) {
      args.push('-filter_complex', this.filters.complex);
    }

    // Video codec
    if (this.videoCodec) {
      args.push('-c:v', this.videoCodec.codec);

      if (this.videoCodec.codec !== 'copy') {
        if (this.videoCodec.preset) args.push('-preset', this.videoCodec.preset);
        if (this.videoCodec.crf !== undefined) args.push('-crf', this.videoCodec.crf.toString());
        if (this.videoCodec.bitrate) args.push('-b:v', this.videoCodec.bitrate);
        if (this.videoCodec.pass !== undefined) args.push('-pass', this.videoCodec.pass.toString());
        if (this.videoCodec.maxrate) args.push('-maxrate', this.videoCodec.maxrate);
        if (this.videoCodec.bufsize) args.push('-bufsize', this.videoCodec.bufsize);
        if (this.videoCodec.profile) args.push('-profile:v', this.videoCodec.profile);
        if (this.videoCodec.level) args.push('-level', this.videoCodec.level);
        if (this.videoCodec.tune) args.push('-tune', this.videoCodec.tune);
        if (this.videoCodec.extraArgs) args.push(...this.videoCodec.extraArgs);
      }
    }

    // Video filters are meaningless on a stream copy
    if (this.filters.video && this.filters.video.length > 0 && this.videoCodec?.codec !== 'copy') {
      args.push('-vf', this.filters.video.join(','));
    }

    // Audio codec
    if (this.audioCodec) {
      args.push('-c:a', this.audioCodec.codec);
      if (this.audioCodec.codec !== 'copy' && this.audioCodec.bitrate) {
        args.push('-b:a', this.audioCodec.bitrate);
      }
    }

    // Output options
    if (this.outputOpts.seekTo !== undefined) {
      args.push('-ss', this.outputOpts.seekTo);
    }
    if (this.outputOpts.stopAt !== undefined) {
      args.push('-to', this.outputOpts.stopAt);
    }
    if (this.outputOpts.format) {
      args.push('-f', this.outputOpts.format);
    }
    if (this.outputOpts.movflags) {
      args.push('-movflags', this.outputOpts.movflags);
    }
    if (this.outputOpts.extraArgs) {
      args.push(...this.outputOpts.extraArgs);
    }

    if (!this.outputFile) {
      throw new Error('Output file not specified');
    }
    args.push(this.outputFile);

    return args;
  }

  /**
   * Full argv with the binary in front
   */
  buildArgv(binary: string): string[] {
    return [binary, ...this.build()];
  }

  clone(): FFmpegCommandBuilder {
    const cloned = new FFmpegCommandBuilder();
    cloned.inputs = this.inputs.map(input => ({ file: input.file, options: { ...input.options } }));
    cloned.videoCodec = this.videoCodec ? { ...this.videoCodec } : null;
    cloned.audioCodec = this.audioCodec ? { ...this.audioCodec } : null;
    cloned.filters = { ...this.filters, video: this.filters.video ? [...this.filters.video] : undefined };
    cloned.outputOpts = { ...this.outputOpts };
    cloned.outputFile = this.outputFile;
    cloned.globalArgs = [...this.globalArgs];
    return cloned;
  }
}

// ============================================================================
// Recipe compilation
// ============================================================================

export interface CommandInput {
  binary: string;
  videoPath: string | null;
  thumbnailPath: string | null;
  /** Companion audio for merge mode */
  audioPath: string | null;
  /** Placeholder paths for the options preview; outputs are bare file names */
  specimen: boolean;
}

/**
 * One clip of a split or slice run. `dir` overrides the source directory.
 */
export interface ClipSpec {
  start: string;
  stop: string | null;
  title: string | null;
  dir: string | null;
}

export interface CompiledCommand {
  sourcePath: string;
  /** Where the result ends up once the command (and any rename) is done */
  destPath: string;
  argv: string[];
  /** Set when destPath equals sourcePath; FFmpeg writes here instead */
  stagingPath: string | null;
  /** Files the command creates on the way (palette, first-pass dummy) */
  intermediates: string[];
}

export const CHAIN_TOKEN = '&&';

/**
 * Compile a recipe against one source. Returns null when there is nothing
 * to convert (no source for the input mode, or no audio to merge).
 */
export function compileCommand(
  options: FFmpegOptions,
  input: CommandInput,
  clip?: ClipSpec,
  genericTitle: string = 'clip'
): CompiledCommand | null {
  const sourcePath = options.inputMode === 'video' ? input.videoPath : input.thumbnailPath;
  if (sourcePath === null) {
    return null;
  }

  const audioPath = input.audioPath;
  if (options.outputMode === 'merge' && audioPath === null) {
    return null;
  }

  const sourceDir = dirname(sourcePath);
  const { stem, ext } = splitFilename(basename(sourcePath));
  const outputName = transformFilename(stem, options);
  const place = (dir: string, file: string): string => (input.specimen ? file : join(dir, file));
  const extraArgs = parseOptionString(options.extraCmdString);
  const staging = (destPath: string): string | null =>
    input.specimen ? null : stagingPathFor(sourcePath, destPath);

  const base = new FFmpegCommandBuilder().addGlobalArg('-y');
  const mode = options.outputMode;

  switch (mode) {
    case 'transcode': {
      const destPath = place(sourceDir, outputName + overrideExtension(ext, options));
      const stagingPath = staging(destPath);
      const target = stagingPath ?? destPath;

      // Images take no video encoder settings
      if (options.inputMode === 'thumbnail') {
        const argv = base
          .addInput(sourcePath)
          .setOutputOptions({ extraArgs })
          .setOutput(target)
          .buildArgv(input.binary);
        return { sourcePath, destPath, argv, stagingPath, intermediates: [] };
      }

      const builder = base.addInput(sourcePath, options.hwAccel === 'none' ? {} : { hwaccel: options.hwAccel });
      const videoCodec = transcodeVideoCodec(options);
      if (options.inputMode === 'video' && options.audioFlag) {
        builder.setAudioCodec({ codec: 'aac', bitrate: `${options.audioBitrate}k` });
      }
      if (options.fastStartFlag) {
        builder.setOutputOptions({ movflags: 'faststart' });
      }

      if (options.qualityMode === 'crf') {
        const argv = builder
          .setVideoCodec({ ...videoCodec, crf: options.rateFactor })
          .setOutputOptions({ extraArgs })
          .setOutput(target)
          .buildArgv(input.binary);
        return { sourcePath, destPath, argv, stagingPath, intermediates: [] };
      }

      // Two-pass average bitrate: both passes share the first-pass dummy.
      // A bare file name goes beside the source and is removed afterwards;
      // other paths (e.g. /dev/null) are used as given and left alone.
      const dummyBesideSource = options.dummyFile !== 'output' && basename(options.dummyFile) === options.dummyFile;
      const dummyPath = options.dummyFile === 'output'
        ? target
        : (input.specimen || !dummyBesideSource ? options.dummyFile : join(sourceDir, options.dummyFile));
      const bitrate = `${options.targetBitrate}k`;

      const firstPass = builder.clone()
        .setVideoCodec({ ...videoCodec, bitrate, pass: 1 })
        .setOutputOptions({ format: 'mp4' })
        .setOutput(dummyPath);
      const secondPass = builder.clone()
        .setVideoCodec({ ...videoCodec, bitrate, pass: 2 })
        .setOutputOptions({ extraArgs })
        .setOutput(target);

      return {
        sourcePath,
        destPath,
        argv: [...firstPass.buildArgv(input.binary), CHAIN_TOKEN, ...secondPass.buildArgv(input.binary)],
        stagingPath,
        intermediates: dummyBesideSource && !input.specimen ? [dummyPath] : [],
      };
    }

    case 'gif': {
      const destPath = place(sourceDir, `${outputName}.gif`);
      const stagingPath = staging(destPath);
      const target = stagingPath ?? destPath;

      if (options.paletteMode === 'faster') {
        const argv = base
          .addInput(sourcePath)
          .setOutputOptions({ extraArgs })
          .setOutput(target)
          .buildArgv(input.binary);
        return { sourcePath, destPath, argv, stagingPath, intermediates: [] };
      }

      const palettePath = place(sourceDir, `${outputName}.palette.png`);
      const paletteGen = base.clone()
        .addInput(sourcePath)
        .addVideoFilter('palettegen')
        .setOutput(palettePath);
      const paletteUse = base.clone()
        .addInput(sourcePath)
        .addInput(palettePath)
        .setComplexFilter('[0:v][1:v] paletteuse')
        .setOutputOptions({ extraArgs })
        .setOutput(target);

      return {
        sourcePath,
        destPath,
        argv: [...paletteGen.buildArgv(input.binary), CHAIN_TOKEN, ...paletteUse.buildArgv(input.binary)],
        stagingPath,
        intermediates: [palettePath],
      };
    }

    case 'merge': {
      if (audioPath === null) {
        return null;
      }
      const destPath = place(sourceDir, outputName + overrideExtension(ext, options));
      const stagingPath = staging(destPath);
      const argv = base
        .addInput(sourcePath)
        .addInput(audioPath)
        .setVideoCodec('copy')
        .setAudioCodec('copy')
        .setOutput(stagingPath ?? destPath)
        .buildArgv(input.binary);
      return { sourcePath, destPath, argv, stagingPath, intermediates: [] };
    }

    case 'split':
    case 'slice': {
      const spec = clip ?? { start: mode === 'split' ? '0:00' : '0', stop: null, title: null, dir: null };
      const title = spec.title === null || spec.title === '' ? genericTitle : spec.title;
      const destPath = place(spec.dir ?? sourceDir, title + ext);
      const stagingPath = staging(destPath);
      const argv = base
        .addInput(sourcePath)
        .setOutputOptions(spec.stop === null ? { seekTo: spec.start } : { seekTo: spec.start, stopAt: spec.stop })
        .setOutput(stagingPath ?? destPath)
        .buildArgv(input.binary);
      return { sourcePath, destPath, argv, stagingPath, intermediates: [] };
    }

    default:
      return assertUnreachable(mode);
  }
}

function assertUnreachable(mode: never): never {
  throw new Error(`Unhandled output mode: ${String(mode)}`);
}

function transcodeVideoCodec(options: FFmpegOptions): VideoCodecOptions {
  const tunings = tuningList(options);
  const codec: VideoCodecOptions = {
    codec: options.gpuEncoding,
    preset: options.patiencePreset,
    extraArgs: [
      ...(options.seekFlag ? ['-x264-params', 'keyint=15'] : []),
      '-vsync', '2',
      '-enc_time_base', '-1',
    ],
  };

  if (tunings.length > 0) {
    codec.tune = tunings.join(',');
  }
  if (options.profileFlag && options.rateFactor !== 0) {
    codec.profile = 'baseline';
    codec.level = '3.0';
  }
  if (options.limitFlag) {
    codec.maxrate = `${options.limitMbps}M`;
    codec.bufsize = `${options.limitMbps * options.limitBuffer}M`;
  }
  return codec;
}

/**
 * Apply the name transforms in fixed order: suffix, regex rename, (extension
 * is handled separately by the caller)
 */
export function transformFilename(stem: string, options: FFmpegOptions): string {
  let name = stem;

  const suffix = options.addEndFilename.replace(/\s+$/, '');
  if (suffix !== '') {
    name += suffix;
  }

  if (options.regexMatchFilename !== '') {
    name = name.replace(new RegExp(options.regexMatchFilename, 'g'), options.regexApplySubst);
  }

  return name;
}

function overrideExtension(sourceExt: string, options: FFmpegOptions): string {
  const override = options.changeFileExt.toLowerCase().replace(/^\./, '');
  return override === '' ? sourceExt : `.${override}`;
}

function stagingPathFor(sourcePath: string, destPath: string): string | null {
  if (sourcePath !== destPath) {
    return null;
  }
  const { stem, ext } = splitFilename(sourcePath);
  return join(dirname(sourcePath), `${stem}.tmp${ext}`);
}

/**
 * Joins slice-mode pieces back into one file
 */
export function compileConcatCommand(binary: string, listPath: string, outputPath: string): string[] {
  return [binary, '-y', '-f', 'concat', '-safe', '0', '-i', listPath, '-c', 'copy', outputPath];
}

/**
 * Contents of a concat demuxer list file
 */
export function concatListContents(paths: readonly string[]): string {
  return paths.map(path => `file '${path.replace(/'/g, `'\\''`)}'\n`).join('');
}

/**
 * The pieces kept when the given ranges are cut out of a video, as clips
 * in seconds. A range without a stop removes everything after its start.
 */
export function keptSegments(ranges: readonly SliceRange[]): { start: string; stop: string | null }[] {
  const sorted = [...ranges].sort((a, b) => a.start - b.start);
  const kept: { start: string; stop: string | null }[] = [];
  let cursor = 0;

  for (const range of sorted) {
    if (range.start > cursor) {
      kept.push({ start: String(cursor), stop: String(range.start) });
    }
    if (range.stop === null) {
      return kept;
    }
    cursor = Math.max(cursor, range.stop);
  }

  kept.push({ start: String(cursor), stop: null });
  return kept;
}

// ============================================================================
// Source resolution
// ============================================================================

/**
 * Find the files a recipe would read for a video. Returns null when there is
 * nothing to convert: unknown path, missing file, video not downloaded, no
 * thumbnail in thumbnail mode, no same-stem audio in merge mode.
 */
export async function resolveCommandInput(
  registry: MediaRegistry,
  video: Video,
  options: FFmpegOptions,
  binary: string
): Promise<CommandInput | null> {
  let videoPath: string | null;

  if (video.dummyFlag) {
    if (video.dummyPath === null) return null;
    videoPath = video.dummyPath;
    if (options.inputMode === 'video' && !(await isFile(videoPath))) return null;
  } else {
    if (video.fileName === null) return null;
    videoPath = registry.getVideoPath(video);
    if (videoPath === null) return null;
    if (options.inputMode === 'video' && (!video.dlFlag || !(await isFile(videoPath)))) return null;
  }

  const found = await findThumbnail(registry, video);
  if (found === null && options.inputMode === 'thumbnail') {
    return null;
  }
  const thumbnailPath = found === null ? null : await correctThumbnailFormat(found);

  let audioPath: string | null = null;
  if (options.outputMode === 'merge') {
    const { stem } = splitFilename(videoPath);
    for (const audioExt of AUDIO_FORMATS) {
      const candidate = join(dirname(videoPath), stem + audioExt);
      if (await isFile(candidate)) {
        audioPath = candidate;
        break;
      }
    }
    if (audioPath === null) return null;
  }

  return { binary, videoPath, thumbnailPath, audioPath, specimen: false };
}

/**
 * Placeholder input for previewing a recipe without a video
 */
export function specimenInput(binary: string): CommandInput {
  return {
    binary,
    videoPath: 'source.ext',
    thumbnailPath: 'source.jpg',
    audioPath: 'source.ext',
    specimen: true,
  };
}
