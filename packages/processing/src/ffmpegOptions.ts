/**
 * FFmpeg Options
 *
 * One named conversion recipe. Validated when created; never mutated after.
 * Use `cloneFFmpegOptions` to derive a changed copy.
 */

import { z } from 'zod';
import { ValidationError } from '@reelkeeper/core';

export const INPUT_MODES = ['video', 'thumbnail'] as const;
export const OUTPUT_MODES = ['transcode', 'gif', 'merge', 'split', 'slice'] as const;
export const QUALITY_MODES = ['crf', 'abr'] as const;
export const GPU_ENCODINGS = [
  'libx264',
  'libx265',
  'h264_amf',
  'hevc_amf',
  'h264_nvenc',
  'hevc_nvenc',
] as const;
export const HW_ACCELS = ['none', 'auto', 'vdpau', 'dxva2', 'vaapi', 'qsv'] as const;
export const PATIENCE_PRESETS = [
  'ultrafast',
  'superfast',
  'veryfast',
  'faster',
  'fast',
  'medium',
  'slow',
  'slower',
  'veryslow',
] as const;
export const PALETTE_MODES = ['faster', 'better'] as const;
/** Where split/slice ranges come from: the video's own lists, or the recipe's */
export const RANGE_SOURCES = ['video', 'custom'] as const;

const regexSource = z.string().refine(value => {
  if (value === '') return true;
  try {
    new RegExp(value);
    return true;
  } catch {
    return false;
  }
}, 'not a valid regular expression');

export const ffmpegOptionsSchema = z.object({
  uid: z.number().int().nonnegative().default(0),
  name: z.string().min(1).default('default'),
  version: z.number().int().nonnegative().default(1),

  // Free-form arguments appended before the output file
  extraCmdString: z.string().default(''),

  // Output filename transforms
  addEndFilename: z.string().default(''),
  regexMatchFilename: regexSource.default(''),
  regexApplySubst: z.string().default(''),
  renameBothFlag: z.boolean().default(false),
  changeFileExt: z.string().regex(/^\.?[A-Za-z0-9]*$/, 'extension may only contain letters and digits').default(''),
  deleteOriginalFlag: z.boolean().default(false),

  inputMode: z.enum(INPUT_MODES).default('video'),
  outputMode: z.enum(OUTPUT_MODES).default('transcode'),

  audioFlag: z.boolean().default(true),
  audioBitrate: z.number().int().positive().default(128),

  qualityMode: z.enum(QUALITY_MODES).default('crf'),
  rateFactor: z.number().int().min(0).max(51).default(23),
  /** kbit/s, used by the two-pass mode */
  targetBitrate: z.number().int().nonnegative().default(0),
  /** First-pass output of the two-pass mode; 'output' reuses the real output path */
  dummyFile: z.string().min(1).default('output'),

  patiencePreset: z.enum(PATIENCE_PRESETS).default('medium'),
  gpuEncoding: z.enum(GPU_ENCODINGS).default('libx264'),
  hwAccel: z.enum(HW_ACCELS).default('none'),

  paletteMode: z.enum(PALETTE_MODES).default('faster'),

  splitMode: z.enum(RANGE_SOURCES).default('video'),
  splitList: z.array(z.object({
    start: z.string().min(1),
    stop: z.string().min(1).nullable().default(null),
    title: z.string().nullable().default(null),
  })).default([]),
  sliceMode: z.enum(RANGE_SOURCES).default('video'),
  sliceList: z.array(z.object({
    start: z.number().nonnegative(),
    stop: z.number().nonnegative().nullable().default(null),
  })).default([]),

  seekFlag: z.boolean().default(true),
  tuningFilmFlag: z.boolean().default(false),
  tuningAnimationFlag: z.boolean().default(false),
  tuningGrainFlag: z.boolean().default(false),
  tuningStillImageFlag: z.boolean().default(false),
  tuningFastDecodeFlag: z.boolean().default(false),
  tuningZeroLatencyFlag: z.boolean().default(false),
  profileFlag: z.boolean().default(false),
  fastStartFlag: z.boolean().default(true),

  limitFlag: z.boolean().default(false),
  limitMbps: z.number().positive().default(1),
  limitBuffer: z.number().positive().default(2),
}).strict();

export type FFmpegOptionsInput = z.input<typeof ffmpegOptionsSchema>;
export type FFmpegOptions = Readonly<z.output<typeof ffmpegOptionsSchema>>;
export type OutputMode = FFmpegOptions['outputMode'];
export type InputMode = FFmpegOptions['inputMode'];

/**
 * Validate a recipe. Throws ValidationError naming the first bad field.
 */
export function createFFmpegOptions(input: unknown = {}): FFmpegOptions {
  const parsed = ffmpegOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(
      issue?.path.join('.') || 'options',
      issue?.message ?? 'invalid FFmpeg options'
    );
  }
  return parsed.data;
}

/**
 * Deep copy, optionally with some fields changed (and re-validated)
 */
export function cloneFFmpegOptions(
  options: FFmpegOptions,
  changes: Partial<FFmpegOptionsInput> = {}
): FFmpegOptions {
  return createFFmpegOptions({ ...structuredClone(options), ...structuredClone(changes) });
}

/**
 * Tuning flags in the order they are passed to -tune
 */
export function tuningList(options: FFmpegOptions): string[] {
  const list: string[] = [];
  if (options.tuningFilmFlag) list.push('film');
  if (options.tuningAnimationFlag) list.push('animation');
  if (options.tuningGrainFlag) list.push('grain');
  if (options.tuningStillImageFlag) list.push('stillimage');
  if (options.tuningFastDecodeFlag) list.push('fastdecode');
  if (options.tuningZeroLatencyFlag) list.push('zerolatency');
  return list;
}
