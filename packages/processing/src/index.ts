/**
 * @reelkeeper/processing
 *
 * Subprocess plumbing and FFmpeg command compilation:
 * - Line readers feeding a shared, ordered message queue
 * - Child process runner with process-group kill
 * - FFmpeg options recipes and the command compiler
 * - Thumbnail format correction
 */

// Pipe reading
export {
  PipeMessageQueue,
  PipeReader,
  type PipeMessage,
  type StreamTag,
  type PipeReaderOptions,
} from './pipeReader.js';

// Child processes
export {
  ChildProcessRunner,
  quoteShellArg,
  formatCommand,
  type ProcessHandle,
  type ProcessLauncher,
  type RunnerSpawnOptions,
} from './childProcessRunner.js';

// FFmpeg options
export {
  ffmpegOptionsSchema,
  createFFmpegOptions,
  cloneFFmpegOptions,
  tuningList,
  INPUT_MODES,
  OUTPUT_MODES,
  type FFmpegOptions,
  type FFmpegOptionsInput,
  type InputMode,
  type OutputMode,
} from './ffmpegOptions.js';

// Command Builder
export {
  FFmpegCommandBuilder,
  CHAIN_TOKEN,
  compileCommand,
  compileConcatCommand,
  concatListContents,
  keptSegments,
  transformFilename,
  resolveCommandInput,
  specimenInput,
  type ClipSpec,
  type CommandInput,
  type CompiledCommand,
  type VideoCodecOptions,
  type AudioCodecOptions,
  type InputOptions,
  type OutputOptions,
} from './commandBuilder.js';

// Thumbnails
export {
  sniffImageFormat,
  correctThumbnailFormat,
  findThumbnail,
  compileThumbnailConversion,
} from './thumbnail.js';

export { ClipTitleRegistry } from './clipTitles.js';
