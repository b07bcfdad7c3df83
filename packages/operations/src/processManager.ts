/**
 * Process Manager
 *
 * Sends each queued video through one FFmpeg recipe. Transcode, GIF and
 * merge runs are one command per video; split runs one command per clip;
 * slice runs one command per kept piece and a final concat.
 */

import { writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import {
  FileMissingError,
  NonZeroExitError,
  SpawnFailedError,
  describeError,
  type ClipStamp,
  type Container,
  type Video,
} from '@reelkeeper/core';
import {
  ClipTitleRegistry,
  compileCommand,
  compileConcatCommand,
  concatListContents,
  findThumbnail,
  keptSegments,
  resolveCommandInput,
  type ClipSpec,
  type CommandInput,
  type CompiledCommand,
  type FFmpegOptions,
} from '@reelkeeper/processing';
import { ensureDir, getFileSizeBytes, isFile, moveFile, removeFile, splitFilename } from '@reelkeeper/utils';
import { OperationManager, type ChildOutcome, type OperationContext } from './operationManager.js';

export interface ProcessTally {
  successCount: number;
  failCount: number;
  /** Clips were added to the registry; views listing videos need a refresh */
  splitSuccessFlag: boolean;
}

export interface ProcessOptions {
  /** Put each video's clips in a new folder named after the video */
  clipFolder?: boolean;
}

export class ProcessManager extends OperationManager<Video, ProcessTally> {
  private readonly binary: string;
  private readonly genericTitle: string;
  private readonly titles: ClipTitleRegistry;

  constructor(
    context: OperationContext,
    videos: readonly Video[],
    private readonly recipe: FFmpegOptions,
    private readonly options: ProcessOptions = {}
  ) {
    super(
      'process',
      context,
      videos,
      { successCount: 0, failCount: 0, splitSuccessFlag: false },
      context.config.intervals.subprocessMs
    );

    this.binary = context.config.binaries.ffmpeg.resolvedPath;
    this.genericTitle = context.config.splitVideoGenericTitle;
    this.titles = new ClipTitleRegistry(this.genericTitle);
  }

  protected override async prepare(): Promise<void> {
    this.writeInfo(`Starting process operation, recipe '${this.recipe.name}'`);
  }

  protected override async processItem(video: Video): Promise<void> {
    this.writeInfo(`Video ${this.jobCount + 1}/${this.jobTotal}: ${video.name}`);

    const input = await resolveCommandInput(this.registry, video, this.recipe, this.binary);
    if (input === null) {
      this.fail(new FileMissingError(video.name, this.registry.getVideoPath(video)));
      return;
    }

    switch (this.recipe.outputMode) {
      case 'split':
        await this.splitVideo(video, input);
        return;
      case 'slice':
        await this.sliceVideo(video, input);
        return;
      case 'transcode':
      case 'gif':
      case 'merge':
        await this.convertVideo(video, input);
        return;
    }
  }

  protected override describeItem(video: Video): string {
    return video.name;
  }

  protected override summarise(): string[] {
    return [
      `Files processed: ${this.tally.successCount}`,
      `Files not processed: ${this.tally.failCount}`,
    ];
  }

  private fail(error: unknown): void {
    this.tally.failCount++;
    this.logger.warn({ err: error }, 'Video not processed');
    this.writeError(`      Output: FAILED: ${describeError(error)}`);
  }

  // ==========================================================================
  // Single output
  // ==========================================================================

  private async convertVideo(video: Video, input: CommandInput): Promise<void> {
    const command = compileCommand(this.recipe, input, undefined, this.genericTitle);
    if (command === null) {
      this.fail(new FileMissingError(video.name, input.videoPath));
      return;
    }

    if (!(await this.runCommand(command))) return;

    const { destPath, sourcePath } = command;
    const writesVideo = this.recipe.inputMode === 'video' && this.recipe.outputMode !== 'gif';

    if (writesVideo && destPath !== sourcePath) {
      if (this.recipe.deleteOriginalFlag && await isFile(destPath)) {
        await removeFile(sourcePath);
      }
      await this.reassignFile(video, destPath);
    }

    this.tally.successCount++;
    this.writeInfo(`      Output: ${destPath}`);
  }

  /**
   * Point the video at its new file, taking the thumbnail along when asked
   */
  private async reassignFile(video: Video, destPath: string): Promise<void> {
    const { stem, ext } = splitFilename(basename(destPath));

    if (video.dummyFlag) {
      video.dummyPath = destPath;
    } else {
      const oldStem = video.fileName;
      const thumbnail = this.recipe.renameBothFlag && oldStem !== stem
        ? await findThumbnail(this.registry, video)
        : null;

      this.registry.setFile(video, stem, ext);

      if (thumbnail !== null) {
        const { ext: thumbExt } = splitFilename(thumbnail);
        await moveFile(thumbnail, join(dirname(thumbnail), stem + thumbExt));
      }
    }

    video.fileSize = await getFileSizeBytes(destPath);
  }

  /**
   * Run one compiled command and settle its staging and intermediate files.
   * False when it failed or the run was stopped.
   */
  private async runCommand(command: CompiledCommand): Promise<boolean> {
    let outcome: ChildOutcome;
    try {
      outcome = await this.runChild(command.argv, {});
    } catch (error) {
      if (error instanceof SpawnFailedError) {
        this.fail(error);
        return false;
      }
      throw error;
    } finally {
      for (const path of command.intermediates) {
        await removeFile(path);
      }
    }

    if (outcome.killed) {
      if (command.stagingPath !== null) await removeFile(command.stagingPath);
      return false;
    }
    if (outcome.exitCode !== 0) {
      if (command.stagingPath !== null) await removeFile(command.stagingPath);
      this.fail(new NonZeroExitError(this.binary, outcome.exitCode, outcome.lastError));
      return false;
    }

    if (command.stagingPath !== null) {
      await moveFile(command.stagingPath, command.destPath);
    }
    return true;
  }

  // ==========================================================================
  // Split
  // ==========================================================================

  private async splitVideo(video: Video, input: CommandInput): Promise<void> {
    const stamps = this.recipe.splitMode === 'custom' ? this.recipe.splitList : video.stampList;
    if (stamps.length === 0) {
      this.fail(`No clip timestamps for '${video.name}'`);
      return;
    }

    let destination = this.registry.getParent(video);
    if (this.options.clipFolder) {
      // A name collision here is fatal and ends the run
      destination = this.registry.createFolder(video.name, { parent: destination });
      this.titles.reset();
    }
    const dir = this.options.clipFolder ? this.registry.getDefaultDir(destination) : null;
    if (dir !== null) {
      await ensureDir(dir);
    }

    for (const clip of clipSpans(stamps)) {
      if (!this.runningFlag) return;

      const spec: ClipSpec = { ...clip, title: this.titles.claim(clip.title), dir };
      const command = compileCommand(this.recipe, input, spec, this.genericTitle);
      if (command === null) {
        this.fail(new FileMissingError(video.name, input.videoPath));
        return;
      }
      // The rest of this video's clips are abandoned; other videos carry on
      if (!(await this.runCommand(command))) return;

      await this.registerClip(destination, command.destPath);
      this.tally.splitSuccessFlag = true;
      this.writeInfo(`      Clip: ${command.destPath}`);
    }

    this.tally.successCount++;
  }

  private async registerClip(container: Container, path: string): Promise<void> {
    const { stem, ext } = splitFilename(basename(path));
    const clip = this.registry.findVideoByStem(container, stem) ?? this.registry.createVideo(container, stem);
    this.registry.setFile(clip, stem, ext);
    clip.fileSize = await getFileSizeBytes(path);
    this.registry.markDownloaded(clip, true);
  }

  // ==========================================================================
  // Slice
  // ==========================================================================

  private async sliceVideo(video: Video, input: CommandInput): Promise<void> {
    const ranges = this.recipe.sliceMode === 'custom' ? this.recipe.sliceList : video.sliceList;
    const sourcePath = input.videoPath;
    if (ranges.length === 0 || sourcePath === null) {
      this.fail(`No slices to remove from '${video.name}'`);
      return;
    }

    const { stem, ext } = splitFilename(basename(sourcePath));
    const dir = dirname(sourcePath);
    const pieces: string[] = [];

    try {
      for (const [index, segment] of keptSegments(ranges).entries()) {
        if (!this.runningFlag) return;

        const spec: ClipSpec = { ...segment, title: `${stem}.part${index + 1}`, dir };
        const command = compileCommand(this.recipe, input, spec, this.genericTitle);
        if (command === null) {
          this.fail(new FileMissingError(video.name, sourcePath));
          return;
        }
        if (!(await this.runCommand(command))) return;
        pieces.push(command.destPath);
      }

      const listPath = join(dir, `${stem}.concat.txt`);
      await writeFile(listPath, concatListContents(pieces), 'utf-8');
      pieces.push(listPath);

      const stagingPath = join(dir, `${stem}.tmp${ext}`);
      const joined = await this.runCommand({
        sourcePath,
        destPath: sourcePath,
        argv: compileConcatCommand(this.binary, listPath, stagingPath),
        stagingPath,
        intermediates: [],
      });
      if (!joined) return;
    } finally {
      for (const piece of pieces) {
        await removeFile(piece);
      }
    }

    if (this.recipe.sliceMode === 'video') {
      // Those sections are gone from the file now
      video.sliceList = [];
    }
    video.fileSize = await getFileSizeBytes(sourcePath);
    this.tally.successCount++;
    this.writeInfo(`      Output: ${sourcePath}`);
  }
}

/**
 * Clips with their stops filled in: an open clip runs to the next one's start
 */
function clipSpans(stamps: readonly ClipStamp[]): Omit<ClipSpec, 'dir'>[] {
  return stamps.map((stamp, index) => ({
    start: stamp.start,
    stop: stamp.stop ?? stamps[index + 1]?.start ?? null,
    title: stamp.title,
  }));
}
