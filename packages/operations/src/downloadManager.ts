/**
 * Download Manager
 *
 * One downloader invocation per channel, playlist or video. Files the
 * downloader reports are matched to (or create) videos in the registry once
 * the invocation has exited, so every file is final by then.
 */

import { basename, join } from 'node:path';
import {
  SpawnFailedError,
  remoteSource,
  type Container,
  type MediaEntity,
  type Video,
} from '@reelkeeper/core';
import { getFileSizeBytes, isFile, splitFilename } from '@reelkeeper/utils';
import {
  classifyDownloaderStderr,
  isFormatFragment,
  parseDownloadLine,
  type DownloadEvent,
} from './downloadParser.js';
import { OperationManager, type ChildOutcome, type OperationContext } from './operationManager.js';

export interface DownloadTally {
  newCount: number;
  oldCount: number;
  warningCount: number;
  errorCount: number;
}

export interface DownloadOptions {
  /** Extra downloader arguments, placed before the URL */
  extraArgs?: readonly string[];
}

/**
 * A file the downloader reported, keyed by stem when collected
 */
interface ReportedFile {
  path: string;
  /** Already on disk before this run */
  old: boolean;
}

/**
 * Entities that can be downloaded, masters before the slaves that write
 * into their directories
 */
export function orderForDownload(entities: readonly MediaEntity[]): MediaEntity[] {
  const downloadable = entities.filter(entity => remoteSource(entity) !== null);
  const isSlave = (entity: MediaEntity): boolean =>
    entity.kind !== 'video' && entity.masterDbid !== entity.dbid;

  return [
    ...downloadable.filter(entity => !isSlave(entity)),
    ...downloadable.filter(isSlave),
  ];
}

export class DownloadManager extends OperationManager<MediaEntity, DownloadTally> {
  private readonly extraArgs: readonly string[];

  constructor(
    context: OperationContext,
    targets?: readonly MediaEntity[],
    options: DownloadOptions = {}
  ) {
    super(
      'download',
      context,
      orderForDownload(targets ?? context.registry.bulkContainers()),
      { newCount: 0, oldCount: 0, warningCount: 0, errorCount: 0 },
      context.config.intervals.subprocessMs
    );
    this.extraArgs = options.extraArgs ?? [];
  }

  protected override async prepare(): Promise<void> {
    this.writeInfo(`Starting download operation, ${this.jobTotal} item(s) to check`);
  }

  protected override async processItem(entity: MediaEntity): Promise<void> {
    const source = remoteSource(entity);
    if (source === null) return;

    const container = entity.kind === 'video' ? this.registry.getParent(entity) : entity;
    const dir = this.registry.getActualDir(container);
    this.writeInfo(`Downloading: '${entity.name}'`);

    const reported = new Map<string, ReportedFile>();
    let pending: string | null = null;
    let stderrSeen = false;

    const onEvent = (event: DownloadEvent): void => {
      switch (event.type) {
        case 'destination':
          pending = event.path;
          return;
        case 'completed':
          // A format fragment is not the finished video; the merge reports that
          if (pending !== null && !isFormatFragment(pending)) {
            report(reported, pending, false);
          }
          pending = null;
          return;
        case 'merged':
        case 'converted':
          report(reported, event.path, false);
          pending = null;
          return;
        case 'alreadyDownloaded':
          report(reported, event.path, true);
          pending = null;
          return;
        case 'playlistItem':
          this.writeInfo(`   Video ${event.index} of ${event.total}`);
          return;
        case 'archived':
          this.logger.debug({ id: event.id }, 'Already in download archive');
          return;
        case 'progress':
          return;
      }
    };

    let outcome: ChildOutcome;
    try {
      outcome = await this.runChild(this.compileDownloadCommand(dir, source), {
        stdout: line => {
          const event = parseDownloadLine(line);
          if (event !== null) onEvent(event);
        },
        stderr: line => {
          const text = line.trim();
          if (text === '') return;
          stderrSeen = this.handleStderr(text) || stderrSeen;
        },
      }, { ignoreFrom: /^ffmpeg version/ });
    } catch (error) {
      if (!(error instanceof SpawnFailedError)) throw error;
      this.tally.errorCount++;
      this.logger.warn({ err: error }, 'Downloader not started');
      this.writeError(error.message);
      return;
    }

    for (const [stem, file] of reported) {
      await this.confirmVideo(entity, container, stem, file);
    }

    if (!outcome.killed && outcome.exitCode !== 0 && !stderrSeen) {
      this.tally.errorCount++;
      this.writeError(`Downloader exited with code ${outcome.exitCode}`);
    }
  }

  protected override describeItem(entity: MediaEntity): string {
    return entity.name;
  }

  protected override summarise(): string[] {
    const t = this.tally;
    return [
      `New videos downloaded: ${t.newCount}`,
      `Videos already downloaded: ${t.oldCount}`,
      `Warnings: ${t.warningCount}, errors: ${t.errorCount}`,
    ];
  }

  compileDownloadCommand(dir: string, source: string): string[] {
    return [
      this.config.binaries.ytdl.resolvedPath,
      '--newline',
      '--download-archive', join(dir, this.config.layout.archiveFileName),
      '-o', join(dir, '%(title)s.%(ext)s'),
      ...this.extraArgs,
      source,
    ];
  }

  /**
   * True when the line counted as a warning or an error
   */
  private handleStderr(text: string): boolean {
    const kind = classifyDownloaderStderr(text);
    switch (kind) {
      case 'warning':
        this.tally.warningCount++;
        this.writeInfo(text);
        return true;
      case 'error':
        this.tally.errorCount++;
        this.writeError(text);
        return true;
      case 'debug':
      case 'ignorable':
        this.logger.debug({ kind, line: text }, 'Downloader stderr');
        return false;
    }
  }

  private async confirmVideo(
    entity: MediaEntity,
    container: Container,
    stem: string,
    file: ReportedFile
  ): Promise<void> {
    const { ext } = splitFilename(basename(file.path));
    const video = this.registry.findVideoByStem(container, stem) ?? this.newVideoFor(entity, container, stem);
    const wasDownloaded = video.dlFlag;

    this.registry.setFile(video, stem, ext);
    if (await isFile(file.path)) {
      video.fileSize = await getFileSizeBytes(file.path);
    }

    if (file.old) {
      this.tally.oldCount++;
      if (!wasDownloaded) this.registry.markDownloaded(video, true, true);
    } else {
      if (!wasDownloaded) this.tally.newCount++;
      this.registry.markDownloaded(video, true);
      this.writeInfo(`   New video: ${stem}`);
    }
  }

  /**
   * A single-video download fills in that video; otherwise a new one is made
   */
  private newVideoFor(entity: MediaEntity, container: Container, stem: string): Video {
    if (entity.kind === 'video' && entity.fileName === null) {
      return entity;
    }
    return this.registry.createVideo(container, stem);
  }
}

function report(files: Map<string, ReportedFile>, path: string, old: boolean): void {
  const { stem } = splitFilename(basename(path));
  const existing = files.get(stem);
  // A fresh download of a stem outranks an 'already downloaded' notice
  if (existing && !existing.old && old) return;
  files.set(stem, { path, old });
}
