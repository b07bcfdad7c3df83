/**
 * Tidy Manager
 *
 * Applies a chosen set of checks and clean-ups to each container directory.
 * Any file a slave container would delete is kept when the master still has
 * a video with the same stem.
 */

import { basename, join } from 'node:path';
import {
  AUDIO_FORMATS,
  COMPANION_SUFFIXES,
  IMAGE_FORMATS,
  SpawnFailedError,
  VIDEO_FORMATS,
  describeError,
  type CompanionKind,
  type Container,
  type Video,
} from '@reelkeeper/core';
import {
  compileThumbnailConversion,
  correctThumbnailFormat,
  findThumbnail,
} from '@reelkeeper/processing';
import { isFile, moveFile, removeFile, walkFiles } from '@reelkeeper/utils';
import { FFmpegCorruptionProbe, type CorruptionProbe, type ProbeVerdict } from './corruptionProbe.js';
import { OperationManager, type ChildOutcome, type OperationContext } from './operationManager.js';

export interface TidyChoices {
  corrupt: boolean;
  deleteCorrupt: boolean;
  exist: boolean;
  deleteVideo: boolean;
  /** With deleteVideo: also same-stem media left over from post-processing */
  deleteOthers: boolean;
  deleteArchive: boolean;
  moveThumb: boolean;
  deleteThumb: boolean;
  convertWebp: boolean;
  moveData: boolean;
  deleteDescription: boolean;
  deleteJson: boolean;
  deleteXml: boolean;
}

export const NO_TIDY_CHOICES: Readonly<TidyChoices> = Object.freeze({
  corrupt: false,
  deleteCorrupt: false,
  exist: false,
  deleteVideo: false,
  deleteOthers: false,
  deleteArchive: false,
  moveThumb: false,
  deleteThumb: false,
  convertWebp: false,
  moveData: false,
  deleteDescription: false,
  deleteJson: false,
  deleteXml: false,
});

export interface TidyTally {
  corruptCount: number;
  corruptDeletedCount: number;
  existCount: number;
  noExistCount: number;
  videoDeletedCount: number;
  otherDeletedCount: number;
  archiveDeletedCount: number;
  thumbMovedCount: number;
  thumbDeletedCount: number;
  webpConvertedCount: number;
  dataMovedCount: number;
  descriptionDeletedCount: number;
  jsonDeletedCount: number;
  xmlDeletedCount: number;
}

export interface TidyOptions {
  scope?: Container;
  probe?: CorruptionProbe;
}

const COMPANION_TALLY: Record<CompanionKind, 'descriptionDeletedCount' | 'jsonDeletedCount' | 'xmlDeletedCount'> = {
  description: 'descriptionDeletedCount',
  infoJson: 'jsonDeletedCount',
  annotations: 'xmlDeletedCount',
};

const FRAGMENT_PATTERN = new RegExp(
  `\\.f\\d+\\.(${VIDEO_FORMATS.map(ext => ext.slice(1)).join('|')})$`
);

export class TidyManager extends OperationManager<Container, TidyTally> {
  private readonly choices: TidyChoices;
  private readonly probe: CorruptionProbe;

  constructor(context: OperationContext, choices: Partial<TidyChoices>, options: TidyOptions = {}) {
    super(
      'tidy',
      context,
      options.scope ? context.registry.compileAllContainers(options.scope) : context.registry.bulkContainers(),
      {
        corruptCount: 0,
        corruptDeletedCount: 0,
        existCount: 0,
        noExistCount: 0,
        videoDeletedCount: 0,
        otherDeletedCount: 0,
        archiveDeletedCount: 0,
        thumbMovedCount: 0,
        thumbDeletedCount: 0,
        webpConvertedCount: 0,
        dataMovedCount: 0,
        descriptionDeletedCount: 0,
        jsonDeletedCount: 0,
        xmlDeletedCount: 0,
      },
      context.config.intervals.reconcileMs
    );

    this.choices = { ...NO_TIDY_CHOICES, ...choices };
    this.probe = options.probe
      ?? new FFmpegCorruptionProbe(context.config.binaries.ffmpeg.resolvedPath, context.config.probeTimeoutMs);
  }

  protected override async processItem(container: Container): Promise<void> {
    this.writeInfo(`Checking: '${container.name}'`);
    const videos = this.registry.childVideos(container).filter(video => video.fileName !== null);

    if (this.choices.corrupt) await this.checkCorrupt(videos);
    if (this.choices.exist) await this.checkExist(videos);
    if (this.choices.deleteVideo) await this.deleteVideos(container, videos);
    if (this.choices.deleteArchive) await this.deleteArchive(container);
    if (this.choices.moveThumb) await this.moveThumbs(videos);
    if (this.choices.deleteThumb) await this.deleteThumbs(container, videos);
    if (this.choices.convertWebp) await this.convertWebp(container, videos);
    if (this.choices.moveData) await this.moveData(videos);
    if (this.choices.deleteDescription) await this.deleteCompanions(container, videos, 'description');
    if (this.choices.deleteJson) await this.deleteCompanions(container, videos, 'infoJson');
    if (this.choices.deleteXml) await this.deleteCompanions(container, videos, 'annotations');
  }

  protected override describeItem(container: Container): string {
    return container.name;
  }

  protected override summarise(): string[] {
    const t = this.tally;
    const lines: string[] = [];
    if (this.choices.corrupt) {
      lines.push(`Video files checked for corruption: ${t.corruptCount} possibly corrupt, ${t.corruptDeletedCount} deleted`);
    }
    if (this.choices.exist) {
      lines.push(`Video files found: ${t.existCount}, missing: ${t.noExistCount}`);
    }
    if (this.choices.deleteVideo) {
      lines.push(`Video files deleted: ${t.videoDeletedCount}, other files deleted: ${t.otherDeletedCount}`);
    }
    if (this.choices.deleteArchive) lines.push(`Archive files deleted: ${t.archiveDeletedCount}`);
    if (this.choices.moveThumb) lines.push(`Thumbnail files moved: ${t.thumbMovedCount}`);
    if (this.choices.deleteThumb) lines.push(`Thumbnail files deleted: ${t.thumbDeletedCount}`);
    if (this.choices.convertWebp) lines.push(`WebP thumbnails converted: ${t.webpConvertedCount}`);
    if (this.choices.moveData) lines.push(`Metadata files moved: ${t.dataMovedCount}`);
    if (this.choices.deleteDescription) lines.push(`Description files deleted: ${t.descriptionDeletedCount}`);
    if (this.choices.deleteJson) lines.push(`Metadata (JSON) files deleted: ${t.jsonDeletedCount}`);
    if (this.choices.deleteXml) lines.push(`Annotation files deleted: ${t.xmlDeletedCount}`);
    return lines;
  }

  /**
   * The path, or null when a slave's file is still wanted by its master
   */
  private deletablePath(container: Container, video: Video, path: string | null): string | null {
    if (path === null || container.masterDbid === container.dbid) {
      return path;
    }
    const master = this.registry.getContainer(container.masterDbid);
    const shared = this.registry.childVideos(master).some(other => other.fileName === video.fileName);
    return shared ? null : path;
  }

  private async checkCorrupt(videos: Video[]): Promise<void> {
    for (const video of videos) {
      if (!this.runningFlag) return;
      const path = this.registry.getVideoPath(video);
      if (!video.dlFlag || path === null || !(await isFile(path))) continue;

      let verdict: ProbeVerdict;
      try {
        verdict = await this.probe.check(path, this.signal);
      } catch (error) {
        if (!(error instanceof SpawnFailedError)) throw error;
        // Without a decoder no further file can be checked
        this.writeError(describeError(error));
        this.choices.corrupt = false;
        return;
      }
      if (verdict === 'ok') continue;

      this.tally.corruptCount++;
      if (this.choices.deleteCorrupt && await removeFile(path)) {
        this.tally.corruptDeletedCount++;
        this.registry.markDownloaded(video, false);
        this.writeInfo(`   Deleted (possibly) corrupted video file: '${video.name}'`);
      } else {
        this.writeInfo(`   Video file might be corrupt: '${video.name}'`);
      }
    }
  }

  private async checkExist(videos: Video[]): Promise<void> {
    for (const video of videos) {
      const path = this.registry.getVideoPath(video);
      if (path === null) continue;
      const present = await isFile(path);

      if (!video.dlFlag && present) {
        this.registry.markDownloaded(video, true, true);
        this.tally.existCount++;
        this.writeInfo(`   Video file exists: '${video.name}'`);
      } else if (video.dlFlag && !present) {
        this.registry.markDownloaded(video, false);
        this.tally.noExistCount++;
        this.writeInfo(`   Video file doesn't exist: '${video.name}'`);
      }
    }
  }

  private async deleteVideos(container: Container, videos: Video[]): Promise<void> {
    for (const video of videos) {
      const path = this.deletablePath(container, video, this.registry.getVideoPath(video));
      if (path === null) continue;

      if (video.dlFlag && await removeFile(path)) {
        this.registry.markDownloaded(video, false);
        this.tally.videoDeletedCount++;
      }

      if (this.choices.deleteOthers) {
        for (const ext of [...VIDEO_FORMATS, ...AUDIO_FORMATS]) {
          const other = this.registry.getActualPathByExt(video, ext);
          if (other !== null && await removeFile(other)) {
            this.tally.otherDeletedCount++;
          }
        }
      }
    }

    // Fragments a merge left behind, e.g. 'NAME.f137.mp4'
    for (const path of await walkFiles(this.registry.getDefaultDir(container))) {
      if (FRAGMENT_PATTERN.test(basename(path)) && await removeFile(path)) {
        this.tally.otherDeletedCount++;
      }
    }
  }

  private async deleteArchive(container: Container): Promise<void> {
    const path = join(this.registry.getDefaultDir(container), this.config.layout.archiveFileName);
    if (await removeFile(path)) {
      this.tally.archiveDeletedCount++;
    }
  }

  private async moveThumbs(videos: Video[]): Promise<void> {
    for (const video of videos) {
      for (const ext of IMAGE_FORMATS) {
        const main = this.registry.getActualPathByExt(video, ext);
        const sub = this.registry.getSubdirPathByExt(video, ext);
        if (main === null || sub === null) continue;

        if (await isFile(main) && !(await isFile(sub))) {
          await moveFile(main, sub);
          this.tally.thumbMovedCount++;
          break;
        }
      }
    }
  }

  private async deleteThumbs(container: Container, videos: Video[]): Promise<void> {
    for (const video of videos) {
      const path = this.deletablePath(container, video, await findThumbnail(this.registry, video));
      if (path !== null && await removeFile(path)) {
        this.tally.thumbDeletedCount++;
      }
    }
  }

  private async convertWebp(container: Container, videos: Video[]): Promise<void> {
    const binary = this.config.binaries.ffmpeg.resolvedPath;

    for (const video of videos) {
      if (!this.runningFlag) return;
      const found = this.deletablePath(container, video, await findThumbnail(this.registry, video));
      if (found === null) continue;

      // A .jpg holding WebP data is renamed first
      const path = await correctThumbnailFormat(found);
      if (!path.endsWith('.webp')) continue;

      let outcome: ChildOutcome;
      try {
        outcome = await this.runChild(compileThumbnailConversion(binary, path), {});
      } catch (error) {
        if (!(error instanceof SpawnFailedError)) throw error;
        this.writeError(describeError(error));
        this.choices.convertWebp = false;
        return;
      }

      if (outcome.exitCode === 0) {
        await removeFile(path);
        this.tally.webpConvertedCount++;
      } else if (!outcome.killed) {
        this.writeError(outcome.lastError || `Could not convert thumbnail: ${path}`);
      }
    }
  }

  private async moveData(videos: Video[]): Promise<void> {
    for (const video of videos) {
      for (const suffix of Object.values(COMPANION_SUFFIXES)) {
        const main = this.registry.getActualPathByExt(video, suffix);
        const sub = this.registry.getSubdirPathByExt(video, suffix);
        if (main === null || sub === null) continue;

        if (await isFile(main) && !(await isFile(sub))) {
          await moveFile(main, sub);
          this.tally.dataMovedCount++;
        }
      }
    }
  }

  private async deleteCompanions(container: Container, videos: Video[], kind: CompanionKind): Promise<void> {
    const suffix = COMPANION_SUFFIXES[kind];
    const counter = COMPANION_TALLY[kind];

    for (const video of videos) {
      const candidates = [
        this.registry.getActualPathByExt(video, suffix),
        this.registry.getSubdirPathByExt(video, suffix),
      ];
      for (const candidate of candidates) {
        const path = this.deletablePath(container, video, candidate);
        if (path !== null && await removeFile(path)) {
          this.tally[counter]++;
        }
      }
    }
  }
}
