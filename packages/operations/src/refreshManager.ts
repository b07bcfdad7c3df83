/**
 * Refresh Manager
 *
 * Brings the registry in line with what is on disk, one container per unit.
 * Containers that write somewhere else (a slave, or an external directory)
 * only have their downloaded flags corrected; nothing is created for them.
 */

import { join } from 'node:path';
import { entityLabel, type Container, type Video } from '@reelkeeper/core';
import { getFileSizeBytes, isDirectory, listFiles } from '@reelkeeper/utils';
import { OperationManager, type OperationContext } from './operationManager.js';
import { reconcileDirectory } from './reconcile.js';

export interface RefreshTally {
  /** Media files looked at */
  totalCount: number;
  matchCount: number;
  newCount: number;
  missingCount: number;
  alternateCount: number;
}

export interface RefreshOptions {
  /** Only this container and the containers below it */
  scope?: Container;
}

export class RefreshManager extends OperationManager<Container, RefreshTally> {
  private readonly scopeName: string | null;

  constructor(context: OperationContext, options: RefreshOptions = {}) {
    const worklist = options.scope
      ? context.registry.compileAllContainers(options.scope)
      : context.registry.bulkContainers();

    super(
      'refresh',
      context,
      worklist,
      { totalCount: 0, matchCount: 0, newCount: 0, missingCount: 0, alternateCount: 0 },
      context.config.intervals.reconcileMs
    );

    this.scopeName = options.scope?.name ?? null;
  }

  protected override async prepare(): Promise<void> {
    this.writeInfo(
      this.scopeName === null
        ? 'Starting refresh operation, analysing whole database'
        : `Starting refresh operation, analysing '${this.scopeName}'`
    );
  }

  protected override async processItem(container: Container): Promise<void> {
    this.writeInfo(`${entityLabel(container)}: ${container.name}`);

    if (container.externalDir !== null || container.masterDbid !== container.dbid) {
      await this.refreshFlagsOnly(container);
    } else {
      await this.refreshDefaultDir(container);
    }
  }

  protected override describeItem(container: Container): string {
    return container.name;
  }

  protected override summarise(): string[] {
    return [
      `Number of video files analysed: ${this.tally.totalCount}`,
      `Video files already in the database: ${this.tally.matchCount}`,
      `New videos found and added to the database: ${this.tally.newCount}`,
      `Videos marked as missing: ${this.tally.missingCount}`,
    ];
  }

  private async refreshDefaultDir(container: Container): Promise<void> {
    const dir = this.registry.getDefaultDir(container);
    if (!(await isDirectory(dir))) {
      this.logger.debug({ dir }, 'Directory unreadable, skipping');
      return;
    }
    const fileNames = await listFiles(dir);

    const slaveVideos = container.slaveDbidList.flatMap(dbid =>
      this.registry.childVideos(this.registry.getContainer(dbid))
    );
    const plan = reconcileDirectory(fileNames, this.registry.childVideos(container), slaveVideos);

    for (const { video, file, extChanged } of plan.matched) {
      if (!video.dlFlag) {
        this.registry.markDownloaded(video, true);
      }
      if (extChanged) {
        this.registry.setFile(video, file.stem, file.ext);
      }
      video.fileSize = await getFileSizeBytes(join(dir, file.name));
    }

    for (const file of plan.created) {
      const video = this.registry.createVideo(container, file.stem);
      this.registry.setFile(video, file.stem, file.ext);
      video.fileSize = await getFileSizeBytes(join(dir, file.name));
      this.registry.markDownloaded(video, true);
      this.writeInfo(`   New video: ${file.stem}`);
    }

    for (const video of plan.missing) {
      this.registry.markDownloaded(video, false);
    }

    const total = plan.matched.length + plan.created.length;
    this.tally.totalCount += total;
    this.tally.matchCount += plan.matched.length;
    this.tally.newCount += plan.created.length;
    this.tally.missingCount += plan.missing.length;
    this.tally.alternateCount += plan.alternates.length;

    this.writeInfo(
      `   Total videos: ${total}, matched: ${plan.matched.length}, new: ${plan.created.length}`
    );
  }

  private async refreshFlagsOnly(container: Container): Promise<void> {
    const dir = this.registry.getActualDir(container);
    if (!(await isDirectory(dir))) {
      this.logger.debug({ dir }, 'Directory unreadable, skipping');
      return;
    }
    const present = new Set(await listFiles(dir));
    let matched = 0;
    let missing = 0;

    for (const video of this.registry.childVideos(container)) {
      const fileName = ownFileName(video);
      if (fileName === null) continue;

      if (video.dlFlag && !present.has(fileName)) {
        missing++;
        this.registry.markDownloaded(video, false);
        this.writeInfo(`      Missing: ${video.name}`);
      } else if (!video.dlFlag && present.has(fileName)) {
        matched++;
        this.registry.markDownloaded(video, true, true);
      }
    }

    this.tally.totalCount += matched;
    this.tally.matchCount += matched;
    this.tally.missingCount += missing;

    this.writeInfo(`   Total videos: ${matched}, matched: ${matched}, missing: ${missing}`);
  }
}

function ownFileName(video: Video): string | null {
  if (video.fileName === null || video.fileExt === null) return null;
  return video.fileName + video.fileExt;
}
