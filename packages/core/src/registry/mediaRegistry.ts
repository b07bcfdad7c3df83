/**
 * Media Registry
 *
 * In-memory entity graph (videos, channels, playlists, folders) plus the path
 * rules that map it onto the archive directory. Mutated only from a manager's
 * own run loop.
 */

import { join } from 'node:path';
import { dottedExtension, removeFile } from '@reelkeeper/utils';
import { DestinationConflictError, NotFoundError } from '../errors/index.js';
import { COMPANION_SUFFIXES, IMAGE_FORMATS, isImageExtension } from '../formats.js';
import {
  assertNever,
  isContainer,
  type Channel,
  type Container,
  type Dbid,
  type Folder,
  type MediaEntity,
  type Playlist,
  type Video,
} from '../types/media.js';

export interface RegistryLayout {
  dataDir: string;
  thumbsSubDir: string;
  metadataSubDir: string;
}

export interface NewContainerOptions {
  parent?: Container | null;
  privFlag?: boolean;
  externalDir?: string | null;
}

export class MediaRegistry {
  private readonly entities = new Map<Dbid, MediaEntity>();
  private readonly rootList: Dbid[] = [];
  private nextDbid = 1;

  constructor(readonly layout: RegistryLayout) {}

  // ==========================================================================
  // Lookup
  // ==========================================================================

  get size(): number {
    return this.entities.size;
  }

  get(dbid: Dbid): MediaEntity | undefined {
    return this.entities.get(dbid);
  }

  getVideo(dbid: Dbid): Video {
    const entity = this.entities.get(dbid);
    if (!entity || entity.kind !== 'video') {
      throw new NotFoundError('Video', String(dbid));
    }
    return entity;
  }

  getContainer(dbid: Dbid): Container {
    const entity = this.entities.get(dbid);
    if (!entity || !isContainer(entity)) {
      throw new NotFoundError('Container', String(dbid));
    }
    return entity;
  }

  getParent(video: Video): Container {
    return this.getContainer(video.parentDbid);
  }

  findContainerByName(name: string): Container | undefined {
    for (const entity of this.entities.values()) {
      if (isContainer(entity) && entity.name === name) {
        return entity;
      }
    }
    return undefined;
  }

  /**
   * The child video of `container` whose file stem is `stem`
   */
  findVideoByStem(container: Container, stem: string): Video | undefined {
    for (const video of this.childVideos(container)) {
      if (video.fileName === stem) {
        return video;
      }
    }
    return undefined;
  }

  /**
   * Direct child videos, in child-list order
   */
  childVideos(container: Container): Video[] {
    const result: Video[] = [];
    for (const dbid of container.childList) {
      const child = this.entities.get(dbid);
      if (child?.kind === 'video') {
        result.push(child);
      }
    }
    return result;
  }

  /**
   * Every video below a container, depth first
   */
  compileAllVideos(container: Container): Video[] {
    const result: Video[] = [];
    for (const dbid of container.childList) {
      const child = this.entities.get(dbid);
      if (!child) continue;
      if (child.kind === 'video') {
        result.push(child);
      } else {
        result.push(...this.compileAllVideos(child));
      }
    }
    return result;
  }

  /**
   * A container followed by all of its descendant containers, pre-order
   */
  compileAllContainers(container: Container): Container[] {
    const result: Container[] = [container];
    for (const dbid of container.childList) {
      const child = this.entities.get(dbid);
      if (child && isContainer(child)) {
        result.push(...this.compileAllContainers(child));
      }
    }
    return result;
  }

  /**
   * Every container reachable from the top level, skipping private ones
   * (and their descendants)
   */
  bulkContainers(): Container[] {
    const result: Container[] = [];
    const visit = (dbid: Dbid): void => {
      const entity = this.entities.get(dbid);
      if (!entity || !isContainer(entity) || entity.privFlag) return;
      result.push(entity);
      entity.childList.forEach(visit);
    };
    this.rootList.forEach(visit);
    return result;
  }

  topLevel(): Container[] {
    return this.rootList.map(dbid => this.getContainer(dbid));
  }

  // ==========================================================================
  // Creation
  // ==========================================================================

  addChannel(name: string, source: string, options: NewContainerOptions = {}): Channel {
    const channel: Channel = { kind: 'channel', ...this.containerFields(name, options), source };
    return this.attachContainer(channel, options.parent ?? null);
  }

  addPlaylist(name: string, source: string, options: NewContainerOptions = {}): Playlist {
    const playlist: Playlist = { kind: 'playlist', ...this.containerFields(name, options), source };
    return this.attachContainer(playlist, options.parent ?? null);
  }

  /**
   * Throws DestinationConflictError when any container already has the name
   */
  createFolder(name: string, options: NewContainerOptions = {}): Folder {
    const folder: Folder = { kind: 'folder', ...this.containerFields(name, options) };
    return this.attachContainer(folder, options.parent ?? null);
  }

  createVideo(container: Container, name: string): Video {
    const video: Video = {
      kind: 'video',
      dbid: this.nextDbid++,
      name,
      parentDbid: container.dbid,
      source: null,
      fileName: null,
      fileExt: null,
      fileSize: null,
      dlFlag: false,
      newFlag: false,
      dummyFlag: false,
      dummyPath: null,
      stampList: [],
      sliceList: [],
    };
    this.entities.set(video.dbid, video);
    container.childList.push(video.dbid);
    return video;
  }

  private containerFields(name: string, options: NewContainerOptions): Omit<Folder, 'kind'> {
    if (this.findContainerByName(name)) {
      throw new DestinationConflictError(name);
    }
    const dbid = this.nextDbid++;
    return {
      dbid,
      name,
      parentDbid: options.parent?.dbid ?? null,
      childList: [],
      masterDbid: dbid,
      slaveDbidList: [],
      privFlag: options.privFlag ?? false,
      externalDir: options.externalDir ?? null,
    };
  }

  private attachContainer<T extends Container>(container: T, parent: Container | null): T {
    this.entities.set(container.dbid, container);
    if (parent) {
      parent.childList.push(container.dbid);
    } else {
      this.rootList.push(container.dbid);
    }
    return container;
  }

  // ==========================================================================
  // Mutation
  // ==========================================================================

  /**
   * Set or clear the downloaded flag. A newly downloaded video is also marked
   * new unless `suppressNew`; a video that is no longer downloaded is never new.
   */
  markDownloaded(video: Video, flag: boolean, suppressNew: boolean = false): void {
    video.dlFlag = flag;
    if (!flag) {
      video.newFlag = false;
    } else if (!suppressNew) {
      video.newFlag = true;
    }
  }

  setFile(video: Video, stem: string, ext: string): void {
    video.fileName = stem;
    video.fileExt = dottedExtension(ext);
  }

  /**
   * Make `master`'s directory the download destination of `container`.
   * Passing the container itself restores its own directory.
   */
  setMasterDestination(container: Container, master: Container): void {
    const previous = this.get(container.masterDbid);
    if (previous && isContainer(previous) && previous !== container) {
      previous.slaveDbidList = previous.slaveDbidList.filter(dbid => dbid !== container.dbid);
    }

    container.masterDbid = master.dbid;
    if (master !== container && !master.slaveDbidList.includes(container.dbid)) {
      master.slaveDbidList.push(container.dbid);
    }
  }

  /**
   * Remove an entity (and, for containers, everything below it).
   * With `deleteFiles`, a video's file and companion files go too.
   */
  async deleteEntity(entity: MediaEntity, deleteFiles: boolean = false): Promise<void> {
    switch (entity.kind) {
      case 'video': {
        if (deleteFiles) {
          await this.deleteVideoFiles(entity);
        }
        const parent = this.get(entity.parentDbid);
        if (parent && isContainer(parent)) {
          parent.childList = parent.childList.filter(dbid => dbid !== entity.dbid);
        }
        this.entities.delete(entity.dbid);
        return;
      }
      case 'channel':
      case 'playlist':
      case 'folder': {
        for (const dbid of [...entity.childList]) {
          const child = this.entities.get(dbid);
          if (child) {
            await this.deleteEntity(child, deleteFiles);
          }
        }
        for (const slaveDbid of entity.slaveDbidList) {
          const slave = this.get(slaveDbid);
          if (slave && isContainer(slave)) {
            slave.masterDbid = slave.dbid;
          }
        }
        this.setMasterDestination(entity, entity);

        const parent = entity.parentDbid === null ? undefined : this.get(entity.parentDbid);
        if (parent && isContainer(parent)) {
          parent.childList = parent.childList.filter(dbid => dbid !== entity.dbid);
        } else {
          const index = this.rootList.indexOf(entity.dbid);
          if (index >= 0) this.rootList.splice(index, 1);
        }
        this.entities.delete(entity.dbid);
        return;
      }
      default:
        assertNever(entity);
    }
  }

  private async deleteVideoFiles(video: Video): Promise<void> {
    const path = this.getVideoPath(video);
    if (path) {
      await removeFile(path);
    }
    if (video.fileName === null) return;

    const suffixes = [...Object.values(COMPANION_SUFFIXES), ...IMAGE_FORMATS];
    for (const suffix of suffixes) {
      const main = this.getActualPathByExt(video, suffix);
      const sub = this.getSubdirPathByExt(video, suffix);
      if (main) await removeFile(main);
      if (sub) await removeFile(sub);
    }
  }

  // ==========================================================================
  // Paths
  // ==========================================================================

  /**
   * The directory a container owns: its external directory if it has one,
   * otherwise the chain of container names below the data directory
   */
  getDefaultDir(container: Container): string {
    if (container.externalDir) {
      return container.externalDir;
    }

    const names: string[] = [];
    let current: Container | undefined = container;
    while (current) {
      names.unshift(current.name);
      current = current.parentDbid === null ? undefined : this.getContainer(current.parentDbid);
    }
    return join(this.layout.dataDir, ...names);
  }

  /**
   * The directory files are really written to (the master's, for a slave)
   */
  getActualDir(container: Container): string {
    if (container.masterDbid !== container.dbid) {
      return this.getDefaultDir(this.getContainer(container.masterDbid));
    }
    return this.getDefaultDir(container);
  }

  /**
   * Full path of a video's file, or null when it is unknown
   */
  getVideoPath(video: Video): string | null {
    if (video.dummyFlag) {
      return video.dummyPath;
    }
    if (video.fileName === null || video.fileExt === null) {
      return null;
    }
    return join(this.getActualDir(this.getParent(video)), video.fileName + video.fileExt);
  }

  /**
   * Path of a file sharing the video's stem but with another extension
   */
  getActualPathByExt(video: Video, ext: string): string | null {
    if (video.fileName === null) return null;
    return join(this.getActualDir(this.getParent(video)), video.fileName + dottedExtension(ext));
  }

  /**
   * Same, inside the thumbnail or metadata sub-directory
   */
  getSubdirPathByExt(video: Video, ext: string): string | null {
    if (video.fileName === null) return null;
    const dotted = dottedExtension(ext);
    const subDir = isImageExtension(dotted) ? this.layout.thumbsSubDir : this.layout.metadataSubDir;
    return join(this.getActualDir(this.getParent(video)), subDir, video.fileName + dotted);
  }

  // ==========================================================================
  // Snapshot support
  // ==========================================================================

  entries(): MediaEntity[] {
    return [...this.entities.values()];
  }

  rootDbids(): Dbid[] {
    return [...this.rootList];
  }

  /**
   * Insert a fully-formed entity (used when restoring a snapshot)
   */
  restore(entity: MediaEntity, root: boolean): void {
    this.entities.set(entity.dbid, entity);
    if (root) this.rootList.push(entity.dbid);
    this.nextDbid = Math.max(this.nextDbid, entity.dbid + 1);
  }
}
