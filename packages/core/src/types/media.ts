/**
 * Media entity model
 *
 * Entities reference each other by dbid; the registry owns the graph.
 */

export type Dbid = number;

/**
 * One clip of a video, as timestamps ('1:23', '01:02:03') or plain seconds.
 * A null stop runs to the end of the video.
 */
export interface ClipStamp {
  start: string;
  stop: string | null;
  title: string | null;
}

/**
 * One section to remove from a video, in seconds
 */
export interface SliceRange {
  start: number;
  stop: number | null;
}

export interface Video {
  readonly kind: 'video';
  readonly dbid: Dbid;
  name: string;
  parentDbid: Dbid;
  /** Remote URL, when the video can be fetched on its own */
  source: string | null;
  /** Stem of the file on disk; null until the file is known */
  fileName: string | null;
  /** Extension including its dot */
  fileExt: string | null;
  fileSize: number | null;
  dlFlag: boolean;
  newFlag: boolean;
  /** Imported from outside the registry; `dummyPath` is the whole path */
  dummyFlag: boolean;
  dummyPath: string | null;
  stampList: ClipStamp[];
  sliceList: SliceRange[];
}

interface ContainerFields {
  readonly dbid: Dbid;
  name: string;
  parentDbid: Dbid | null;
  /** Ordered; order matters for display only */
  childList: Dbid[];
  /** Self unless another container's directory is authoritative */
  masterDbid: Dbid;
  /** Containers that use this one as their download destination */
  slaveDbidList: Dbid[];
  /** Excluded from bulk operations */
  privFlag: boolean;
  externalDir: string | null;
}

export interface Channel extends ContainerFields {
  readonly kind: 'channel';
  source: string;
}

export interface Playlist extends ContainerFields {
  readonly kind: 'playlist';
  source: string;
}

export interface Folder extends ContainerFields {
  readonly kind: 'folder';
}

export type Container = Channel | Playlist | Folder;
export type MediaEntity = Video | Container;
export type MediaKind = MediaEntity['kind'];
export type ContainerKind = Container['kind'];

export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(value)}`);
}

export function isContainer(entity: MediaEntity): entity is Container {
  switch (entity.kind) {
    case 'video':
      return false;
    case 'channel':
    case 'playlist':
    case 'folder':
      return true;
    default:
      return assertNever(entity);
  }
}

/**
 * Human-readable type label ('Video', 'Channel', ...)
 */
export function entityLabel(entity: MediaEntity): string {
  switch (entity.kind) {
    case 'video':
      return 'Video';
    case 'channel':
      return 'Channel';
    case 'playlist':
      return 'Playlist';
    case 'folder':
      return 'Folder';
    default:
      return assertNever(entity);
  }
}

/**
 * URL the downloader fetches for an entity. Folders never have one.
 */
export function remoteSource(entity: MediaEntity): string | null {
  switch (entity.kind) {
    case 'video':
    case 'channel':
    case 'playlist':
      return entity.source;
    case 'folder':
      return null;
    default:
      return assertNever(entity);
  }
}
