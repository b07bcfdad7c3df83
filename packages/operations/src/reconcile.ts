/**
 * Directory reconciliation
 *
 * Matches the media files in one directory against the videos of the
 * container that owns it. Pure: the refresh manager applies the plan.
 *
 * - Files are keyed by stem; a second file with the same stem is an
 *   alternate, never matched on its own (first in listing order wins).
 * - A file matches at most one video; a stem creates at most one video.
 * - Stems already known to a slave container sharing the directory are
 *   skipped instead of creating duplicates.
 */

import { isMediaExtension, type Video } from '@reelkeeper/core';
import { splitFilename } from '@reelkeeper/utils';

export interface DiskFile {
  name: string;
  stem: string;
  /** With its dot */
  ext: string;
}

export interface ReconcileMatch {
  video: Video;
  file: DiskFile;
  /** The video's stored extension differs and must be reassigned */
  extChanged: boolean;
}

export interface ReconcilePlan {
  matched: ReconcileMatch[];
  created: DiskFile[];
  /** Downloaded videos whose file is gone */
  missing: Video[];
  alternates: DiskFile[];
  /** Claimed by a slave container */
  skipped: DiskFile[];
}

export function toDiskFile(name: string): DiskFile {
  const { stem, ext } = splitFilename(name);
  return { name, stem, ext };
}

export function reconcileDirectory(
  fileNames: readonly string[],
  videos: readonly Video[],
  slaveVideos: readonly Video[] = []
): ReconcilePlan {
  const plan: ReconcilePlan = { matched: [], created: [], missing: [], alternates: [], skipped: [] };

  // 1. Media files by stem; later same-stem files are alternates
  const primary = new Map<string, DiskFile>();
  for (const name of fileNames) {
    const file = toDiskFile(name);
    if (!isMediaExtension(file.ext)) continue;

    if (primary.has(file.stem)) {
      plan.alternates.push(file);
    } else {
      primary.set(file.stem, file);
    }
  }

  // 2. Videos with a known file, by stem
  const pending = new Map<string, Video>();
  for (const video of videos) {
    if (video.fileName !== null && !pending.has(video.fileName)) {
      pending.set(video.fileName, video);
    }
  }

  // 3. Stems claimed by slaves of this container
  const claimed = new Set<string>();
  for (const video of slaveVideos) {
    if (video.fileName !== null) claimed.add(video.fileName);
  }

  // 4. Match, skip or create
  for (const file of primary.values()) {
    const video = pending.get(file.stem);

    if (video) {
      pending.delete(file.stem);
      // A video whose own file is present as an alternate keeps its extension
      const own = video.fileExt === file.ext
        ? file
        : plan.alternates.find(alt => alt.stem === file.stem && alt.ext === video.fileExt);
      plan.matched.push(own ? { video, file: own, extChanged: false } : { video, file, extChanged: true });
    } else if (claimed.has(file.stem)) {
      plan.skipped.push(file);
    } else {
      plan.created.push(file);
    }
  }

  // 5. Whatever is left lost its file
  for (const video of pending.values()) {
    if (video.dlFlag) plan.missing.push(video);
  }

  return plan;
}
