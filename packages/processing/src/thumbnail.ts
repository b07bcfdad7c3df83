/**
 * Thumbnail helpers
 *
 * Downloaders sometimes save WebP or PNG data under a .jpg name. FFmpeg
 * refuses those, so the real format is sniffed from the header first.
 */

import { dirname, join } from 'node:path';
import { IMAGE_FORMATS, type MediaRegistry, type Video } from '@reelkeeper/core';
import {
  copyFile,
  createLogger,
  isFile,
  listFiles,
  moveFile,
  readFileHeader,
  splitFilename,
} from '@reelkeeper/utils';

const logger = createLogger({ module: 'thumbnail' });

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

/**
 * Extension implied by an image header, or null when unrecognised
 */
export function sniffImageFormat(header: Uint8Array): '.webp' | '.jpg' | '.png' | null {
  if (
    header.length >= 12 &&
    asciiAt(header, 0, 4) === 'RIFF' &&
    asciiAt(header, 8, 4) === 'WEBP'
  ) {
    return '.webp';
  }

  if (header.length >= 3 && header[0] === 0xff && header[1] === 0xd8 && header[2] === 0xff) {
    return '.jpg';
  }

  if (header.length >= PNG_SIGNATURE.length && PNG_SIGNATURE.every((byte, i) => header[i] === byte)) {
    return '.png';
  }

  return null;
}

function asciiAt(bytes: Uint8Array, offset: number, length: number): string {
  return String.fromCharCode(...bytes.subarray(offset, offset + length));
}

/**
 * Give a thumbnail the extension its contents imply. Returns the (possibly
 * new) path. With `retainOriginal` the file is copied, not renamed.
 */
export async function correctThumbnailFormat(
  path: string,
  retainOriginal: boolean = false
): Promise<string> {
  const header = await readFileHeader(path, 12);
  const actual = sniffImageFormat(header);
  if (actual === null) {
    return path;
  }

  const { stem, ext } = splitFilename(path);
  const current = ext.toLowerCase() === '.jpeg' ? '.jpg' : ext.toLowerCase();
  if (current === actual) {
    return path;
  }

  const corrected = join(dirname(path), stem + actual);
  if (retainOriginal) {
    await copyFile(path, corrected);
  } else {
    await moveFile(path, corrected);
  }

  logger.info({ from: path, to: corrected }, 'Corrected thumbnail extension');
  return corrected;
}

/**
 * Locate a video's thumbnail: each image format beside the video, then in
 * the thumbnail sub-directory, then any `STEM.jpg*` leftover
 */
export async function findThumbnail(registry: MediaRegistry, video: Video): Promise<string | null> {
  for (const ext of IMAGE_FORMATS) {
    const candidates = [
      registry.getActualPathByExt(video, ext),
      registry.getSubdirPathByExt(video, ext),
    ];
    for (const candidate of candidates) {
      if (candidate !== null && await isFile(candidate)) {
        return candidate;
      }
    }
  }

  const jpgPath = registry.getActualPathByExt(video, '.jpg');
  if (jpgPath === null) {
    return null;
  }

  const prefix = `${video.fileName ?? ''}.jpg`;
  const dir = dirname(jpgPath);
  const leftover = (await listFiles(dir)).find(name => name.startsWith(prefix));
  return leftover === undefined ? null : join(dir, leftover);
}

/**
 * FFmpeg invocation converting a thumbnail to JPEG beside it
 */
export function compileThumbnailConversion(binary: string, sourcePath: string): string[] {
  const { stem } = splitFilename(sourcePath);
  return [binary, '-y', '-i', sourcePath, join(dirname(sourcePath), `${stem}.jpg`)];
}
