/**
 * Downloader output parser
 *
 * Turns one line of youtube-dl/yt-dlp output (run with --newline) into an
 * event. Lines that carry nothing the download manager acts on yield null.
 */

export type DownloadEvent =
  | { type: 'destination'; path: string }
  | { type: 'progress'; percent: number; size: string; speed: string | null; eta: string | null }
  | { type: 'completed'; size: string }
  | { type: 'playlistItem'; index: number; total: number }
  | { type: 'alreadyDownloaded'; path: string }
  | { type: 'archived'; id: string }
  | { type: 'merged'; path: string }
  | { type: 'converted'; path: string };

export type DownloadEventType = DownloadEvent['type'];

export type StderrClass = 'warning' | 'error' | 'debug' | 'ignorable';

const DESTINATION = /^\[download\] Destination: (.+)$/;
const PROGRESS = /^\[download\]\s+([\d.]+)% of\s+~?\s*(\S+)(?:\s+at\s+(\S+))?(?:\s+ETA\s+(\S+))?/;
const PLAYLIST_ITEM = /^\[download\] Downloading (?:video|item) (\d+) of (\d+)/;
const ALREADY_DOWNLOADED = /^\[download\] (.+) has already been downloaded(?: and merged)?$/;
const ARCHIVED = /^\[download\] (.+?):? has already been recorded in (?:the )?archive$/;
const MERGING = /^\[(?:Merger|ffmpeg)\] Merging formats into "(.+)"$/;
const POST_DESTINATION = /^\[(?:ffmpeg|ExtractAudio)\] Destination: (.+)$/;
const CONVERTING = /^\[(?:ffmpeg|VideoConvertor|VideoRemuxer)\] (?:Converting|Remuxing) video from \S+ to \S+[;,] Destination: (.+)$/;

const IGNORABLE_STDERR: readonly RegExp[] = [
  /This live event will begin/,
  /Premiere will begin/,
  /Premieres in/,
];

/**
 * Intermediate format files (`NAME.f137.mp4`) are merged away afterwards
 */
const FORMAT_FRAGMENT = /\.f\d{1,3}\.\w+$/;

export function parseDownloadLine(raw: string): DownloadEvent | null {
  const line = raw.replace(/^\r+/, '').trim();

  const destination = line.match(DESTINATION);
  if (destination) {
    return { type: 'destination', path: destination[1] ?? '' };
  }

  // [download]  45.3% of ~10.00MiB at 1.00MiB/s ETA 00:05
  const progress = line.match(PROGRESS);
  if (progress) {
    const [, percentText, size, speed, eta] = progress;
    const percent = parseFloat(percentText ?? '0');
    if (percent >= 100) {
      return { type: 'completed', size: size ?? '' };
    }
    return { type: 'progress', percent, size: size ?? '', speed: speed ?? null, eta: eta ?? null };
  }

  const item = line.match(PLAYLIST_ITEM);
  if (item) {
    return { type: 'playlistItem', index: parseInt(item[1] ?? '0', 10), total: parseInt(item[2] ?? '0', 10) };
  }

  const already = line.match(ALREADY_DOWNLOADED);
  if (already) {
    return { type: 'alreadyDownloaded', path: already[1] ?? '' };
  }

  const archived = line.match(ARCHIVED);
  if (archived) {
    return { type: 'archived', id: archived[1] ?? '' };
  }

  const merging = line.match(MERGING);
  if (merging) {
    return { type: 'merged', path: merging[1] ?? '' };
  }

  const converted = line.match(CONVERTING) ?? line.match(POST_DESTINATION);
  if (converted) {
    return { type: 'converted', path: converted[1] ?? '' };
  }

  return null;
}

export function classifyDownloaderStderr(raw: string): StderrClass {
  const line = raw.trim();
  if (line.startsWith('[debug]')) return 'debug';
  if (IGNORABLE_STDERR.some(pattern => pattern.test(line))) return 'ignorable';
  if (line.split(':')[0] === 'WARNING') return 'warning';
  return 'error';
}

export function isFormatFragment(path: string): boolean {
  return FORMAT_FRAGMENT.test(path);
}
