/**
 * File format tables
 *
 * Extensions carry their leading dot. Frozen; shared by reference.
 */

export const VIDEO_FORMATS: readonly string[] = Object.freeze(['.mp4', '.flv', '.ogg', '.webm', '.mkv', '.avi']);
export const AUDIO_FORMATS: readonly string[] = Object.freeze(['.mp3', '.wav', '.aac', '.m4a', '.vorbis', '.opus', '.flac']);
export const IMAGE_FORMATS: readonly string[] = Object.freeze(['.jpg', '.png', '.gif', '.webp']);

export const MEDIA_FORMATS: readonly string[] = Object.freeze([...VIDEO_FORMATS, ...AUDIO_FORMATS]);

/**
 * Companion files the downloader writes beside each video
 */
export const COMPANION_SUFFIXES = Object.freeze({
  description: '.description',
  infoJson: '.info.json',
  annotations: '.annotations.xml',
} as const);

export type CompanionKind = keyof typeof COMPANION_SUFFIXES;

function lower(ext: string): string {
  return ext.toLowerCase();
}

export function isMediaExtension(ext: string): boolean {
  return MEDIA_FORMATS.includes(lower(ext));
}

export function isImageExtension(ext: string): boolean {
  return IMAGE_FORMATS.includes(lower(ext));
}
