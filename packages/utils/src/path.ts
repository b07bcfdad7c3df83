/**
 * Path Utilities
 */

import { extname, basename } from 'node:path';

/**
 * Sanitize a filename to be safe for filesystem
 */
export function sanitizeFilename(filename: string): string {
  return filename
    // Remove null bytes
    .replace(/\0/g, '')
    // Replace Windows reserved characters
    .replace(/[<>:"/\\|?*]/g, '_')
    // Replace control characters
    .replace(/[\x00-\x1f\x80-\x9f]/g, '')
    .trim()
    .replace(/^\.+|\.+$/g, '')
    .substring(0, 200);
}

/**
 * Split a filename into its stem and extension (extension keeps its dot and
 * its case; '' when there is none)
 */
export function splitFilename(filename: string): { stem: string; ext: string } {
  const ext = extname(filename);
  return { stem: basename(filename, ext), ext };
}

/**
 * Normalise an extension to its dotted form ('mp4' -> '.mp4')
 */
export function dottedExtension(ext: string): string {
  return ext.startsWith('.') ? ext : `.${ext}`;
}
