/**
 * Path Utilities
 */

import { extname, basename } from 'node:path';

/**
 * Make a display name usable inside a file name.
 * Only path separators and colons are touched; everything else is kept as-is.
 */
export function sanitizeFilename(name: string): string {
  return name.replace(/[/:]/g, '-');
}

/**
 * Normalise a path typed or dragged into a terminal: surrounding
 * whitespace and quotes are dropped, and on POSIX the shell escapes
 * a drag-and-drop adds ("My\ Movie.mkv") are removed.
 */
export function cleanInputPath(raw: string, platform: NodeJS.Platform = process.platform): string {
  let path = raw.trim().replace(/^['"]+|['"]+$/g, '');
  if (platform !== 'win32') {
    path = path.replace(/\\/g, '');
  }
  return path;
}

/**
 * Get base filename without extension
 */
export function getBasename(filename: string): string {
  const ext = extname(filename);
  return basename(filename, ext);
}
