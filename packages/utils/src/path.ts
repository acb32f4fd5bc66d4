/**
 * Path Utilities
 */

import { isAbsolute, parse, sep } from 'node:path';

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
 * Sanitize every segment of a relative or absolute path, keeping its root
 */
export function sanitizePath(path: string): string {
  const root = isAbsolute(path) ? parse(path).root : '';
  const segments = path
    .slice(root.length)
    .split(/[\\/]+/)
    .map(sanitizeFilename)
    .filter(segment => segment.length > 0);

  return root + segments.join(sep);
}
