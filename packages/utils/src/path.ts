/**
 * Path Utilities
 */

import { parse, format, basename } from 'node:path';

/**
 * Replace the last extension of a path.
 *
 * `replaceExtension('/v/clip.mov', 'compressed.mp4')` gives `/v/clip.compressed.mp4`.
 * A path without an extension gets one appended. Leading dots of a
 * dotfile name are not treated as an extension.
 */
export function replaceExtension(filePath: string, extension: string): string {
  const { root, dir, name } = parse(filePath);
  return format({ root, dir, name, ext: `.${extension.replace(/^\./, '')}` });
}

/**
 * Display name of a file (last path segment)
 */
export function getFilename(filePath: string): string {
  return basename(filePath);
}
