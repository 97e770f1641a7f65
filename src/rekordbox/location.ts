/**
 * Build the `Location` URLs Rekordbox uses to find audio files.
 *
 * @module rekordbox/location
 */

import { resolveTrackPath } from '../paths.js';

const URL_PREFIX = 'file://localhost';

/**
 * Percent-encode a path, leaving unreserved characters and `/` literal.
 *
 * `encodeURIComponent` keeps `!'()*` as they are; Rekordbox expects them
 * encoded like every other reserved character.
 */
export function encodeUrlPath(value: string): string {
  return value
    .split('/')
    .map(segment =>
      encodeURIComponent(segment).replace(
        /[!'()*]/g,
        ch => `%${ch.charCodeAt(0).toString(16).toUpperCase()}`
      )
    )
    .join('/');
}

/**
 * Convert an already resolved path to a `file://localhost/...` URL.
 *
 * Backslashes are treated as separators so Windows paths produce
 * `file://localhost/C%3A/Music/...`.
 */
export function toFileUrl(resolvedPath: string): string {
  const encoded = encodeUrlPath(resolvedPath.replace(/\\/g, '/'));
  return `${URL_PREFIX}${encoded.startsWith('/') ? '' : '/'}${encoded}`;
}

/**
 * Resolve a track path and convert it to a location URL.
 *
 * @param filePath - Path as stored in the crate
 */
export function trackLocation(filePath: string): string {
  return toFileUrl(resolveTrackPath(filePath));
}
