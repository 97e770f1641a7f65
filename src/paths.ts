/**
 * Path resolution for track identity and file URLs.
 *
 * @module paths
 */

import { existsSync, realpathSync } from 'node:fs';
import { homedir } from 'node:os';
import * as path from 'node:path';

/**
 * Expand a leading `~` to the current user's home directory.
 */
export function expandHome(filePath: string): string {
  if (filePath === '~') {
    return homedir();
  }
  if (filePath.startsWith('~/') || filePath.startsWith('~\\')) {
    return path.join(homedir(), filePath.slice(2));
  }
  return filePath;
}

/**
 * Resolve a track path to the absolute form used as its identity.
 *
 * Symlinks are resolved for the longest part of the path that exists on disk;
 * the remaining segments are appended as written. Two spellings of the same
 * file (relative vs absolute, through a symlinked folder) resolve equally.
 *
 * @param filePath - Path as stored in the crate
 */
export function resolveTrackPath(filePath: string): string {
  const absolute = path.resolve(expandHome(filePath));

  let existing = absolute;
  const missing: string[] = [];
  while (!existsSync(existing)) {
    const parent = path.dirname(existing);
    if (parent === existing) {
      return absolute;
    }
    missing.unshift(path.basename(existing));
    existing = parent;
  }

  return path.join(realpathSync(existing), ...missing);
}
