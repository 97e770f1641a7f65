/**
 * Parse Serato crate files (.crate).
 *
 * Crate files contain references to tracks organized into collections.
 * Each track lives in an `OTRK` container whose nested chunks carry the file
 * path, an optional display name and the cue list.
 *
 * Sub-crates are stored as nested directories, so `Main/Sub/Peak.crate`
 * below the crate root is the crate `Peak` inside `Sub` inside `Main`.
 *
 * @module parsers/crate
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import glob from 'fast-glob';
import { decodeText } from '../encoding/index.js';
import { compareKeys } from '../hierarchyKey.js';
import type { CrateEntry, CrateTrack, CuePoint } from '../types.js';
import { readChunks } from './chunks.js';
import { parseCueList } from './cues.js';

/** File extension of crate files. */
export const CRATE_EXTENSION = '.crate';

/**
 * Chunk tags read from crate files.
 */
export const CRATE_TAGS = {
  /** Track container */
  TRACK: 'OTRK',
  /** Display name */
  TITLE: 'pnam',
  /** File path */
  FILE_PATH: 'pfil',
  /** Cue list */
  CUE_LIST: 'pcue',
} as const;

/**
 * Build a track from the nested chunks of an `OTRK` container.
 *
 * Later chunks overwrite earlier ones of the same tag.
 *
 * @returns The track, or undefined when no file path is present
 */
function parseTrackChunk(payload: Buffer): CrateTrack | undefined {
  let title: string | undefined;
  let filePath: string | undefined;
  let cuePoints: CuePoint[] = [];

  for (const { tag, payload: data } of readChunks(payload)) {
    switch (tag) {
      case CRATE_TAGS.TITLE:
        title = decodeText(data);
        break;
      case CRATE_TAGS.FILE_PATH:
        filePath = decodeText(data);
        break;
      case CRATE_TAGS.CUE_LIST:
        cuePoints = parseCueList(data);
        break;
    }
  }

  if (!filePath) {
    return undefined;
  }

  return { path: filePath, title, cuePoints };
}

/**
 * Decode the tracks of a crate.
 *
 * Damaged data never throws: decoding stops at the first truncated chunk and
 * tracks without a file path are skipped.
 *
 * @param data - Raw crate file data
 * @returns Tracks in crate order
 */
export function decodeCrate(data: Buffer): CrateTrack[] {
  const tracks: CrateTrack[] = [];

  for (const { tag, payload } of readChunks(data)) {
    if (tag !== CRATE_TAGS.TRACK) {
      continue;
    }
    const track = parseTrackChunk(payload);
    if (track) {
      tracks.push(track);
    }
  }

  return tracks;
}

/**
 * Read and decode a single crate file.
 *
 * @param cratePath - Path to the .crate file
 * @returns Tracks in crate order
 */
export async function parseCrate(cratePath: string): Promise<CrateTrack[]> {
  return decodeCrate(await fs.promises.readFile(cratePath));
}

/**
 * List every crate file below a crate root, at any depth.
 *
 * Entries are sorted by their relative path components. Hidden files and
 * directories are included.
 *
 * @param crateRoot - Directory holding the crates (usually `_Serato_/Subcrates`)
 * @returns Crate keys with absolute file paths
 */
export async function listCrates(crateRoot: string): Promise<CrateEntry[]> {
  const root = path.resolve(crateRoot);
  const files = await glob(`**/*${CRATE_EXTENSION}`, {
    cwd: root,
    onlyFiles: true,
    dot: true,
  });

  return files
    .map(relative => relative.split('/'))
    .sort(compareKeys)
    .map(parts => ({
      key: [...parts.slice(0, -1), path.basename(parts[parts.length - 1], CRATE_EXTENSION)],
      path: path.join(root, ...parts),
    }));
}
