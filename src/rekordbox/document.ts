/**
 * Build Rekordbox `DJ_PLAYLISTS` XML documents.
 *
 * Structure:
 * - `PRODUCT`: name and version of the exporting tool
 * - `COLLECTION`: every distinct track once, with cue markers
 * - `PLAYLISTS`: a `ROOT` folder node holding folders (`Type="0"`) and
 *   playlists (`Type="1"`) that reference tracks by TrackID
 *
 * Format reference:
 * - Rekordbox XML format list (Pioneer DJ developer docs)
 *
 * @module rekordbox/document
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { OutputWriteError } from '../errors.js';
import { collectTracks } from '../hierarchy.js';
import { compareKeys, keyId, strictPrefixes } from '../hierarchyKey.js';
import { resolveTrackPath } from '../paths.js';
import type { CrateTrack, CuePoint, Hierarchy, HierarchyKey } from '../types.js';
import { toFileUrl } from './location.js';
import { element, renderDocument, setAttribute, type XmlElement } from './xmlElement.js';

const DOCUMENT_VERSION = '1.0.0';

/** Node types in the `PLAYLISTS` tree. */
const NODE_TYPE = {
  FOLDER: '0',
  PLAYLIST: '1',
} as const;

/** Playlist entries reference tracks by TrackID. */
const KEY_TYPE_TRACK_ID = '0';

/** `POSITION_MARK` type for cue points. */
const MARK_TYPE_CUE = '0';

const CUE_COLOR = { Red: 255, Green: 255, Blue: 255 } as const;

/**
 * Options for the `PRODUCT` element.
 */
export interface RekordboxDocumentOptions {
  productName: string;
  productVersion: string;
}

/**
 * Display name for a track: its title, or the file name without extension.
 */
export function trackDisplayName(track: CrateTrack): string {
  return track.title || path.parse(track.path).name;
}

/**
 * Format a cue position in seconds with six fractional digits.
 *
 * NaN and infinite positions are written as zero.
 */
export function formatPosition(seconds: number): string {
  return (Number.isFinite(seconds) ? seconds : 0).toFixed(6);
}

function sortCuePoints(cuePoints: readonly CuePoint[]): CuePoint[] {
  return [...cuePoints].sort((a, b) => a.index - b.index || a.position - b.position);
}

function appendCueMarks(parent: XmlElement, cuePoints: readonly CuePoint[]): void {
  for (const cue of sortCuePoints(cuePoints)) {
    element(
      'POSITION_MARK',
      {
        Name: cue.name || `Hot Cue ${cue.index + 1}`,
        Type: MARK_TYPE_CUE,
        Start: formatPosition(cue.position),
        Num: cue.index,
        ...CUE_COLOR,
      },
      parent
    );
  }
}

/**
 * Build the XML document for a reconciled hierarchy.
 *
 * @param hierarchy - Playlists and folders from {@link buildHierarchy}
 * @param options - Product information
 * @returns Serialized XML
 */
export function buildRekordboxXml(
  hierarchy: Hierarchy,
  options: RekordboxDocumentOptions
): string {
  const root = element('DJ_PLAYLISTS', { Version: DOCUMENT_VERSION });
  element('PRODUCT', { Name: options.productName, Version: options.productVersion }, root);

  const { tracks, idsByPath } = collectTracks(hierarchy.playlists.values());
  const collection = element('COLLECTION', { Entries: tracks.length }, root);
  for (const { trackId, resolvedPath, track } of tracks) {
    const trackNode = element(
      'TRACK',
      {
        TrackID: trackId,
        Name: trackDisplayName(track),
        Location: toFileUrl(resolvedPath),
      },
      collection
    );
    appendCueMarks(trackNode, track.cuePoints);
  }

  const playlistsNode = element('PLAYLISTS', {}, root);
  const rootFolder = element('NODE', { Type: NODE_TYPE.FOLDER, Name: 'ROOT' }, playlistsNode);
  const folderNodes = new Map<string, XmlElement>();

  const ensureFolder = (folderPath: HierarchyKey): XmlElement => {
    if (folderPath.length === 0) {
      return rootFolder;
    }
    const id = keyId(folderPath);
    const existing = folderNodes.get(id);
    if (existing) {
      return existing;
    }
    const parent = ensureFolder(folderPath.slice(0, -1));
    const node = element(
      'NODE',
      { Type: NODE_TYPE.FOLDER, Name: folderPath[folderPath.length - 1] },
      parent
    );
    folderNodes.set(id, node);
    return node;
  };

  const folderPaths = new Map(hierarchy.folders);
  for (const playlist of hierarchy.playlists.values()) {
    for (const prefix of [...strictPrefixes(playlist.parentPath), playlist.parentPath]) {
      if (prefix.length > 0) {
        folderPaths.set(keyId(prefix), prefix);
      }
    }
  }

  for (const folderPath of [...folderPaths.values()].sort(compareKeys)) {
    ensureFolder(folderPath);
  }

  const playlists = [...hierarchy.playlists.values()].sort((a, b) => compareKeys(a.key, b.key));
  for (const playlist of playlists) {
    const node = element(
      'NODE',
      {
        Type: NODE_TYPE.PLAYLIST,
        Name: playlist.name,
        KeyType: KEY_TYPE_TRACK_ID,
        Entries: playlist.tracks.length,
      },
      ensureFolder(playlist.parentPath)
    );
    for (const track of playlist.tracks) {
      const trackId = idsByPath.get(resolveTrackPath(track.path));
      if (trackId !== undefined) {
        element('TRACK', { Key: trackId }, node);
      }
    }
  }

  for (const folder of [rootFolder, ...folderNodes.values()]) {
    setAttribute(folder, 'Count', folder.children.length);
  }

  return renderDocument(root);
}

/**
 * Write an XML document, creating parent directories as needed.
 *
 * @throws {OutputWriteError} When the directory or file cannot be written
 */
export async function writeRekordboxXml(xml: string, output: string): Promise<void> {
  try {
    await fs.promises.mkdir(path.dirname(output), { recursive: true });
    await fs.promises.writeFile(output, xml, 'utf-8');
  } catch (err) {
    throw new OutputWriteError(output, err);
  }
}
