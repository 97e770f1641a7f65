/**
 * Reconcile decoded crates into folders, playlists and a deduplicated
 * track collection.
 *
 * Crates that contain other crates become folders. Such a crate is also kept
 * as a playlist when it has tracks of its own; that playlist is placed inside
 * its own folder, next to its sub-crates.
 *
 * @module hierarchy
 */

import { isStrictPrefix, keyId, strictPrefixes } from './hierarchyKey.js';
import { resolveTrackPath } from './paths.js';
import type {
  CollectionTrack,
  CrateTrack,
  Hierarchy,
  HierarchyKey,
  Playlist,
} from './types.js';

/**
 * Decoded contents of one crate.
 */
export interface LoadedCrate {
  key: HierarchyKey;
  tracks: CrateTrack[];
}

/**
 * Deduplicated tracks of a hierarchy.
 */
export interface TrackCollection {
  /** Tracks in TrackID order */
  tracks: CollectionTrack[];
  /** TrackID for each resolved path */
  idsByPath: Map<string, number>;
}

/**
 * Build the playlists and folder set for a library.
 *
 * @param crates - Decoded crates in enumeration order
 */
export function buildHierarchy(crates: readonly LoadedCrate[]): Hierarchy {
  const playlists = new Map<string, Playlist>();
  const folders = new Map<string, HierarchyKey>();

  for (const { key } of crates) {
    for (const prefix of strictPrefixes(key)) {
      folders.set(keyId(prefix), prefix);
    }
  }

  for (const { key, tracks } of crates) {
    const hasChildren = crates.some(other => isStrictPrefix(key, other.key));

    if (hasChildren) {
      folders.set(keyId(key), key);
      if (tracks.length === 0) {
        continue;
      }
    }

    playlists.set(keyId(key), {
      key,
      name: key[key.length - 1],
      tracks,
      parentPath: hasChildren ? key : key.slice(0, -1),
    });
  }

  return { playlists, folders };
}

/**
 * Assign TrackIDs to every distinct track of the playlists.
 *
 * IDs start at 1 and follow first appearance, walking playlists in insertion
 * order. Tracks pointing at the same resolved file share one entry.
 */
export function collectTracks(playlists: Iterable<Playlist>): TrackCollection {
  const tracks: CollectionTrack[] = [];
  const idsByPath = new Map<string, number>();

  for (const playlist of playlists) {
    for (const track of playlist.tracks) {
      const resolvedPath = resolveTrackPath(track.path);
      if (idsByPath.has(resolvedPath)) {
        continue;
      }
      const trackId = tracks.length + 1;
      idsByPath.set(resolvedPath, trackId);
      tracks.push({ trackId, resolvedPath, track });
    }
  }

  return { tracks, idsByPath };
}
