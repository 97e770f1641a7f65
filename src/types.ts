import EventEmitter from 'node:events';
import type { StrictEventEmitter } from 'strict-event-emitter-types';

// ============================================================================
// Crate Types
// ============================================================================

/**
 * A cue point stored in a crate's `pcue` chunk.
 */
export interface CuePoint {
  /** Hot cue slot (0-based) */
  index: number;
  /** Position in seconds */
  position: number;
  /** Optional label */
  name?: string;
}

/**
 * A track reference decoded from an `OTRK` chunk.
 */
export interface CrateTrack {
  /** File path as stored in the crate */
  path: string;
  /** Display title, when the crate carries one */
  title?: string;
  /** Cue points in the order they were stored */
  cuePoints: CuePoint[];
}

/**
 * Location of a crate relative to the crate root.
 *
 * Directory names followed by the crate's file name without `.crate`,
 * e.g. `['Main', 'Sub', 'Peak']` for `Main/Sub/Peak.crate`.
 */
export type HierarchyKey = readonly string[];

/**
 * A crate file discovered under the crate root.
 */
export interface CrateEntry {
  key: HierarchyKey;
  /** Absolute path to the `.crate` file */
  path: string;
}

// ============================================================================
// Hierarchy Types
// ============================================================================

/**
 * A playlist produced from a single crate.
 */
export interface Playlist {
  /** Key of the crate this playlist came from */
  key: HierarchyKey;
  /** Last segment of the key */
  name: string;
  tracks: CrateTrack[];
  /** Folder the playlist is placed in (may equal `key` for mixed crates) */
  parentPath: HierarchyKey;
}

/**
 * Playlists and folders reconciled from every crate of a library.
 */
export interface Hierarchy {
  /** Playlists in crate order, keyed by {@link keyId} */
  playlists: Map<string, Playlist>;
  /** Folder keys, keyed by {@link keyId} */
  folders: Map<string, HierarchyKey>;
}

/**
 * A deduplicated track with its assigned collection ID.
 */
export interface CollectionTrack {
  trackId: number;
  /** Resolved absolute path used for deduplication */
  resolvedPath: string;
  track: CrateTrack;
}

// ============================================================================
// Conversion Types
// ============================================================================

/**
 * Counts describing a single conversion run.
 */
export interface ConversionSummary {
  /** Destination XML file */
  output: string;
  /** Whether the XML file was written (false for dry runs) */
  written: boolean;
  /** Track count per playlist, keyed by `"A / B / C"` */
  playlistCounts: Map<string, number>;
  playlistCount: number;
  /** Sum of all playlist lengths */
  trackCount: number;
}

/**
 * Snapshot of crate modification times (ms since epoch), keyed by crate path.
 */
export type CrateSnapshot = Map<string, number>;

/**
 * Events emitted by CrateWatcher
 */
export interface CrateWatcherEvents {
  /** Emitted once the watcher has started polling */
  ready: (info: { crateRoot: string; output: string }) => void;
  /** Emitted on each poll cycle */
  poll: () => void;
  /** Emitted after the crates changed and the XML was regenerated */
  conversion: (summary: ConversionSummary) => void;
  /** Emitted when a poll found no changes */
  unchanged: () => void;
  /** Emitted on errors */
  error: (err: Error) => void;
}

export type TypedEmitter = StrictEventEmitter<EventEmitter, CrateWatcherEvents>;
