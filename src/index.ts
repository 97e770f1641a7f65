/**
 * crate-bridge - Convert Serato crates into a Rekordbox XML library.
 *
 * Features:
 * - Crate file parsing (track paths, titles, cue points)
 * - Sub-crate hierarchy mapped to Rekordbox folders and playlists
 * - Track deduplication across playlists
 * - Polling watcher that regenerates the XML when crates change
 *
 * @module crate-bridge
 */

// Conversion pipeline
export {
  Converter,
  summarize,
  summaryLines,
  logSummary,
  type ConverterOptions,
  type RunOptions,
} from './converter.js';

// Watcher
export { CrateWatcher, type CrateWatcherOptions } from './crateWatcher.js';

// Core types
export type {
  CuePoint,
  CrateTrack,
  CrateEntry,
  HierarchyKey,
  Playlist,
  Hierarchy,
  CollectionTrack,
  ConversionSummary,
  CrateSnapshot,
  CrateWatcherEvents,
} from './types.js';

// Errors
export {
  CrateBridgeError,
  CrateRootNotFoundError,
  OutputWriteError,
  ConfigError,
} from './errors.js';

// Configuration
export {
  loadConfig,
  loadConfigFile,
  mergeConfig,
  getDefaultConfig,
  getDefaultSeratoPath,
  CrateBridgeConfigSchema,
  PartialCrateBridgeConfigSchema,
  type CrateBridgeConfig,
  type PartialCrateBridgeConfig,
} from './config.js';

// Logging
export { createLogger, silentLogger, type Logger, type LogLevel } from './logger.js';

// Crate parsers
export {
  readChunks,
  parseCueList,
  decodeCrate,
  parseCrate,
  listCrates,
  CRATE_TAGS,
  type Chunk,
} from './parsers/index.js';

// Hierarchy
export { buildHierarchy, collectTracks, type LoadedCrate, type TrackCollection } from './hierarchy.js';
export { compareKeys, formatKey, keyId } from './hierarchyKey.js';

// Change detection
export { takeSnapshot, snapshotsEqual } from './snapshot.js';

// Rekordbox XML
export {
  buildRekordboxXml,
  writeRekordboxXml,
  trackLocation,
  toFileUrl,
  type RekordboxDocumentOptions,
} from './rekordbox/index.js';

// Text decoding
export { decodeText } from './encoding/index.js';
