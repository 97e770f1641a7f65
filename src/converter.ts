/**
 * @fileoverview Converter - runs the crate to Rekordbox XML pipeline.
 *
 * list crates → decode each crate → reconcile folders and playlists →
 * build XML → write the output file.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { CrateRootNotFoundError } from './errors.js';
import { buildHierarchy, type LoadedCrate } from './hierarchy.js';
import { formatKey } from './hierarchyKey.js';
import { silentLogger, type Logger } from './logger.js';
import { listCrates, parseCrate } from './parsers/index.js';
import { expandHome } from './paths.js';
import { buildRekordboxXml, writeRekordboxXml } from './rekordbox/index.js';
import { takeSnapshot } from './snapshot.js';
import type { ConversionSummary, CrateSnapshot, Hierarchy } from './types.js';

/**
 * Options for Converter
 */
export interface ConverterOptions {
  /** Directory holding the `.crate` files */
  crateRoot: string;
  /** Destination XML file */
  output: string;
  /** `PRODUCT` name written into the XML. Default: 'crate-bridge' */
  productName?: string;
  /** `PRODUCT` version written into the XML. Default: '0.1.0' */
  productVersion?: string;
  /** Receives progress messages. Default: silent */
  logger?: Logger;
}

/**
 * Options for a single conversion run
 */
export interface RunOptions {
  /** Write the XML file. `false` performs a dry run. Default: true */
  write?: boolean;
}

function isMissingPathError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

/**
 * Ensure the crate root exists and is a directory.
 *
 * @throws {CrateRootNotFoundError}
 */
async function assertCrateRoot(crateRoot: string): Promise<void> {
  let stat: fs.Stats;
  try {
    stat = await fs.promises.stat(crateRoot);
  } catch (err) {
    if (isMissingPathError(err)) {
      throw new CrateRootNotFoundError(crateRoot);
    }
    throw err;
  }
  if (!stat.isDirectory()) {
    throw new CrateRootNotFoundError(crateRoot);
  }
}

/**
 * Converts a folder of Serato crates into a Rekordbox XML library.
 *
 * Every run reads the crates from scratch; the converter keeps no state
 * between runs. Runs against the same output must not overlap.
 */
export class Converter {
  readonly crateRoot: string;
  readonly output: string;
  readonly productName: string;
  readonly productVersion: string;
  private logger: Logger;

  constructor(options: ConverterOptions) {
    this.crateRoot = path.resolve(expandHome(options.crateRoot));
    this.output = path.resolve(expandHome(options.output));
    this.productName = options.productName ?? 'crate-bridge';
    this.productVersion = options.productVersion ?? '0.1.0';
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Convert the current crate tree.
   *
   * @returns Counts describing the playlists and tracks that were processed
   * @throws {CrateRootNotFoundError} When the crate root is missing
   * @throws {OutputWriteError} When the XML cannot be written
   */
  async runOnce(options: RunOptions = {}): Promise<ConversionSummary> {
    const write = options.write ?? true;
    const hierarchy = await this.loadHierarchy();
    const xml = buildRekordboxXml(hierarchy, {
      productName: this.productName,
      productVersion: this.productVersion,
    });

    if (write) {
      await writeRekordboxXml(xml, this.output);
      this.logger.debug(`Wrote ${this.output}`);
    }

    return summarize(hierarchy, this.output, write);
  }

  /**
   * Record crate modification times for change detection.
   *
   * @throws {CrateRootNotFoundError} When the crate root is missing
   */
  async computeSnapshot(): Promise<CrateSnapshot> {
    await assertCrateRoot(this.crateRoot);
    return takeSnapshot(this.crateRoot);
  }

  /**
   * Decode every crate and reconcile the folder/playlist tree.
   */
  async loadHierarchy(): Promise<Hierarchy> {
    await assertCrateRoot(this.crateRoot);

    const crates: LoadedCrate[] = [];
    for (const entry of await listCrates(this.crateRoot)) {
      const tracks = await parseCrate(entry.path);
      this.logger.debug(`Loaded ${tracks.length} tracks from ${formatKey(entry.key)}`);
      crates.push({ key: entry.key, tracks });
    }

    return buildHierarchy(crates);
  }
}

/**
 * Summarize a reconciled hierarchy.
 *
 * @param hierarchy - Result of {@link buildHierarchy}
 * @param output - Destination XML file
 * @param written - Whether the file was written
 */
export function summarize(
  hierarchy: Hierarchy,
  output: string,
  written: boolean
): ConversionSummary {
  const playlistCounts = new Map<string, number>();
  let trackCount = 0;

  for (const playlist of hierarchy.playlists.values()) {
    playlistCounts.set(formatKey(playlist.key), playlist.tracks.length);
    trackCount += playlist.tracks.length;
  }

  return {
    output,
    written,
    playlistCounts,
    playlistCount: playlistCounts.size,
    trackCount,
  };
}

/**
 * Format a conversion summary as lines of text.
 */
export function summaryLines(summary: ConversionSummary): string[] {
  const lines = [
    `Playlists exported: ${summary.playlistCount}`,
    `Total tracks: ${summary.trackCount}`,
  ];

  if (summary.playlistCounts.size > 0) {
    lines.push('Breakdown:');
    for (const [name, count] of summary.playlistCounts) {
      lines.push(`  • ${name} (${count} tracks)`);
    }
  }

  return lines;
}

/**
 * Log each summary line at info level.
 */
export function logSummary(summary: ConversionSummary, logger: Logger): void {
  for (const line of summaryLines(summary)) {
    logger.info(line);
  }
}
