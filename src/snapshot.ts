/**
 * Change detection for crate folders.
 *
 * @module snapshot
 */

import * as fs from 'node:fs';
import { listCrates } from './parsers/index.js';
import type { CrateSnapshot } from './types.js';

/**
 * Record the modification time of every crate below a root.
 *
 * The snapshot is only a value to compare against a later one; any added,
 * removed or touched crate makes the two differ.
 *
 * @param crateRoot - Directory holding the crates
 * @returns Modification times (ms) keyed by absolute crate path
 */
export async function takeSnapshot(crateRoot: string): Promise<CrateSnapshot> {
  const snapshot: CrateSnapshot = new Map();

  for (const crate of await listCrates(crateRoot)) {
    const stat = await fs.promises.stat(crate.path);
    snapshot.set(crate.path, stat.mtimeMs);
  }

  return snapshot;
}

/**
 * Whether two snapshots list the same crates with the same times.
 */
export function snapshotsEqual(a: CrateSnapshot, b: CrateSnapshot): boolean {
  if (a.size !== b.size) {
    return false;
  }
  for (const [cratePath, mtime] of a) {
    if (b.get(cratePath) !== mtime) {
      return false;
    }
  }
  return true;
}
