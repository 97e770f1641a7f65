/**
 * Tests for crate change detection.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { snapshotsEqual, takeSnapshot } from '../src/snapshot.js';
import { writeCrate } from './fixtures/crateBuilder.js';

describe('takeSnapshot', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'crate-bridge-snapshot-test-'));
  });

  afterEach(async () => {
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  it('records the modification time of every crate', async () => {
    const top = await writeCrate(tempDir, 'Top', []);
    const nested = await writeCrate(tempDir, 'Main/Nested', []);
    await fs.promises.utimes(top, 1_000, 1_000);
    await fs.promises.utimes(nested, 2_000, 2_000);

    const snapshot = await takeSnapshot(tempDir);

    expect(snapshot).toEqual(new Map([
      [nested, 2_000_000],
      [top, 1_000_000],
    ]));
  });

  it('includes crates in hidden directories', async () => {
    const hidden = await writeCrate(tempDir, '.Backup/Set', []);
    await fs.promises.utimes(hidden, 3_000, 3_000);

    expect(await takeSnapshot(tempDir)).toEqual(new Map([[hidden, 3_000_000]]));
  });

  it('changes when a crate is touched, added or removed', async () => {
    const crate = await writeCrate(tempDir, 'Crate', []);
    await fs.promises.utimes(crate, 1_000, 1_000);
    const before = await takeSnapshot(tempDir);

    expect(snapshotsEqual(before, await takeSnapshot(tempDir))).toBe(true);

    await fs.promises.utimes(crate, 1_500, 1_500);
    const touched = await takeSnapshot(tempDir);
    expect(snapshotsEqual(before, touched)).toBe(false);

    await writeCrate(tempDir, 'Another', []);
    const added = await takeSnapshot(tempDir);
    expect(snapshotsEqual(touched, added)).toBe(false);

    await fs.promises.rm(crate);
    const removed = await takeSnapshot(tempDir);
    expect(snapshotsEqual(added, removed)).toBe(false);
  });
});

describe('snapshotsEqual', () => {
  it('compares paths and times', () => {
    const a = new Map([['/a.crate', 1], ['/b.crate', 2]]);

    expect(snapshotsEqual(a, new Map([['/b.crate', 2], ['/a.crate', 1]]))).toBe(true);
    expect(snapshotsEqual(a, new Map([['/a.crate', 1], ['/c.crate', 2]]))).toBe(false);
    expect(snapshotsEqual(a, new Map([['/a.crate', 1]]))).toBe(false);
    expect(snapshotsEqual(new Map(), new Map())).toBe(true);
  });
});
