/**
 * Parse the cue list stored in a crate track's `pcue` chunk.
 *
 * @module parsers/cues
 */

import type { CuePoint } from '../types.js';

/**
 * Size of each cue entry in bytes.
 * - 4 bytes: index (uint32 BE)
 * - 4 bytes: position in seconds (float32 BE)
 */
const CUE_ENTRY_SIZE = 8;

/**
 * Decode a cue list payload.
 *
 * Structure:
 * - 4 bytes: entry count (uint32 BE)
 * - Entries (8 bytes each)
 *
 * Reading stops at the declared count or at the first incomplete entry,
 * whichever comes first.
 *
 * @param data - `pcue` payload
 * @returns Cue points in stored order
 */
export function parseCueList(data: Buffer): CuePoint[] {
  if (data.length < 4) {
    return [];
  }

  const count = data.readUInt32BE(0);
  const cuePoints: CuePoint[] = [];
  let offset = 4;

  for (let i = 0; i < count; i++) {
    if (offset + CUE_ENTRY_SIZE > data.length) {
      break;
    }
    cuePoints.push({
      index: data.readUInt32BE(offset),
      position: data.readFloatBE(offset + 4),
    });
    offset += CUE_ENTRY_SIZE;
  }

  return cuePoints;
}
