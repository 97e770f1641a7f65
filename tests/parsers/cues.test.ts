/**
 * Tests for the cue list parser.
 */

import { describe, it, expect } from 'vitest';
import { parseCueList } from '../../src/parsers/cues.js';
import { cueList } from '../fixtures/crateBuilder.js';

describe('Cue list parser', () => {
  it('returns no cue points for payloads shorter than the count', () => {
    expect(parseCueList(Buffer.alloc(0))).toEqual([]);
    expect(parseCueList(Buffer.from([0x00, 0x00, 0x01]))).toEqual([]);
  });

  it('parses index and position of each entry', () => {
    const result = parseCueList(cueList([
      { index: 0, position: 1.25 },
      { index: 3, position: 5.5 },
    ]));

    expect(result).toEqual([
      { index: 0, position: 1.25 },
      { index: 3, position: 5.5 },
    ]);
  });

  it('reads positions as single-precision floats', () => {
    const [cue] = parseCueList(cueList([{ index: 1, position: 12.345 }]));

    expect(cue.position).toBeCloseTo(12.345, 4);
  });

  it('stops at an incomplete entry', () => {
    const full = cueList([
      { index: 0, position: 1 },
      { index: 1, position: 2 },
    ]);

    // Drop the last 3 bytes of the second entry
    const result = parseCueList(full.subarray(0, full.length - 3));

    expect(result).toEqual([{ index: 0, position: 1 }]);
  });

  it('reads no more than the declared count', () => {
    const data = cueList([
      { index: 0, position: 1 },
      { index: 1, position: 2 },
    ]);
    data.writeUInt32BE(1, 0);

    expect(parseCueList(data)).toEqual([{ index: 0, position: 1 }]);
  });
});
