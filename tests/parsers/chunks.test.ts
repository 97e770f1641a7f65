/**
 * Tests for the chunk reader.
 */

import { describe, it, expect } from 'vitest';
import { readChunks } from '../../src/parsers/chunks.js';
import { chunk, createCrateBuffer } from '../fixtures/crateBuilder.js';

describe('Chunk reader', () => {
  it('yields nothing for an empty buffer', () => {
    expect([...readChunks(Buffer.alloc(0))]).toEqual([]);
  });

  it('yields nothing when fewer than 8 bytes remain', () => {
    expect([...readChunks(Buffer.from([0x4f, 0x54, 0x52, 0x4b, 0x00, 0x00, 0x00]))]).toEqual([]);
  });

  it('reads consecutive chunks', () => {
    const data = Buffer.concat([
      chunk('abcd', Buffer.from([0x01, 0x02])),
      chunk('efgh', Buffer.alloc(0)),
      chunk('ijkl', Buffer.from('xyz')),
    ]);

    const chunks = [...readChunks(data)];

    expect(chunks.map(c => c.tag)).toEqual(['abcd', 'efgh', 'ijkl']);
    expect([...chunks[0].payload]).toEqual([0x01, 0x02]);
    expect(chunks[1].payload.length).toBe(0);
    expect(chunks[2].payload.toString()).toBe('xyz');
  });

  it('stops before a chunk whose payload overruns the buffer', () => {
    const complete = chunk('good', Buffer.from('ok'));
    const broken = Buffer.concat([
      Buffer.from('bad!'),
      Buffer.from([0x00, 0x00, 0x00, 0x10]), // Length: 16 bytes
      Buffer.from('short'), // Only 5 present
    ]);

    const chunks = [...readChunks(Buffer.concat([complete, broken, complete]))];

    expect(chunks.map(c => c.tag)).toEqual(['good']);
  });

  it('can be iterated more than once', () => {
    const chunks = readChunks(Buffer.concat([chunk('aaaa', Buffer.from('1')), chunk('bbbb', Buffer.from('2'))]));

    expect([...chunks].map(c => c.tag)).toEqual(['aaaa', 'bbbb']);
    expect([...chunks].map(c => c.tag)).toEqual(['aaaa', 'bbbb']);
  });

  it('replaces invalid tag bytes instead of failing', () => {
    const data = Buffer.concat([Buffer.from([0xff, 0x41, 0x42, 0x43]), Buffer.from([0, 0, 0, 1]), Buffer.from('x')]);

    const [first] = [...readChunks(data)];

    expect(first.tag).toBe('\uFFFDABC');
    expect(first.payload.toString()).toBe('x');
  });

  it('never yields payloads outside the buffer for any truncation', () => {
    const data = createCrateBuffer([
      { path: '/music/a.mp3', title: 'A', cues: [{ index: 0, position: 1.5 }] },
      { path: '/music/b.mp3' },
    ]);
    const fullCount = [...readChunks(data)].length;

    for (let end = 0; end <= data.length; end++) {
      const truncated = data.subarray(0, end);
      const chunks = [...readChunks(truncated)];

      expect(chunks.length).toBeLessThanOrEqual(fullCount);
      for (const { payload } of chunks) {
        expect(payload.byteOffset + payload.length).toBeLessThanOrEqual(
          truncated.byteOffset + truncated.length
        );
      }
    }
  });
});
