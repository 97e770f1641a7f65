/**
 * Generic reader for Serato's chunk format.
 *
 * Every record is a 4-byte tag, a 4-byte big-endian payload length and the
 * payload itself. Container chunks (such as `OTRK`) hold further records in
 * their payload, so the same reader is used at every nesting level.
 *
 * Format documentation:
 * - Mixxx Wiki: https://github.com/mixxxdj/mixxx/wiki/serato_database_format
 *
 * @module parsers/chunks
 */

/** Size of the tag + length header preceding every payload. */
export const CHUNK_HEADER_SIZE = 8;

/**
 * A single record from a chunk buffer.
 */
export interface Chunk {
  /** 4-character tag, invalid bytes replaced with U+FFFD */
  tag: string;
  /** View into the source buffer */
  payload: Buffer;
}

/**
 * Iterate over the chunks of a buffer.
 *
 * The returned iterable can be consumed any number of times; each pass starts
 * from the beginning of the buffer. Iteration stops at the first chunk whose
 * declared length runs past the end of the buffer, so truncated files yield
 * every complete chunk before the damage and nothing after it.
 *
 * @param data - Raw chunk data
 */
export function readChunks(data: Buffer): Iterable<Chunk> {
  return {
    *[Symbol.iterator](): Iterator<Chunk> {
      let offset = 0;

      while (offset + CHUNK_HEADER_SIZE <= data.length) {
        const tag = data.toString('utf8', offset, offset + 4);
        const length = data.readUInt32BE(offset + 4);
        const start = offset + CHUNK_HEADER_SIZE;
        const end = start + length;

        if (end > data.length) {
          return;
        }

        yield { tag, payload: data.subarray(start, end) };
        offset = end;
      }
    },
  };
}
