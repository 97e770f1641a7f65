/**
 * Parsers for Serato data formats.
 *
 * @module parsers
 */

export { readChunks, CHUNK_HEADER_SIZE, type Chunk } from './chunks.js';

export { parseCueList } from './cues.js';

export {
  CRATE_EXTENSION,
  CRATE_TAGS,
  decodeCrate,
  parseCrate,
  listCrates,
} from './crate.js';
