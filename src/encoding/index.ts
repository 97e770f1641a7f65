/**
 * Encoding utilities for crate data.
 *
 * @module encoding
 */

export { decodeText } from './text.js';
