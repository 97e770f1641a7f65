/**
 * Decoding of text values stored in crate chunks.
 *
 * @module encoding/text
 */

/**
 * Decode a length-prefixed UTF-8 string.
 *
 * Layout:
 * - 4 bytes: byte length (uint32 BE)
 * - N bytes: UTF-8 text, optionally ending in a NUL
 *
 * Payloads shorter than the prefix are decoded as bare text. A declared
 * length larger than the payload is clamped to what is there. Invalid UTF-8
 * becomes U+FFFD.
 *
 * @param payload - Chunk payload
 * @returns Decoded text, `''` for an empty payload
 */
export function decodeText(payload: Buffer): string {
  if (payload.length === 0) {
    return '';
  }

  let text: string;
  if (payload.length < 4) {
    text = payload.toString('utf8');
  } else {
    const length = payload.readUInt32BE(0);
    text = payload.subarray(4, 4 + length).toString('utf8');
  }

  return text.endsWith('\0') ? text.slice(0, -1) : text;
}
