/**
 * Rekordbox XML export.
 *
 * @module rekordbox
 */

export {
  buildRekordboxXml,
  writeRekordboxXml,
  trackDisplayName,
  formatPosition,
  type RekordboxDocumentOptions,
} from './document.js';

export { encodeUrlPath, toFileUrl, trackLocation } from './location.js';

export { escapeXml } from './xmlElement.js';
