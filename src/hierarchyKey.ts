/**
 * Helpers for working with hierarchy keys by value.
 *
 * @module hierarchyKey
 */

import type { HierarchyKey } from './types.js';

/** Separator used by {@link keyId}. Cannot occur in a file name. */
const KEY_SEPARATOR = '\0';

/**
 * Stable string identity of a key, usable as a Map key.
 */
export function keyId(key: HierarchyKey): string {
  return key.join(KEY_SEPARATOR);
}

/**
 * Human-readable form of a key, e.g. `Main / Sub / Peak`.
 */
export function formatKey(key: HierarchyKey): string {
  return key.join(' / ');
}

/**
 * Compare two keys segment by segment.
 *
 * Segments are compared by UTF-16 code unit; when one key is a prefix of the
 * other the shorter one sorts first.
 */
export function compareKeys(a: HierarchyKey, b: HierarchyKey): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) {
      return a[i] < b[i] ? -1 : 1;
    }
  }
  return a.length - b.length;
}

/**
 * Whether `other` is longer than `key` and starts with all of its segments.
 */
export function isStrictPrefix(key: HierarchyKey, other: HierarchyKey): boolean {
  return other.length > key.length && key.every((segment, i) => other[i] === segment);
}

/**
 * Every non-empty prefix of `key` shorter than the key itself.
 */
export function strictPrefixes(key: HierarchyKey): HierarchyKey[] {
  const prefixes: HierarchyKey[] = [];
  for (let depth = 1; depth < key.length; depth++) {
    prefixes.push(key.slice(0, depth));
  }
  return prefixes;
}
