/**
 * Partial-key index: fixed-length key prefix → full keys sharing it
 *
 * Invariants:
 * - Every stored key is in the bucket for prefixOf(key)
 * - Buckets only hold keys that exist in the owning record map
 * - remove() may leave an empty bucket behind; lookups and comparisons ignore empty buckets
 * - rebuild() over a key set and any insert/remove sequence reaching the same set
 *   produce equal indexes (see equals())
 *
 * Prefix length is counted in characters (code points), not UTF-16 units.
 */

import { compareKeys } from "./format.js";

/** Number of leading characters that select a bucket */
export const PARTIAL_KEY_LENGTH = 5;

/**
 * Bucket a key belongs to: its first PARTIAL_KEY_LENGTH characters, or the whole key if shorter
 */
export function prefixOf(key: string): string {
  const chars = Array.from(key);
  return chars.length <= PARTIAL_KEY_LENGTH ? key : chars.slice(0, PARTIAL_KEY_LENGTH).join("");
}

function charLength(value: string): number {
  return Array.from(value).length;
}

export class PartialKeyIndex {
  #buckets = new Map<string, Set<string>>();

  /**
   * Build an index from scratch over a set of keys
   */
  static rebuild(keys: Iterable<string>): PartialKeyIndex {
    const index = new PartialKeyIndex();
    for (const key of keys) {
      index.insert(key);
    }
    return index;
  }

  /**
   * Add a key to its bucket (idempotent)
   */
  insert(key: string): void {
    const prefix = prefixOf(key);
    let bucket = this.#buckets.get(prefix);
    if (!bucket) {
      bucket = new Set();
      this.#buckets.set(prefix, bucket);
    }
    bucket.add(key);
  }

  /**
   * Remove a key from its bucket; the bucket itself stays, possibly empty
   */
  remove(key: string): void {
    this.#buckets.get(prefixOf(key))?.delete(key);
  }

  /**
   * Full keys that start with `partial`, sorted
   *
   * A query of at least PARTIAL_KEY_LENGTH characters reads one bucket. A
   * shorter one may match keys in many buckets, so every bucket whose prefix
   * and the query are prefixes of one another is scanned. Either way the
   * candidates are filtered by a literal prefix test.
   */
  lookup(partial: string): string[] {
    if (partial === "") {
      return [];
    }

    const matches: string[] = [];

    if (charLength(partial) >= PARTIAL_KEY_LENGTH) {
      for (const key of this.#buckets.get(prefixOf(partial)) ?? []) {
        if (key.startsWith(partial)) {
          matches.push(key);
        }
      }
    } else {
      for (const [prefix, bucket] of this.#buckets) {
        if (!prefix.startsWith(partial) && !partial.startsWith(prefix)) continue;

        for (const key of bucket) {
          if (key.startsWith(partial)) {
            matches.push(key);
          }
        }
      }
    }

    return matches.sort(compareKeys);
  }

  /**
   * Whether a key is indexed
   */
  has(key: string): boolean {
    return this.#buckets.get(prefixOf(key))?.has(key) ?? false;
  }

  /**
   * Number of indexed keys
   */
  get size(): number {
    let total = 0;
    for (const bucket of this.#buckets.values()) {
      total += bucket.size;
    }
    return total;
  }

  /**
   * Non-empty buckets as prefix → sorted keys, prefixes in sorted order
   */
  toJSON(): Record<string, string[]> {
    return Object.fromEntries(
      [...this.#buckets]
        .filter(([, bucket]) => bucket.size > 0)
        .sort(([a], [b]) => compareKeys(a, b))
        .map(([prefix, bucket]) => [prefix, [...bucket].sort(compareKeys)])
    );
  }

  /**
   * Bucket-for-bucket equality, ignoring empty buckets
   */
  equals(other: PartialKeyIndex): boolean {
    return JSON.stringify(this.toJSON()) === JSON.stringify(other.toJSON());
  }
}
