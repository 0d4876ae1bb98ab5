/**
 * Type-safe wrapper over sorted-btree for use in OrderedDictionary
 *
 * Provides O(log N) operations for:
 * - set/get/delete
 * - bounded forward and backward scans
 */

import BTree from 'sorted-btree';
import type { Comparator, ScanBound, ScanBounds } from './types';

/**
 * A sorted map implementation backed by a B+ tree.
 * Provides efficient bounded scans and ordered iteration.
 *
 * @template K - Key type (ordered by the comparator)
 * @template V - Value type
 */
export class SortedMap<K, V> {
  private readonly tree: BTree<K, V>;

  constructor(private readonly comparator: Comparator<K>) {
    this.tree = new BTree<K, V>(undefined, comparator);
  }

  /**
   * Set a key-value pair. Updates existing key if present.
   * Time complexity: O(log N)
   */
  set(key: K, value: V): this {
    this.tree.set(key, value);
    return this;
  }

  /**
   * Get the value for a key.
   * Time complexity: O(log N)
   */
  get(key: K): V | undefined {
    return this.tree.get(key);
  }

  /**
   * Delete a key from the map.
   * Time complexity: O(log N)
   * @returns true if the key existed and was deleted
   */
  delete(key: K): boolean {
    return this.tree.delete(key);
  }

  has(key: K): boolean {
    return this.tree.has(key);
  }

  get size(): number {
    return this.tree.size;
  }

  clear(): void {
    this.tree.clear();
  }

  /**
   * Iterate over all entries in sorted order.
   * Time complexity: O(N)
   */
  *entries(): IterableIterator<[K, V]> {
    for (const entry of this.tree.entries()) {
      yield entry;
    }
  }

  /**
   * Iterate over entries between two optional bounds.
   * Time complexity: O(log N + K) where K is the number of results
   *
   * Crossed bounds yield nothing.
   */
  *scan(bounds: ScanBounds<K> = {}): IterableIterator<[K, V]> {
    const { from, to, reverse = false } = bounds;

    if (reverse) {
      // Start at the upper seek key and walk down until the lower end is passed
      for (const [key, value] of this.tree.entriesReversed(to?.key)) {
        if (to && !this.withinUpper(key, to)) continue;
        if (from && !this.withinLower(key, from)) break;
        yield [key, value];
      }
      return;
    }

    // Start at the lower seek key and walk up until the upper end is passed
    for (const [key, value] of this.tree.entries(from?.key)) {
      if (from && !this.withinLower(key, from)) continue;
      if (to && !this.withinUpper(key, to)) break;
      yield [key, value];
    }
  }

  private withinLower(key: K, bound: ScanBound<K>): boolean {
    const cmp = this.comparator(key, bound.key);
    return bound.inclusive ? cmp >= 0 : cmp > 0;
  }

  private withinUpper(key: K, bound: ScanBound<K>): boolean {
    const cmp = this.comparator(key, bound.key);
    return bound.inclusive ? cmp <= 0 : cmp < 0;
  }
}
