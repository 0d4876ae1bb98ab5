/**
 * OrderedDictionary
 *
 * Key-ordered in-memory dictionary that answers predicates with a bounded
 * index scan: the predicate is reduced to a key range, only that range is
 * scanned, and the predicate is evaluated exactly on every candidate.
 *
 * Predicates see each entry as `{ key, value }`, so the key is reached with
 * `Expressions.key('key')`.
 *
 * @module collection/OrderedDictionary
 */

import { resolveScanOptions, type ResolvedScanOptions, type ScanOptions } from '../config/ScanConfig';
import { SortedMap } from '../ds/SortedMap';
import type { ScanBound } from '../ds/types';
import { InvalidArgumentError } from '../errors';
import { evaluatePredicate, type ValueComparator } from '../expression/evaluate';
import type { Expression } from '../expression/Expression';
import { getKeyRange } from '../extraction/KeyRangeExtractor';
import type { KeyBoundary } from '../range/KeyBoundary';
import { KeyRange } from '../range/KeyRange';
import type { Orderable } from '../range/Orderable';
import { compareValues } from '../utils/compare';
import { logger } from '../utils/logger';

/** Member name under which predicates find the entry key. */
export const KEY_FIELD = 'key';

export interface DictionaryEntry<K, V> {
  readonly key: K;
  readonly value: V;
}

export class OrderedDictionary<K, V> {
  private readonly map: SortedMap<K, V>;

  /** Ordering for predicate evaluation: the domain's own for keys, compareValues otherwise */
  private readonly compare: ValueComparator = (a, b) =>
    this.domain.isValue(a) && this.domain.isValue(b) ? this.domain.compare(a, b) : compareValues(a, b);

  constructor(
    readonly domain: Orderable<K>,
    entries?: Iterable<readonly [K, V]>
  ) {
    this.map = new SortedMap<K, V>(domain.compare);
    if (entries) {
      for (const [key, value] of entries) {
        this.set(key, value);
      }
    }
  }

  get size(): number {
    return this.map.size;
  }

  /**
   * @throws InvalidArgumentError when `key` is not a value of the domain
   */
  set(key: K, value: V): this {
    if (!this.domain.isValue(key)) {
      throw new InvalidArgumentError('key', `expected a ${this.domain.name} key`);
    }
    this.map.set(key, value);
    return this;
  }

  get(key: K): V | undefined {
    return this.map.get(key);
  }

  has(key: K): boolean {
    return this.map.has(key);
  }

  delete(key: K): boolean {
    return this.map.delete(key);
  }

  clear(): void {
    this.map.clear();
  }

  *entries(): IterableIterator<DictionaryEntry<K, V>> {
    for (const [key, value] of this.map.entries()) {
      yield { key, value };
    }
  }

  /**
   * Key range that `where(predicate)` scans.
   */
  explain(predicate: Expression): KeyRange<K> {
    return getKeyRange(predicate, KEY_FIELD, this.domain);
  }

  /**
   * Entries whose keys lie in `range`, ascending unless `reverse` is set.
   *
   * @throws InvalidArgumentError for invalid options
   */
  scan(range: KeyRange<K>, options?: ScanOptions): IterableIterator<DictionaryEntry<K, V>> {
    const resolved = resolveScanOptions(options);
    return this.scanRange(range, resolved);
  }

  /**
   * Entries matching `predicate`, found by scanning only the predicate's key range.
   * `limit` counts matches, not scanned candidates.
   *
   * @throws InvalidArgumentError for a missing predicate or invalid options
   */
  where(predicate: Expression, options?: ScanOptions): IterableIterator<DictionaryEntry<K, V>> {
    const range = this.explain(predicate);
    const resolved = resolveScanOptions(options);
    logger.debug({ range: range.toString(), reverse: resolved.reverse }, 'Scanning key range');
    return this.filterRange(predicate, range, resolved);
  }

  private *filterRange(
    predicate: Expression,
    range: KeyRange<K>,
    options: ResolvedScanOptions
  ): IterableIterator<DictionaryEntry<K, V>> {
    let candidates = 0;
    let matches = 0;

    for (const entry of this.scanRange(range, { reverse: options.reverse })) {
      candidates++;
      if (!evaluatePredicate(predicate, entry, { compare: this.compare })) continue;

      matches++;
      yield entry;
      if (options.limit !== undefined && matches >= options.limit) break;
    }

    logger.debug({ range: range.toString(), candidates, matches }, 'Key range scan complete');
  }

  private *scanRange(
    range: KeyRange<K>,
    options: ResolvedScanOptions
  ): IterableIterator<DictionaryEntry<K, V>> {
    if (range.isEmpty()) return;

    let yielded = 0;
    for (const [key, value] of this.map.scan({
      from: toScanBound(range.lower),
      to: toScanBound(range.upper),
      reverse: options.reverse,
    })) {
      yield { key, value };
      yielded++;
      if (options.limit !== undefined && yielded >= options.limit) return;
    }
  }
}

function toScanBound<K>(boundary: KeyBoundary<K>): ScanBound<K> | undefined {
  return boundary.kind === 'bounded'
    ? { key: boundary.value, inclusive: boundary.inclusive }
    : undefined;
}
