/**
 * KeyRange
 *
 * A single contiguous interval of keys, each side independently bounded or
 * unbounded. A crossed range (lower above upper) stands for "no keys" and
 * stays representable; scans over it yield nothing.
 *
 * Union is the smallest enclosing interval, not a set union: OR of disjoint
 * conditions scans the gap between them too. Callers re-apply the exact
 * predicate, so the extra keys only cost time.
 *
 * @module range/KeyRange
 */

import {
  Unbounded,
  admits,
  boundariesEqual,
  boundaryToString,
  compareLowerBoundaries,
  compareUpperBoundaries,
  createBoundary,
  type KeyBoundary,
} from './KeyBoundary';
import type { Orderable } from './Orderable';

export class KeyRange<T> {
  constructor(
    readonly domain: Orderable<T>,
    readonly lower: KeyBoundary<T> = Unbounded,
    readonly upper: KeyBoundary<T> = Unbounded
  ) {}

  /**
   * The unrestricted range: identity of intersect, absorbing element of union.
   */
  static open<T>(domain: Orderable<T>): KeyRange<T> {
    return new KeyRange(domain, Unbounded, Unbounded);
  }

  /** `[value, value]` */
  static only<T>(domain: Orderable<T>, value: T): KeyRange<T> {
    const boundary = createBoundary(value, true);
    return new KeyRange(domain, boundary, boundary);
  }

  /**
   * Fold ranges with intersect. An empty list is unrestricted.
   */
  static intersectAll<T>(domain: Orderable<T>, ranges: Iterable<KeyRange<T>>): KeyRange<T> {
    let result = KeyRange.open(domain);
    for (const range of ranges) {
      result = result.intersect(range);
    }
    return result;
  }

  /**
   * Fold ranges with union. An empty list is unrestricted, since "no
   * information" must never narrow a scan.
   */
  static unionAll<T>(domain: Orderable<T>, ranges: Iterable<KeyRange<T>>): KeyRange<T> {
    let result: KeyRange<T> | undefined;
    for (const range of ranges) {
      result = result ? result.union(range) : range;
    }
    return result ?? KeyRange.open(domain);
  }

  isOpen(): boolean {
    return this.lower.kind === 'unbounded' && this.upper.kind === 'unbounded';
  }

  /**
   * True when no key can satisfy both boundaries.
   */
  isEmpty(): boolean {
    if (this.lower.kind === 'unbounded' || this.upper.kind === 'unbounded') {
      return false;
    }
    const cmp = this.domain.compare(this.lower.value, this.upper.value);
    if (cmp !== 0) return cmp > 0;
    return !(this.lower.inclusive && this.upper.inclusive);
  }

  contains(value: T): boolean {
    return (
      admits(this.domain, this.lower, 'lower', value) &&
      admits(this.domain, this.upper, 'upper', value)
    );
  }

  /**
   * Greater lower boundary, lesser upper boundary.
   */
  intersect(other: KeyRange<T>): KeyRange<T> {
    const lower =
      compareLowerBoundaries(this.domain, this.lower, other.lower) >= 0 ? this.lower : other.lower;
    const upper =
      compareUpperBoundaries(this.domain, this.upper, other.upper) <= 0 ? this.upper : other.upper;
    return new KeyRange(this.domain, lower, upper);
  }

  /**
   * Smallest interval enclosing both operands. An empty operand contributes
   * nothing, so the other operand is returned as is.
   */
  union(other: KeyRange<T>): KeyRange<T> {
    if (this.isEmpty()) return other;
    if (other.isEmpty()) return this;

    const lower =
      compareLowerBoundaries(this.domain, this.lower, other.lower) <= 0 ? this.lower : other.lower;
    const upper =
      compareUpperBoundaries(this.domain, this.upper, other.upper) >= 0 ? this.upper : other.upper;
    return new KeyRange(this.domain, lower, upper);
  }

  /**
   * Conservative complement.
   *
   * Only one-sided ranges have a one-interval complement:
   * `[v, +∞)` ↔ `(-∞, v)` and `(v, +∞)` ↔ `(-∞, v]`. Everything else
   * (two-sided, empty or open) inverts to the open range.
   */
  invert(): KeyRange<T> {
    const { lower, upper } = this;

    if (lower.kind === 'bounded' && upper.kind === 'unbounded') {
      return new KeyRange(this.domain, Unbounded, createBoundary(lower.value, !lower.inclusive));
    }
    if (lower.kind === 'unbounded' && upper.kind === 'bounded') {
      return new KeyRange(this.domain, createBoundary(upper.value, !upper.inclusive), Unbounded);
    }
    return KeyRange.open(this.domain);
  }

  equals(other: KeyRange<T>): boolean {
    return (
      boundariesEqual(this.domain, this.lower, other.lower) &&
      boundariesEqual(this.domain, this.upper, other.upper)
    );
  }

  toString(): string {
    return `${boundaryToString(this.lower, 'lower')}, ${boundaryToString(this.upper, 'upper')}`;
  }
}
