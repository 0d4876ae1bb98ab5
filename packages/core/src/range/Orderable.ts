/**
 * Key domains.
 *
 * A domain supplies the total order of a key type and a runtime guard used
 * to recognise constants of that type. Text domains additionally know how
 * to compute the successor of a prefix, which is what `startsWith`,
 * `equals` and two-argument compare idioms need. Keeping the two
 * capabilities apart lets numeric and date keys use the extractor without
 * any string-only operations.
 *
 * @module range/Orderable
 */

import type { Comparator } from '../ds/types';

/**
 * Total order over a key type.
 */
export interface Orderable<T> {
  /** Domain name used in diagnostics */
  readonly name: string;

  /** Three-way comparison: negative, zero or positive */
  compare: Comparator<T>;

  /** Whether an arbitrary value belongs to this domain */
  isValue(value: unknown): value is T;
}

/**
 * Total order over a string-like key type.
 */
export interface OrderableText<T> extends Orderable<T> {
  /**
   * Smallest value greater than every value that starts with `prefix`.
   * Returns undefined when no such value exists (the empty prefix, or a
   * prefix made only of maximal units), meaning "no upper limit".
   */
  prefixSuccessor(prefix: T): T | undefined;
}

export function isOrderableText<T>(domain: Orderable<T>): domain is OrderableText<T> {
  return 'prefixSuccessor' in domain && typeof domain.prefixSuccessor === 'function';
}

function naturalOrder<T extends number | bigint | string>(a: T, b: T): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export const numberDomain: Orderable<number> = {
  name: 'number',
  compare: naturalOrder,
  isValue: (value: unknown): value is number =>
    typeof value === 'number' && !Number.isNaN(value),
};

export const bigintDomain: Orderable<bigint> = {
  name: 'bigint',
  compare: naturalOrder,
  isValue: (value: unknown): value is bigint => typeof value === 'bigint',
};

export const dateDomain: Orderable<Date> = {
  name: 'date',
  compare: (a, b) => naturalOrder(a.getTime(), b.getTime()),
  isValue: (value: unknown): value is Date =>
    value instanceof Date && !Number.isNaN(value.getTime()),
};

const MAX_CODE_UNIT = 0xffff;

/**
 * Strings ordered by UTF-16 code unit, the order of `<` on strings.
 * Locale-aware ordering would break prefix successors, so it is not offered.
 */
export const stringDomain: OrderableText<string> = {
  name: 'string',
  compare: naturalOrder,
  isValue: (value: unknown): value is string => typeof value === 'string',
  prefixSuccessor(prefix: string): string | undefined {
    let end = prefix.length;
    while (end > 0 && prefix.charCodeAt(end - 1) === MAX_CODE_UNIT) {
      end--;
    }
    if (end === 0) return undefined;
    return prefix.slice(0, end - 1) + String.fromCharCode(prefix.charCodeAt(end - 1) + 1);
  },
};

/**
 * Build a domain from a custom comparator.
 *
 * @example
 * ```typescript
 * const byLength = createDomain<string>(
 *   'length',
 *   (a, b) => a.length - b.length || (a < b ? -1 : a > b ? 1 : 0),
 *   (v): v is string => typeof v === 'string'
 * );
 * ```
 */
export function createDomain<T>(
  name: string,
  compare: Comparator<T>,
  isValue: (value: unknown) => value is T
): Orderable<T> {
  return { name, compare, isValue };
}
