/**
 * Universal value comparison utilities.
 *
 * Provides the single ordering shared by the key domains and the expression
 * evaluator, so that a range computed over a domain agrees with the exact
 * re-evaluation of the predicate.
 *
 * @module utils/compare
 */

/**
 * Compare two values of the same primitive family.
 *
 * Comparison rules:
 * 1. Numbers (NaN is incomparable)
 * 2. BigInts
 * 3. Date objects (by timestamp; invalid dates are incomparable)
 * 4. Strings (UTF-16 code unit order, the same order as `<` on strings)
 * 5. Booleans (false < true)
 *
 * @returns -1, 0 or 1, or `undefined` when the values cannot be ordered
 *   against each other (different families, NaN, null/undefined)
 *
 * @example
 * ```typescript
 * compareValues(1, 2);        // -1
 * compareValues('b', 'a');    // 1
 * compareValues('B', 'a');    // -1 (code units, not locale)
 * compareValues(1, '1');      // undefined
 * ```
 */
export function compareValues(a: unknown, b: unknown): number | undefined {
  if (typeof a === 'number' && typeof b === 'number') {
    if (Number.isNaN(a) || Number.isNaN(b)) return undefined;
    return sign(a, b);
  }

  if (typeof a === 'bigint' && typeof b === 'bigint') {
    return sign(a, b);
  }

  if (a instanceof Date && b instanceof Date) {
    const timeA = a.getTime();
    const timeB = b.getTime();
    if (Number.isNaN(timeA) || Number.isNaN(timeB)) return undefined;
    return sign(timeA, timeB);
  }

  if (typeof a === 'string' && typeof b === 'string') {
    return sign(a, b);
  }

  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return a === b ? 0 : a ? 1 : -1;
  }

  return undefined;
}

/**
 * Structural equality used by `eq` / `neq` and `equals`.
 * Dates compare by timestamp; everything else by strict equality.
 */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }
  return a === b;
}

function sign<T extends number | bigint | string>(a: T, b: T): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
