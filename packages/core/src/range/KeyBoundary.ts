/**
 * KeyBoundary
 *
 * One edge of a key range: a value with an inclusive flag, or Unbounded.
 * Whether a boundary acts as a lower or an upper edge is decided by its
 * position in the range, so the ordering helpers come in two flavours.
 *
 * @module range/KeyBoundary
 */

import { UnsupportedDomainError } from '../errors';
import { isOrderableText, type Orderable } from './Orderable';

export interface BoundedBoundary<T> {
  readonly kind: 'bounded';
  readonly value: T;
  readonly inclusive: boolean;
}

export interface UnboundedBoundary {
  readonly kind: 'unbounded';
}

export type KeyBoundary<T> = BoundedBoundary<T> | UnboundedBoundary;

/** −∞ as a lower boundary, +∞ as an upper boundary. */
export const Unbounded: UnboundedBoundary = Object.freeze({ kind: 'unbounded' });

export function createBoundary<T>(value: T, inclusive: boolean): BoundedBoundary<T> {
  return { kind: 'bounded', value, inclusive };
}

/**
 * Exclusive upper boundary just past every value prefixed by `value`.
 *
 * `"ab"` yields an exclusive boundary at `"ac"`. When the prefix has no
 * successor (the empty string, or only U+FFFF units) the result is Unbounded.
 *
 * @throws UnsupportedDomainError when the domain is not text-like
 */
export function createPrefixBoundary<T>(domain: Orderable<T>, value: T): KeyBoundary<T> {
  if (!isOrderableText(domain)) {
    throw new UnsupportedDomainError(domain.name, 'prefix boundaries');
  }
  const successor = domain.prefixSuccessor(value);
  return successor === undefined ? Unbounded : createBoundary(successor, false);
}

export function isBounded<T>(boundary: KeyBoundary<T>): boundary is BoundedBoundary<T> {
  return boundary.kind === 'bounded';
}

/**
 * Order two lower boundaries. At equal values an inclusive boundary
 * admits more keys, so it sorts first.
 */
export function compareLowerBoundaries<T>(
  domain: Orderable<T>,
  a: KeyBoundary<T>,
  b: KeyBoundary<T>
): number {
  if (a.kind === 'unbounded') return b.kind === 'unbounded' ? 0 : -1;
  if (b.kind === 'unbounded') return 1;

  const cmp = domain.compare(a.value, b.value);
  if (cmp !== 0) return cmp;
  if (a.inclusive === b.inclusive) return 0;
  return a.inclusive ? -1 : 1;
}

/**
 * Order two upper boundaries. At equal values an exclusive boundary
 * admits fewer keys, so it sorts first.
 */
export function compareUpperBoundaries<T>(
  domain: Orderable<T>,
  a: KeyBoundary<T>,
  b: KeyBoundary<T>
): number {
  if (a.kind === 'unbounded') return b.kind === 'unbounded' ? 0 : 1;
  if (b.kind === 'unbounded') return -1;

  const cmp = domain.compare(a.value, b.value);
  if (cmp !== 0) return cmp;
  if (a.inclusive === b.inclusive) return 0;
  return a.inclusive ? 1 : -1;
}

/**
 * Whether `value` satisfies `boundary` acting on the given side.
 */
export function admits<T>(
  domain: Orderable<T>,
  boundary: KeyBoundary<T>,
  side: 'lower' | 'upper',
  value: T
): boolean {
  if (boundary.kind === 'unbounded') return true;

  const cmp = domain.compare(value, boundary.value);
  if (cmp === 0) return boundary.inclusive;
  return side === 'lower' ? cmp > 0 : cmp < 0;
}

export function boundariesEqual<T>(
  domain: Orderable<T>,
  a: KeyBoundary<T>,
  b: KeyBoundary<T>
): boolean {
  if (a.kind === 'unbounded' || b.kind === 'unbounded') return a.kind === b.kind;
  return a.inclusive === b.inclusive && domain.compare(a.value, b.value) === 0;
}

/**
 * Interval-notation fragment: `[5`, `(5`, `(-∞` for lower; `5]`, `5)`, `+∞)` for upper.
 */
export function boundaryToString<T>(boundary: KeyBoundary<T>, side: 'lower' | 'upper'): string {
  if (boundary.kind === 'unbounded') {
    return side === 'lower' ? '(-∞' : '+∞)';
  }
  const value = formatValue(boundary.value);
  if (side === 'lower') {
    return `${boundary.inclusive ? '[' : '('}${value}`;
  }
  return `${value}${boundary.inclusive ? ']' : ')'}`;
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(value);
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'bigint') return `${value}n`;
  return String(value);
}
