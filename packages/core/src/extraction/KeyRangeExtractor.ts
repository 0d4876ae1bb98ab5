/**
 * KeyRangeExtractor
 *
 * Walks a predicate and computes a key range that contains every record the
 * predicate can match. The range is an over-approximation: shapes that are
 * not recognised widen to the open range, never narrow it, and callers must
 * re-apply the predicate to each scanned record.
 *
 * Recognised shapes, with `K` the key member of the input record and `c` a
 * constant of the key domain:
 *
 * - `A && B`, `A || B`, `!A` (negation pushed down with De Morgan)
 * - `K op c` and `c op K` for `==`, `<`, `<=`, `>`, `>=`
 * - `K.compareTo(c) op 0` and `0 op K.compareTo(c)`
 * - text keys: `compare(K, c) op 0`, `compare(c, K) op 0` and the mirrored forms
 * - text keys: `K.equals(c)`, `K.startsWith(c)`
 *
 * @module extraction/KeyRangeExtractor
 */

import { InvalidArgumentError } from '../errors';
import {
  reverseComparison,
  type ComparisonExpression,
  type ComparisonOperator,
  type Expression,
} from '../expression/Expression';
import { Unbounded, createBoundary, createPrefixBoundary } from '../range/KeyBoundary';
import { KeyRange } from '../range/KeyRange';
import { isOrderableText, type Orderable } from '../range/Orderable';
import { logger } from '../utils/logger';
import { tryGetIntegerConstant, tryGetKeyConstant, type ConstantResult } from './ConstantExtractor';

/** The five comparisons that map directly onto a range. */
type RangeOperator = Exclude<ComparisonOperator, 'neq'>;

/**
 * A comparison normalised to `K op value`.
 */
interface KeyComparison<T> {
  op: ComparisonOperator;
  value: T;
}

/**
 * Compute a key range containing every match of `predicate`.
 *
 * @param predicate - Predicate over one input record
 * @param keyFieldName - Name of the record member holding the key
 * @param domain - Ordering of the key type
 * @throws InvalidArgumentError when `predicate` or `keyFieldName` is missing
 *
 * @example
 * ```typescript
 * const E = Expressions;
 * getKeyRange(E.lessThan(E.key('id'), E.constant(5)), 'id', numberDomain).toString();
 * // '(-∞, 5)'
 * ```
 */
export function getKeyRange<T>(
  predicate: Expression | null | undefined,
  keyFieldName: string | null | undefined,
  domain: Orderable<T>
): KeyRange<T> {
  if (predicate == null) {
    throw new InvalidArgumentError('predicate', 'a predicate expression is required');
  }
  if (keyFieldName == null) {
    throw new InvalidArgumentError('keyFieldName', 'a key field name is required');
  }

  return getKeyRangeOfSubtree(predicate, keyFieldName, domain);
}

/**
 * Key range containing every record for which `node` is false.
 */
export function getNegationOf<T>(
  node: Expression,
  keyFieldName: string,
  domain: Orderable<T>
): KeyRange<T> {
  switch (node.kind) {
    case 'not':
      return getKeyRangeOfSubtree(node.operand, keyFieldName, domain);

    case 'and':
      // !(A && B) -> !A || !B
      return getNegationOf(node.left, keyFieldName, domain).union(
        getNegationOf(node.right, keyFieldName, domain)
      );

    case 'or':
      // !(A || B) -> !A && !B
      return getNegationOf(node.left, keyFieldName, domain).intersect(
        getNegationOf(node.right, keyFieldName, domain)
      );

    case 'comparison':
      switch (node.op) {
        case 'eq':
          // Everything but one key is not a single interval
          return KeyRange.open(domain);
        case 'neq':
          return getKeyRangeOfSubtree({ ...node, op: 'eq' }, keyFieldName, domain);
        default:
          return getKeyRangeOfSubtree(node, keyFieldName, domain).invert();
      }

    default:
      return KeyRange.open(domain);
  }
}

function getKeyRangeOfSubtree<T>(
  node: Expression,
  keyFieldName: string,
  domain: Orderable<T>
): KeyRange<T> {
  switch (node.kind) {
    case 'and':
      return getKeyRangeOfSubtree(node.left, keyFieldName, domain).intersect(
        getKeyRangeOfSubtree(node.right, keyFieldName, domain)
      );

    case 'or':
      return getKeyRangeOfSubtree(node.left, keyFieldName, domain).union(
        getKeyRangeOfSubtree(node.right, keyFieldName, domain)
      );

    case 'not':
      return getNegationOf(node.operand, keyFieldName, domain);

    case 'call':
      if (
        isOrderableText(domain) &&
        (node.method === 'equals' || node.method === 'startsWith') &&
        isKeyAccess(node.target, keyFieldName)
      ) {
        const constant = tryGetKeyConstant(node.argument, domain);
        if (constant.found) {
          const lower = createBoundary(constant.value, true);
          return node.method === 'equals'
            ? new KeyRange(domain, lower, lower)
            : new KeyRange(domain, lower, createPrefixBoundary(domain, constant.value));
        }
      }
      break;

    case 'comparison': {
      const comparison = matchKeyComparison(node, keyFieldName, domain);
      if (comparison && comparison.op !== 'neq') {
        return rangeForComparison(domain, comparison.op, comparison.value);
      }
      break;
    }

    default:
      break;
  }

  logger.trace({ kind: node.kind, keyFieldName }, 'Unrecognized predicate shape, widening to open range');
  return KeyRange.open(domain);
}

function rangeForComparison<T>(domain: Orderable<T>, op: RangeOperator, value: T): KeyRange<T> {
  switch (op) {
    case 'eq':
      return KeyRange.only(domain, value);
    case 'lt':
      return new KeyRange(domain, Unbounded, createBoundary(value, false));
    case 'lte':
      return new KeyRange(domain, Unbounded, createBoundary(value, true));
    case 'gt':
      return new KeyRange(domain, createBoundary(value, false), Unbounded);
    case 'gte':
      return new KeyRange(domain, createBoundary(value, true), Unbounded);
  }
}

/**
 * Normalise a comparison involving the key and a constant to `K op value`.
 */
function matchKeyComparison<T>(
  node: ComparisonExpression,
  keyFieldName: string,
  domain: Orderable<T>
): KeyComparison<T> | undefined {
  return (
    matchSimpleComparison(node, keyFieldName, domain) ??
    matchCompareToComparison(node, keyFieldName, domain) ??
    (isOrderableText(domain) ? matchStaticCompareComparison(node, keyFieldName, domain) : undefined)
  );
}

/**
 * `K op c` or `c op K`.
 */
function matchSimpleComparison<T>(
  node: ComparisonExpression,
  keyFieldName: string,
  domain: Orderable<T>
): KeyComparison<T> | undefined {
  if (isKeyAccess(node.left, keyFieldName)) {
    const constant = tryGetKeyConstant(node.right, domain);
    if (constant.found) return { op: node.op, value: constant.value };
  }

  if (isKeyAccess(node.right, keyFieldName)) {
    const constant = tryGetKeyConstant(node.left, domain);
    // Key on the right: 3 < K is K > 3
    if (constant.found) return { op: reverseComparison(node.op), value: constant.value };
  }

  return undefined;
}

/**
 * `K.compareTo(c) op 0` or `0 op K.compareTo(c)`.
 *
 * compareTo only promises a negative, zero or positive result, so only
 * comparisons against zero are recognised.
 */
function matchCompareToComparison<T>(
  node: ComparisonExpression,
  keyFieldName: string,
  domain: Orderable<T>
): KeyComparison<T> | undefined {
  const left = matchCompareTo(node.left, keyFieldName, domain);
  if (left.found && isZero(node.right)) {
    return { op: node.op, value: left.value };
  }

  const right = matchCompareTo(node.right, keyFieldName, domain);
  if (right.found && isZero(node.left)) {
    return { op: reverseComparison(node.op), value: right.value };
  }

  return undefined;
}

/**
 * `compare(...)` against zero, in any of four arrangements.
 *
 * The sense of the comparison is kept when the key and the call are on the
 * same side relative to the constant:
 *   compare(K, c) < 0    and   0 < compare(c, K)
 * and reversed otherwise:
 *   compare(c, K) > 0    and   0 > compare(K, c)
 */
function matchStaticCompareComparison<T>(
  node: ComparisonExpression,
  keyFieldName: string,
  domain: Orderable<T>
): KeyComparison<T> | undefined {
  const arrangements: Array<{ call: Expression; zero: Expression; keyFirst: boolean; reverse: boolean }> = [
    { call: node.left, zero: node.right, keyFirst: true, reverse: false },
    { call: node.right, zero: node.left, keyFirst: false, reverse: false },
    { call: node.left, zero: node.right, keyFirst: false, reverse: true },
    { call: node.right, zero: node.left, keyFirst: true, reverse: true },
  ];

  for (const { call, zero, keyFirst, reverse } of arrangements) {
    const constant = matchStaticCompare(call, keyFieldName, domain, keyFirst);
    if (constant.found && isZero(zero)) {
      return { op: reverse ? reverseComparison(node.op) : node.op, value: constant.value };
    }
  }

  return undefined;
}

/**
 * `K.compareTo(c)`, yielding `c`.
 */
function matchCompareTo<T>(
  node: Expression,
  keyFieldName: string,
  domain: Orderable<T>
): ConstantResult<T> {
  if (node.kind === 'call' && node.method === 'compareTo' && isKeyAccess(node.target, keyFieldName)) {
    return tryGetKeyConstant(node.argument, domain);
  }
  return { found: false };
}

/**
 * `compare(K, c)` when `keyFirst`, otherwise `compare(c, K)`, yielding `c`.
 */
function matchStaticCompare<T>(
  node: Expression,
  keyFieldName: string,
  domain: Orderable<T>,
  keyFirst: boolean
): ConstantResult<T> {
  if (node.kind !== 'compare') return { found: false };

  const [keySide, constantSide] = keyFirst ? [node.left, node.right] : [node.right, node.left];
  if (!isKeyAccess(keySide, keyFieldName)) return { found: false };

  return tryGetKeyConstant(constantSide, domain);
}

function isZero(node: Expression): boolean {
  const constant = tryGetIntegerConstant(node);
  return constant.found && constant.value === 0;
}

/**
 * Whether `node` reads the key member of the input record.
 */
function isKeyAccess(node: Expression, keyFieldName: string): boolean {
  return node.kind === 'member' && node.target.kind === 'parameter' && node.name === keyFieldName;
}
