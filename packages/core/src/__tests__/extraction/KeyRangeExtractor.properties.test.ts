/**
 * Property-Based Tests for key range extraction
 *
 * The extracted range must never exclude a record the predicate matches.
 *
 * Properties:
 * 1. Soundness: P(record) => range(P).contains(record.key)
 * 2. Scans: where(P) returns exactly the entries a full scan would
 * 3. Identities: P && true and !!P extract the same range as P
 * 4. De Morgan: !(A && B) and !A || !B extract the same range
 */

import * as fc from 'fast-check';
import { KEY_FIELD, OrderedDictionary } from '../../collection/OrderedDictionary';
import { evaluatePredicate } from '../../expression/evaluate';
import type { ComparisonOperator, Expression } from '../../expression/Expression';
import { Expressions as E } from '../../expression/Expressions';
import { getKeyRange } from '../../extraction/KeyRangeExtractor';
import { numberDomain, stringDomain } from '../../range/Orderable';

const K = E.key(KEY_FIELD);
const c = (value: unknown) => E.constant(value);

// Arbitrary generators for predicates

const arbOp: fc.Arbitrary<ComparisonOperator> = fc.constantFrom('eq', 'neq', 'lt', 'lte', 'gt', 'gte');

const arbInt = fc.integer({ min: -6, max: 6 });

// Small alphabet so that prefixes, equal keys and maximal code units all occur
const arbText: fc.Arbitrary<string> = fc
  .array(fc.constantFrom('a', 'b', '\uffff'), { maxLength: 3 })
  .map((chars) => chars.join(''));

const arbNumericLeaf: fc.Arbitrary<Expression> = fc.oneof(
  fc
    .tuple(arbOp, arbInt, fc.boolean())
    .map(([op, value, keyLeft]) => (keyLeft ? E.comparison(op, K, c(value)) : E.comparison(op, c(value), K))),
  fc.tuple(arbOp, arbInt, fc.constantFrom(0, 1), fc.boolean()).map(([op, value, zero, callLeft]) => {
    const call = E.compareTo(K, c(value));
    return callLeft ? E.comparison(op, call, c(zero)) : E.comparison(op, c(zero), call);
  }),
  fc.tuple(arbOp, arbInt).map(([op, value]) => E.comparison(op, E.key('value'), c(value))),
  fc.boolean().map((value) => c(value))
);

const arbTextLeaf: fc.Arbitrary<Expression> = fc.oneof(
  fc
    .tuple(arbOp, arbText, fc.boolean())
    .map(([op, value, keyLeft]) => (keyLeft ? E.comparison(op, K, c(value)) : E.comparison(op, c(value), K))),
  fc.tuple(arbOp, arbText, fc.boolean(), fc.boolean()).map(([op, value, keyFirst, callLeft]) => {
    const call = keyFirst ? E.compare(K, c(value)) : E.compare(c(value), K);
    return callLeft ? E.comparison(op, call, c(0)) : E.comparison(op, c(0), call);
  }),
  arbText.map((value) => E.startsWith(K, c(value))),
  arbText.map((value) => E.equals(K, c(value))),
  arbText.map((value) => E.endsWith(K, c(value)))
);

function arbPredicate(leaf: fc.Arbitrary<Expression>, depth: number): fc.Arbitrary<Expression> {
  if (depth <= 0) return leaf;
  const sub = arbPredicate(leaf, depth - 1);
  return fc.oneof(
    leaf,
    fc.tuple(sub, sub).map(([left, right]) => E.and(left, right)),
    fc.tuple(sub, sub).map(([left, right]) => E.or(left, right)),
    sub.map((operand) => E.not(operand))
  );
}

const arbNumericPredicate = arbPredicate(arbNumericLeaf, 3);
const arbTextPredicate = arbPredicate(arbTextLeaf, 3);

const numericEntry = (key: number) => ({ key, value: key * 2 });
const textEntry = (key: string) => ({ key, value: key.length });

describe('KeyRangeExtractor Properties', () => {
  describe('Soundness', () => {
    test('numeric ranges contain every matching key', () => {
      fc.assert(
        fc.property(arbNumericPredicate, fc.integer({ min: -8, max: 8 }), (predicate, key) => {
          if (evaluatePredicate(predicate, numericEntry(key))) {
            expect(getKeyRange(predicate, KEY_FIELD, numberDomain).contains(key)).toBe(true);
          }
        }),
        { numRuns: 500 }
      );
    });

    test('text ranges contain every matching key', () => {
      fc.assert(
        fc.property(arbTextPredicate, arbText, (predicate, key) => {
          if (evaluatePredicate(predicate, textEntry(key))) {
            expect(getKeyRange(predicate, KEY_FIELD, stringDomain).contains(key)).toBe(true);
          }
        }),
        { numRuns: 500 }
      );
    });
  });

  describe('Scans', () => {
    test('where matches a full scan over numeric keys', () => {
      fc.assert(
        fc.property(
          arbNumericPredicate,
          fc.uniqueArray(fc.integer({ min: -8, max: 8 }), { maxLength: 12 }),
          (predicate, keys) => {
            const dict = new OrderedDictionary(numberDomain, keys.map((key): [number, number] => [key, key * 2]));
            const expected = Array.from(dict.entries()).filter((entry) => evaluatePredicate(predicate, entry));
            expect(Array.from(dict.where(predicate))).toEqual(expected);
          }
        )
      );
    });

    test('where matches a full scan over text keys', () => {
      fc.assert(
        fc.property(arbTextPredicate, fc.uniqueArray(arbText, { maxLength: 12 }), (predicate, keys) => {
          const dict = new OrderedDictionary(stringDomain, keys.map((key): [string, number] => [key, key.length]));
          const expected = Array.from(dict.entries()).filter((entry) => evaluatePredicate(predicate, entry));
          expect(Array.from(dict.where(predicate))).toEqual(expected);
        })
      );
    });

    test('reverse scans return the same entries backwards', () => {
      fc.assert(
        fc.property(
          arbNumericPredicate,
          fc.uniqueArray(fc.integer({ min: -8, max: 8 }), { maxLength: 12 }),
          (predicate, keys) => {
            const dict = new OrderedDictionary(numberDomain, keys.map((key): [number, number] => [key, key * 2]));
            const forward = Array.from(dict.where(predicate));
            expect(Array.from(dict.where(predicate, { reverse: true }))).toEqual(forward.reverse());
          }
        )
      );
    });
  });

  describe('Identities', () => {
    test('conjunction with true keeps the range', () => {
      fc.assert(
        fc.property(arbNumericPredicate, (predicate) => {
          const range = getKeyRange(predicate, KEY_FIELD, numberDomain);
          expect(getKeyRange(E.and(predicate, c(true)), KEY_FIELD, numberDomain).equals(range)).toBe(true);
        })
      );
    });

    test('double negation keeps the range', () => {
      fc.assert(
        fc.property(arbTextPredicate, (predicate) => {
          const range = getKeyRange(predicate, KEY_FIELD, stringDomain);
          expect(getKeyRange(E.not(E.not(predicate)), KEY_FIELD, stringDomain).equals(range)).toBe(true);
        })
      );
    });
  });

  describe('De Morgan', () => {
    test('!(A && B) extracts the range of !A || !B', () => {
      fc.assert(
        fc.property(arbNumericPredicate, arbNumericPredicate, (a, b) => {
          const negated = getKeyRange(E.not(E.and(a, b)), KEY_FIELD, numberDomain);
          const expanded = getKeyRange(E.or(E.not(a), E.not(b)), KEY_FIELD, numberDomain);
          expect(negated.equals(expanded)).toBe(true);
        })
      );
    });

    test('!(A || B) extracts the range of !A && !B', () => {
      fc.assert(
        fc.property(arbTextPredicate, arbTextPredicate, (a, b) => {
          const negated = getKeyRange(E.not(E.or(a, b)), KEY_FIELD, stringDomain);
          const expanded = getKeyRange(E.and(E.not(a), E.not(b)), KEY_FIELD, stringDomain);
          expect(negated.equals(expanded)).toBe(true);
        })
      );
    });
  });
});
