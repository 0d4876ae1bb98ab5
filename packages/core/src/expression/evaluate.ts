/**
 * Exact expression evaluation.
 *
 * Used to re-apply a predicate to every candidate of a range scan and to
 * fold parameter-free subtrees into constants.
 *
 * @module expression/evaluate
 */

import { compareValues, valuesEqual } from '../utils/compare';
import type { ArithmeticOperator, ComparisonOperator, Expression, MethodName } from './Expression';

/**
 * Three-way comparison over arbitrary values.
 * Returns undefined when the two values cannot be ordered.
 */
export type ValueComparator = (a: unknown, b: unknown) => number | undefined;

export interface EvaluationOptions {
  /** Ordering used by comparisons, `compareTo` and `compare` (default: compareValues) */
  compare?: ValueComparator;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Evaluate `node` against `input` and return the resulting value.
 */
export function evaluateExpression(
  node: Expression,
  input: unknown,
  options: EvaluationOptions = {}
): unknown {
  const compare = options.compare ?? compareValues;
  const evaluate = (child: Expression): unknown => evaluateExpression(child, input, options);
  const test = (child: Expression): boolean => evaluate(child) === true;

  switch (node.kind) {
    case 'parameter':
      return input;
    case 'constant':
      return node.value;
    case 'captured':
      return node.read();
    case 'member': {
      const target = evaluate(node.target);
      return isRecord(target) ? target[node.name] : undefined;
    }
    case 'and':
      return test(node.left) && test(node.right);
    case 'or':
      return test(node.left) || test(node.right);
    case 'not':
      return !test(node.operand);
    case 'comparison':
      return applyComparison(node.op, evaluate(node.left), evaluate(node.right), compare);
    case 'arithmetic':
      return applyArithmetic(node.op, evaluate(node.left), evaluate(node.right));
    case 'negate': {
      const value = evaluate(node.operand);
      if (typeof value === 'number' || typeof value === 'bigint') return -value;
      return undefined;
    }
    case 'call':
      return applyMethod(node.method, evaluate(node.target), evaluate(node.argument), compare);
    case 'compare':
      return compare(evaluate(node.left), evaluate(node.right)) ?? NaN;
  }
}

/**
 * Evaluate `node` as a predicate: true only when it yields exactly `true`.
 */
export function evaluatePredicate(
  node: Expression,
  input: unknown,
  options: EvaluationOptions = {}
): boolean {
  return evaluateExpression(node, input, options) === true;
}

function applyComparison(
  op: ComparisonOperator,
  left: unknown,
  right: unknown,
  compare: ValueComparator
): boolean {
  const cmp = compare(left, right);

  switch (op) {
    case 'eq':
      return cmp !== undefined ? cmp === 0 : valuesEqual(left, right);
    case 'neq':
      return cmp !== undefined ? cmp !== 0 : !valuesEqual(left, right);
    case 'lt':
      return cmp !== undefined && cmp < 0;
    case 'lte':
      return cmp !== undefined && cmp <= 0;
    case 'gt':
      return cmp !== undefined && cmp > 0;
    case 'gte':
      return cmp !== undefined && cmp >= 0;
  }
}

function applyMethod(
  method: MethodName,
  target: unknown,
  argument: unknown,
  compare: ValueComparator
): unknown {
  switch (method) {
    case 'equals':
      return applyComparison('eq', target, argument, compare);
    case 'compareTo':
      return compare(target, argument) ?? NaN;
    case 'startsWith':
      return typeof target === 'string' && typeof argument === 'string' && target.startsWith(argument);
    case 'endsWith':
      return typeof target === 'string' && typeof argument === 'string' && target.endsWith(argument);
    case 'includes':
      return typeof target === 'string' && typeof argument === 'string' && target.includes(argument);
  }
}

function applyArithmetic(op: ArithmeticOperator, left: unknown, right: unknown): unknown {
  if (typeof left === 'number' && typeof right === 'number') {
    switch (op) {
      case 'add':
        return left + right;
      case 'subtract':
        return left - right;
      case 'multiply':
        return left * right;
      case 'divide':
        return left / right;
      case 'modulo':
        return left % right;
    }
  }

  if (typeof left === 'bigint' && typeof right === 'bigint') {
    switch (op) {
      case 'add':
        return left + right;
      case 'subtract':
        return left - right;
      case 'multiply':
        return left * right;
      case 'divide':
        return right === 0n ? undefined : left / right;
      case 'modulo':
        return right === 0n ? undefined : left % right;
    }
  }

  if (op === 'add' && typeof left === 'string' && typeof right === 'string') {
    return left + right;
  }

  return undefined;
}
