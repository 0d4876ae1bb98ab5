/**
 * Constant recognition for the range extractor.
 *
 * A subtree is constant when it never reads the predicate's input: literals,
 * captured values, and anything computed from them (`3 + 7`,
 * `limits.max`). Such a subtree is evaluated once, up front.
 *
 * @module extraction/ConstantExtractor
 */

import { evaluateExpression } from '../expression/evaluate';
import { referencesParameter, type Expression } from '../expression/Expression';
import type { Orderable } from '../range/Orderable';

export type ConstantResult<T> = { found: true; value: T } | { found: false };

const NOT_CONSTANT: ConstantResult<never> = Object.freeze({ found: false });

/**
 * Evaluate `node` when it does not depend on the input record.
 */
export function tryEvaluateConstant(node: Expression): ConstantResult<unknown> {
  if (referencesParameter(node)) return NOT_CONSTANT;
  return { found: true, value: evaluateExpression(node, undefined) };
}

/**
 * A constant of the key domain, e.g. the `5` in `x.key < 5`.
 */
export function tryGetKeyConstant<T>(node: Expression, domain: Orderable<T>): ConstantResult<T> {
  const result = tryEvaluateConstant(node);
  if (result.found && domain.isValue(result.value)) {
    return { found: true, value: result.value };
  }
  return NOT_CONSTANT;
}

/**
 * An integer constant, e.g. the `0` in `x.key.compareTo(7) <= 0`.
 */
export function tryGetIntegerConstant(node: Expression): ConstantResult<number> {
  const result = tryEvaluateConstant(node);
  if (result.found && typeof result.value === 'number' && Number.isInteger(result.value)) {
    return { found: true, value: result.value };
  }
  return NOT_CONSTANT;
}
