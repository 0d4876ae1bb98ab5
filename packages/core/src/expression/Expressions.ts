import type {
  ArithmeticOperator,
  ComparisonOperator,
  Expression,
  MemberExpression,
  MethodName,
  ParameterExpression,
} from './Expression';

const PARAMETER: ParameterExpression = Object.freeze({ kind: 'parameter' });

/**
 * Factory for expression trees.
 *
 * @example
 * ```typescript
 * const E = Expressions;
 * // x.key >= 10 && x.key < 20
 * const predicate = E.and(
 *   E.greaterThanOrEqual(E.key('key'), E.constant(10)),
 *   E.lessThan(E.key('key'), E.constant(20))
 * );
 * ```
 */
export class Expressions {
  static parameter(): ParameterExpression {
    return PARAMETER;
  }

  static member(target: Expression, name: string): MemberExpression {
    return { kind: 'member', target, name };
  }

  /** Field `name` of the input record. */
  static key(name: string): MemberExpression {
    return { kind: 'member', target: PARAMETER, name };
  }

  static constant(value: unknown): Expression {
    return { kind: 'constant', value };
  }

  static captured(name: string, read: () => unknown): Expression {
    return { kind: 'captured', name, read };
  }

  /**
   * Conjunction of one or more operands, folded left into binary nodes.
   */
  static and(first: Expression, ...rest: Expression[]): Expression {
    return rest.reduce<Expression>((left, right) => ({ kind: 'and', left, right }), first);
  }

  /**
   * Disjunction of one or more operands, folded left into binary nodes.
   */
  static or(first: Expression, ...rest: Expression[]): Expression {
    return rest.reduce<Expression>((left, right) => ({ kind: 'or', left, right }), first);
  }

  static not(operand: Expression): Expression {
    return { kind: 'not', operand };
  }

  static comparison(op: ComparisonOperator, left: Expression, right: Expression): Expression {
    return { kind: 'comparison', op, left, right };
  }

  static equal(left: Expression, right: Expression): Expression {
    return Expressions.comparison('eq', left, right);
  }

  static notEqual(left: Expression, right: Expression): Expression {
    return Expressions.comparison('neq', left, right);
  }

  static lessThan(left: Expression, right: Expression): Expression {
    return Expressions.comparison('lt', left, right);
  }

  static lessThanOrEqual(left: Expression, right: Expression): Expression {
    return Expressions.comparison('lte', left, right);
  }

  static greaterThan(left: Expression, right: Expression): Expression {
    return Expressions.comparison('gt', left, right);
  }

  static greaterThanOrEqual(left: Expression, right: Expression): Expression {
    return Expressions.comparison('gte', left, right);
  }

  /** `from <= target && target <= to` */
  static between(target: Expression, from: Expression, to: Expression): Expression {
    return Expressions.and(
      Expressions.greaterThanOrEqual(target, from),
      Expressions.lessThanOrEqual(target, to)
    );
  }

  static arithmetic(op: ArithmeticOperator, left: Expression, right: Expression): Expression {
    return { kind: 'arithmetic', op, left, right };
  }

  static add(left: Expression, right: Expression): Expression {
    return Expressions.arithmetic('add', left, right);
  }

  static subtract(left: Expression, right: Expression): Expression {
    return Expressions.arithmetic('subtract', left, right);
  }

  static multiply(left: Expression, right: Expression): Expression {
    return Expressions.arithmetic('multiply', left, right);
  }

  static divide(left: Expression, right: Expression): Expression {
    return Expressions.arithmetic('divide', left, right);
  }

  static modulo(left: Expression, right: Expression): Expression {
    return Expressions.arithmetic('modulo', left, right);
  }

  static negate(operand: Expression): Expression {
    return { kind: 'negate', operand };
  }

  static call(method: MethodName, target: Expression, argument: Expression): Expression {
    return { kind: 'call', method, target, argument };
  }

  static equals(target: Expression, argument: Expression): Expression {
    return Expressions.call('equals', target, argument);
  }

  static compareTo(target: Expression, argument: Expression): Expression {
    return Expressions.call('compareTo', target, argument);
  }

  static startsWith(target: Expression, argument: Expression): Expression {
    return Expressions.call('startsWith', target, argument);
  }

  static endsWith(target: Expression, argument: Expression): Expression {
    return Expressions.call('endsWith', target, argument);
  }

  static includes(target: Expression, argument: Expression): Expression {
    return Expressions.call('includes', target, argument);
  }

  /** External two-argument compare: `compare(left, right)`. */
  static compare(left: Expression, right: Expression): Expression {
    return { kind: 'compare', left, right };
  }
}
