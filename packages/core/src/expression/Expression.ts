/**
 * Expression Types
 *
 * A predicate is a tree over one input record (the `parameter` node).
 * The node set is closed: the range extractor and the evaluator switch on
 * `kind` exhaustively, and call shapes are matched structurally by method
 * name and operand position.
 *
 * @module expression/Expression
 */

export type ComparisonOperator = 'eq' | 'neq' | 'lt' | 'lte' | 'gt' | 'gte';

export type ArithmeticOperator = 'add' | 'subtract' | 'multiply' | 'divide' | 'modulo';

/**
 * Methods callable on a target value.
 * Only `equals`, `compareTo` and `startsWith` ever narrow a key range.
 */
export type MethodName = 'equals' | 'compareTo' | 'startsWith' | 'endsWith' | 'includes';

/** The predicate's input record. */
export interface ParameterExpression {
  readonly kind: 'parameter';
}

export interface ConstantExpression {
  readonly kind: 'constant';
  readonly value: unknown;
}

/**
 * A value closed over by the predicate, read when the expression is
 * evaluated rather than when it is built.
 */
export interface CapturedExpression {
  readonly kind: 'captured';
  readonly name: string;
  read(): unknown;
}

export interface MemberExpression {
  readonly kind: 'member';
  readonly target: Expression;
  readonly name: string;
}

export interface AndExpression {
  readonly kind: 'and';
  readonly left: Expression;
  readonly right: Expression;
}

export interface OrExpression {
  readonly kind: 'or';
  readonly left: Expression;
  readonly right: Expression;
}

export interface NotExpression {
  readonly kind: 'not';
  readonly operand: Expression;
}

export interface ComparisonExpression {
  readonly kind: 'comparison';
  readonly op: ComparisonOperator;
  readonly left: Expression;
  readonly right: Expression;
}

export interface ArithmeticExpression {
  readonly kind: 'arithmetic';
  readonly op: ArithmeticOperator;
  readonly left: Expression;
  readonly right: Expression;
}

/** Unary minus. */
export interface NegateExpression {
  readonly kind: 'negate';
  readonly operand: Expression;
}

/** `target.method(argument)` */
export interface CallExpression {
  readonly kind: 'call';
  readonly method: MethodName;
  readonly target: Expression;
  readonly argument: Expression;
}

/** Two-argument external three-way compare: `compare(left, right)`. */
export interface CompareExpression {
  readonly kind: 'compare';
  readonly left: Expression;
  readonly right: Expression;
}

export type Expression =
  | ParameterExpression
  | ConstantExpression
  | CapturedExpression
  | MemberExpression
  | AndExpression
  | OrExpression
  | NotExpression
  | ComparisonExpression
  | ArithmeticExpression
  | NegateExpression
  | CallExpression
  | CompareExpression;

export type ExpressionKind = Expression['kind'];

/**
 * Mirror a comparison for swapped operands: `3 < x` is `x > 3`.
 */
export function reverseComparison(op: ComparisonOperator): ComparisonOperator {
  switch (op) {
    case 'lt':
      return 'gt';
    case 'lte':
      return 'gte';
    case 'gt':
      return 'lt';
    case 'gte':
      return 'lte';
    default:
      return op;
  }
}

/**
 * Logical negation of a comparison: `!(x < 3)` is `x >= 3`.
 */
export function negateComparison(op: ComparisonOperator): ComparisonOperator {
  switch (op) {
    case 'eq':
      return 'neq';
    case 'neq':
      return 'eq';
    case 'lt':
      return 'gte';
    case 'lte':
      return 'gt';
    case 'gt':
      return 'lte';
    case 'gte':
      return 'lt';
  }
}

/**
 * Whether the subtree reads the predicate's input anywhere.
 */
export function referencesParameter(node: Expression): boolean {
  switch (node.kind) {
    case 'parameter':
      return true;
    case 'constant':
    case 'captured':
      return false;
    case 'member':
      return referencesParameter(node.target);
    case 'not':
    case 'negate':
      return referencesParameter(node.operand);
    case 'call':
      return referencesParameter(node.target) || referencesParameter(node.argument);
    case 'and':
    case 'or':
    case 'comparison':
    case 'arithmetic':
    case 'compare':
      return referencesParameter(node.left) || referencesParameter(node.right);
  }
}
