export type {
  Expression,
  ExpressionKind,
  ComparisonOperator,
  ArithmeticOperator,
  MethodName,
  ParameterExpression,
  ConstantExpression,
  CapturedExpression,
  MemberExpression,
  AndExpression,
  OrExpression,
  NotExpression,
  ComparisonExpression,
  ArithmeticExpression,
  NegateExpression,
  CallExpression,
  CompareExpression,
} from './Expression';
export { reverseComparison, negateComparison, referencesParameter } from './Expression';
export { Expressions } from './Expressions';
export {
  evaluateExpression,
  evaluatePredicate,
  type EvaluationOptions,
  type ValueComparator,
} from './evaluate';
