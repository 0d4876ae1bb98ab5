// packages/core/src/schemas/expression-schemas.ts
import { z } from 'zod';
import { ExpressionParseError } from '../errors';
import type { Expression } from '../expression/Expression';

// --- Operators ---
export const ComparisonOperatorSchema = z.enum(['eq', 'neq', 'lt', 'lte', 'gt', 'gte']);
export const ArithmeticOperatorSchema = z.enum(['add', 'subtract', 'multiply', 'divide', 'modulo']);
export const MethodNameSchema = z.enum(['equals', 'compareTo', 'startsWith', 'endsWith', 'includes']);

// --- Constants ---
export const JsonScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
export type JsonScalar = z.infer<typeof JsonScalarSchema>;

/**
 * JSON form of an expression tree.
 *
 * Every node kind is accepted except `captured`, whose value lives in a
 * closure and cannot travel over the wire. Constants are JSON scalars.
 */
export const ExpressionSchema: z.ZodType<Expression> = z.lazy(() =>
  z.union([
    z.object({ kind: z.literal('parameter') }),
    z.object({ kind: z.literal('constant'), value: JsonScalarSchema }),
    z.object({ kind: z.literal('member'), target: ExpressionSchema, name: z.string() }),
    z.object({ kind: z.literal('and'), left: ExpressionSchema, right: ExpressionSchema }),
    z.object({ kind: z.literal('or'), left: ExpressionSchema, right: ExpressionSchema }),
    z.object({ kind: z.literal('not'), operand: ExpressionSchema }),
    z.object({
      kind: z.literal('comparison'),
      op: ComparisonOperatorSchema,
      left: ExpressionSchema,
      right: ExpressionSchema,
    }),
    z.object({
      kind: z.literal('arithmetic'),
      op: ArithmeticOperatorSchema,
      left: ExpressionSchema,
      right: ExpressionSchema,
    }),
    z.object({ kind: z.literal('negate'), operand: ExpressionSchema }),
    z.object({
      kind: z.literal('call'),
      method: MethodNameSchema,
      target: ExpressionSchema,
      argument: ExpressionSchema,
    }),
    z.object({ kind: z.literal('compare'), left: ExpressionSchema, right: ExpressionSchema }),
  ])
);

/**
 * Validate a JSON-decoded expression.
 *
 * @throws ExpressionParseError listing every schema issue
 */
export function parseExpression(input: unknown): Expression {
  const result = ExpressionSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`
    );
    throw new ExpressionParseError(issues, { cause: result.error });
  }
  return result.data;
}
