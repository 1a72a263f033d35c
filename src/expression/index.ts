export { parseExpression } from './ExpressionParser';
export { evaluate, isSatisfied, references } from './evaluate';
export type { ExpressionScope } from './evaluate';
export type {
  Expression,
  LiteralExpression,
  ReferenceExpression,
  UnaryExpression,
  UnaryOperator,
  BinaryExpression,
  BinaryOperator,
} from './types';
