/**
 * AST for parsed length and condition expressions.
 */

export type Expression =
  | LiteralExpression
  | ReferenceExpression
  | UnaryExpression
  | BinaryExpression;

export interface LiteralExpression {
  kind: 'literal';
  value: number;
}

/** A field name, optionally dotted (`flags.mode`) to reach a bitfield slice. */
export interface ReferenceExpression {
  kind: 'ref';
  name: string;
}

export type UnaryOperator = '!' | '~' | '-';

export interface UnaryExpression {
  kind: 'unary';
  op: UnaryOperator;
  operand: Expression;
}

export type BinaryOperator =
  | '*' | '/' | '%'
  | '+' | '-'
  | '<<' | '>>'
  | '<' | '<=' | '>' | '>='
  | '==' | '!='
  | '&' | '^' | '|'
  | '&&' | '||';

export interface BinaryExpression {
  kind: 'binary';
  op: BinaryOperator;
  left: Expression;
  right: Expression;
}
