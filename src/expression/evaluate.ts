import type { BinaryOperator, Expression, UnaryOperator } from './types';

type ArithmeticOperator = Exclude<BinaryOperator, '&&' | '||'>;

/** Numeric values visible to an expression, keyed by (dotted) field name. */
export type ExpressionScope = ReadonlyMap<string, number>;

function truthy(value: number): boolean {
  return value !== 0 && !Number.isNaN(value);
}

function flag(value: boolean): number {
  return value ? 1 : 0;
}

function applyUnary(op: UnaryOperator, v: number): number {
  switch (op) {
    case '!': return flag(!truthy(v));
    case '~': return ~v;
    case '-': return -v;
  }
}

function applyBinary(op: ArithmeticOperator, l: number, r: number): number {
  switch (op) {
    case '*': return l * r;
    case '/': return r === 0 ? NaN : Math.trunc(l / r);
    case '%': return r === 0 ? NaN : l % r;
    case '+': return l + r;
    case '-': return l - r;
    case '<<': return l << r;
    case '>>': return l >> r;
    case '<': return flag(l < r);
    case '<=': return flag(l <= r);
    case '>': return flag(l > r);
    case '>=': return flag(l >= r);
    case '==': return flag(l === r);
    case '!=': return flag(l !== r);
    case '&': return l & r;
    case '^': return l ^ r;
    case '|': return l | r;
  }
}

/**
 * Evaluate an expression against a scope.
 *
 * Bitwise operators work on 32-bit integers, division truncates toward zero,
 * division or modulo by zero yields NaN. Comparison and logical operators
 * yield 1 or 0. Unknown names evaluate to NaN.
 */
export function evaluate(expr: Expression, scope: ExpressionScope): number {
  switch (expr.kind) {
    case 'literal':
      return expr.value;
    case 'ref':
      return scope.get(expr.name) ?? NaN;
    case 'unary':
      return applyUnary(expr.op, evaluate(expr.operand, scope));
    case 'binary':
      // && and || short-circuit
      if (expr.op === '&&') {
        return flag(truthy(evaluate(expr.left, scope)) && truthy(evaluate(expr.right, scope)));
      }
      if (expr.op === '||') {
        return flag(truthy(evaluate(expr.left, scope)) || truthy(evaluate(expr.right, scope)));
      }
      return applyBinary(expr.op, evaluate(expr.left, scope), evaluate(expr.right, scope));
  }
}

/** True when a condition expression evaluates to a non-zero number. */
export function isSatisfied(expr: Expression, scope: ExpressionScope): boolean {
  return truthy(evaluate(expr, scope));
}

/** Every field name the expression refers to, in first-use order. */
export function references(expr: Expression): string[] {
  const names: string[] = [];
  const visit = (e: Expression): void => {
    switch (e.kind) {
      case 'ref':
        if (!names.includes(e.name)) names.push(e.name);
        break;
      case 'unary':
        visit(e.operand);
        break;
      case 'binary':
        visit(e.left);
        visit(e.right);
        break;
      case 'literal':
        break;
    }
  };
  visit(expr);
  return names;
}
