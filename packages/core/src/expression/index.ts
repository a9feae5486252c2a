// src/expression/index.ts
// Public surface of the restricted expression language

import type { Expr, Program } from './ast.js';
import { evaluate, execute, ExpressionEvaluationError, type Scope } from './evaluator.js';
import { parseExpression, parseProgram, ExpressionSyntaxError } from './parser.js';

export type { Expr, Program, Statement, BinaryOperator, CompareOperator } from './ast.js';
export { evaluate, execute, isTruthy, ExpressionEvaluationError, type Scope } from './evaluator.js';
export { parseExpression, parseProgram, ExpressionSyntaxError } from './parser.js';

/**
 * A parsed program, ready to run repeatedly against fresh scopes.
 */
export interface CompiledProgram {
  readonly source: string;
  readonly program: Program;
  run(bindings: Record<string, unknown>): Scope;
}

export function compileProgram(source: string): CompiledProgram {
  const program = parseProgram(source);
  return {
    source,
    program,
    run(bindings) {
      return execute(program, new Map(Object.entries(bindings)));
    },
  };
}

function isLiteralTree(expr: Expr): boolean {
  switch (expr.kind) {
    case 'literal':
      return true;
    case 'list':
      return expr.items.every(isLiteralTree);
    case 'unary':
      return expr.op !== 'not' && expr.operand.kind === 'literal' && typeof expr.operand.value === 'number';
    default:
      return false;
  }
}

/**
 * Evaluate a literal: number, string, boolean, null or a (nested) list of those.
 * Names, calls and operators other than a numeric sign are rejected.
 */
export function evaluateLiteral(text: string): unknown {
  const expr = parseExpression(text);
  if (!isLiteralTree(expr)) {
    throw new ExpressionSyntaxError(`Not a literal: ${text}`);
  }
  return evaluate(expr, new Map());
}

/** Parse and evaluate a single expression against named bindings. */
export function evaluateExpression(source: string, bindings: Record<string, unknown> = {}): unknown {
  return evaluate(parseExpression(source), new Map(Object.entries(bindings)));
}

export function isExpressionError(error: unknown): error is ExpressionSyntaxError | ExpressionEvaluationError {
  return error instanceof ExpressionSyntaxError || error instanceof ExpressionEvaluationError;
}
