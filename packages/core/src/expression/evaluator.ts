// Tree-walking evaluator for the node expression language.
// Only the names bound in the scope and the whitelisted functions below are reachable.

import type { BinaryOperator, CompareOperator, Expr, Program } from './ast.js';

export class ExpressionEvaluationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExpressionEvaluationError';
  }
}

export type Scope = Map<string, unknown>;

// ============ Value helpers ============

function typeName(value: unknown): string {
  if (value === null || value === undefined) return 'null';
  if (Array.isArray(value)) return 'list';
  return typeof value;
}

function expectNumber(value: unknown, context: string): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  throw new ExpressionEvaluationError(`${context}: expected a number, got ${typeName(value)}`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectList(value: unknown, context: string): unknown[] {
  if (Array.isArray(value)) return value;
  throw new ExpressionEvaluationError(`${context}: expected a list, got ${typeName(value)}`);
}

export function isTruthy(value: unknown): boolean {
  if (value === null || value === undefined) return false;
  if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
  if (typeof value === 'string') return value.length > 0;
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'object') return Object.keys(value).length > 0;
  return true;
}

function valuesEqual(a: unknown, b: unknown): boolean {
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => valuesEqual(item, b[i]));
  }
  if ((a === null || a === undefined) && (b === null || b === undefined)) {
    return true;
  }
  return a === b;
}

function floorMod(a: number, b: number): number {
  return ((a % b) + b) % b;
}

function applyBinary(op: BinaryOperator, left: unknown, right: unknown): unknown {
  if (op === '+') {
    if (typeof left === 'string' && typeof right === 'string') return left + right;
    if (Array.isArray(left) && Array.isArray(right)) return [...left, ...right];
  }
  if (op === '*') {
    if (Array.isArray(left) && typeof right === 'number') {
      return Array.from({ length: Math.max(0, Math.trunc(right)) }, () => left).flat();
    }
    if (typeof left === 'string' && typeof right === 'number') {
      return left.repeat(Math.max(0, Math.trunc(right)));
    }
  }

  const a = expectNumber(left, `'${op}'`);
  const b = expectNumber(right, `'${op}'`);
  switch (op) {
    case '+':
      return a + b;
    case '-':
      return a - b;
    case '*':
      return a * b;
    case '**':
      return a ** b;
    case '/':
      if (b === 0) throw new ExpressionEvaluationError('division by zero');
      return a / b;
    case '//':
      if (b === 0) throw new ExpressionEvaluationError('integer division by zero');
      return Math.floor(a / b);
    case '%':
      if (b === 0) throw new ExpressionEvaluationError('modulo by zero');
      return floorMod(a, b);
  }
}

function applyCompare(op: CompareOperator, left: unknown, right: unknown): boolean {
  if (op === '==') return valuesEqual(left, right);
  if (op === '!=') return !valuesEqual(left, right);

  if (typeof left === 'string' && typeof right === 'string') {
    return compareOrdered(op, left, right);
  }
  return compareOrdered(op, expectNumber(left, `'${op}'`), expectNumber(right, `'${op}'`));
}

function compareOrdered<T extends string | number>(op: '<' | '<=' | '>' | '>=', a: T, b: T): boolean {
  switch (op) {
    case '<':
      return a < b;
    case '<=':
      return a <= b;
    case '>':
      return a > b;
    case '>=':
      return a >= b;
  }
}

function applyIndex(target: unknown, index: unknown): unknown {
  if (Array.isArray(target) || typeof target === 'string') {
    const i = expectNumber(index, 'index');
    if (!Number.isInteger(i)) {
      throw new ExpressionEvaluationError('index must be an integer');
    }
    const position = i < 0 ? target.length + i : i;
    if (position < 0 || position >= target.length) {
      throw new ExpressionEvaluationError(`index ${i} out of range`);
    }
    return target[position];
  }
  if (isRecord(target) && typeof index === 'string') {
    if (!Object.prototype.hasOwnProperty.call(target, index)) {
      throw new ExpressionEvaluationError(`key "${index}" not found`);
    }
    return target[index];
  }
  throw new ExpressionEvaluationError(`cannot index ${typeName(target)}`);
}

function roundHalfAway(value: number, digits: number): number {
  const factor = 10 ** digits;
  return (Math.sign(value) * Math.round(Math.abs(value) * factor)) / factor;
}

function toInt(value: unknown): number {
  if (typeof value === 'string') {
    const text = value.trim();
    if (!/^[+-]?\d+$/.test(text)) {
      throw new ExpressionEvaluationError(`int(): invalid literal "${value}"`);
    }
    return Number.parseInt(text, 10);
  }
  return Math.trunc(expectNumber(value, 'int()'));
}

function toFloat(value: unknown): number {
  if (typeof value === 'string') {
    const parsed = Number(value.trim());
    if (value.trim() === '' || Number.isNaN(parsed)) {
      throw new ExpressionEvaluationError(`float(): invalid literal "${value}"`);
    }
    return parsed;
  }
  return expectNumber(value, 'float()');
}

function numbersFrom(args: unknown[], name: string): number[] {
  const values = args.length === 1 && Array.isArray(args[0]) ? args[0] : args;
  if (values.length === 0) {
    throw new ExpressionEvaluationError(`${name}(): empty sequence`);
  }
  return values.map((v) => expectNumber(v, `${name}()`));
}

function range(args: unknown[]): number[] {
  const nums = args.map((a) => toInt(a));
  const [start, stop, step] =
    nums.length === 1 ? [0, nums[0] ?? 0, 1] : [nums[0] ?? 0, nums[1] ?? 0, nums[2] ?? 1];
  if (step === 0) {
    throw new ExpressionEvaluationError('range(): step must not be zero');
  }
  const out: number[] = [];
  for (let i = start; step > 0 ? i < stop : i > stop; i += step) {
    out.push(i);
  }
  return out;
}

// ============ Whitelisted functions ============

type Builtin = (args: unknown[]) => unknown;

const BUILTINS: ReadonlyMap<string, Builtin> = new Map<string, Builtin>([
  ['abs', ([x]) => Math.abs(expectNumber(x, 'abs()'))],
  ['min', (args) => Math.min(...numbersFrom(args, 'min'))],
  ['max', (args) => Math.max(...numbersFrom(args, 'max'))],
  ['round', ([x, digits]) => roundHalfAway(expectNumber(x, 'round()'), digits === undefined ? 0 : toInt(digits))],
  ['floor', ([x]) => Math.floor(expectNumber(x, 'floor()'))],
  ['ceil', ([x]) => Math.ceil(expectNumber(x, 'ceil()'))],
  [
    'sqrt',
    ([x]) => {
      const n = expectNumber(x, 'sqrt()');
      if (n < 0) throw new ExpressionEvaluationError('sqrt(): math domain error');
      return Math.sqrt(n);
    },
  ],
  ['pow', ([x, y]) => expectNumber(x, 'pow()') ** expectNumber(y, 'pow()')],
  [
    'len',
    ([x]) => {
      if (typeof x === 'string' || Array.isArray(x)) return x.length;
      if (typeof x === 'object' && x !== null) return Object.keys(x).length;
      throw new ExpressionEvaluationError(`len(): unsupported ${typeName(x)}`);
    },
  ],
  ['sum', ([x]) => expectList(x, 'sum()').reduce<number>((acc, v) => acc + expectNumber(v, 'sum()'), 0)],
  ['str', ([x]) => (typeof x === 'string' ? x : JSON.stringify(x ?? null))],
  ['int', ([x]) => toInt(x)],
  ['float', ([x]) => toFloat(x)],
  ['bool', ([x]) => isTruthy(x)],
  [
    'list',
    ([x]) => {
      if (x === undefined) return [];
      if (typeof x === 'string') return [...x];
      return [...expectList(x, 'list()')];
    },
  ],
  ['range', (args) => range(args)],
]);

// ============ Evaluation ============

export function evaluate(expr: Expr, scope: Scope): unknown {
  switch (expr.kind) {
    case 'literal':
      return expr.value;
    case 'list':
      return expr.items.map((item) => evaluate(item, scope));
    case 'name':
      if (!scope.has(expr.name)) {
        throw new ExpressionEvaluationError(`name "${expr.name}" is not defined`);
      }
      return scope.get(expr.name);
    case 'call': {
      const fn = BUILTINS.get(expr.callee);
      if (!fn) {
        throw new ExpressionEvaluationError(`function "${expr.callee}" is not available`);
      }
      return fn(expr.args.map((arg) => evaluate(arg, scope)));
    }
    case 'index':
      return applyIndex(evaluate(expr.target, scope), evaluate(expr.index, scope));
    case 'unary': {
      const operand = evaluate(expr.operand, scope);
      if (expr.op === 'not') return !isTruthy(operand);
      const n = expectNumber(operand, `unary '${expr.op}'`);
      return expr.op === '-' ? -n : n;
    }
    case 'binary':
      return applyBinary(expr.op, evaluate(expr.left, scope), evaluate(expr.right, scope));
    case 'compare': {
      let left = evaluate(expr.operands[0] ?? { kind: 'literal', value: null }, scope);
      for (let i = 0; i < expr.ops.length; i++) {
        const op = expr.ops[i];
        const operand = expr.operands[i + 1];
        if (op === undefined || operand === undefined) break;
        const right = evaluate(operand, scope);
        if (!applyCompare(op, left, right)) return false;
        left = right;
      }
      return true;
    }
    case 'logical': {
      const left = evaluate(expr.left, scope);
      if (expr.op === 'and') return isTruthy(left) ? evaluate(expr.right, scope) : left;
      return isTruthy(left) ? left : evaluate(expr.right, scope);
    }
    case 'conditional':
      return isTruthy(evaluate(expr.test, scope)) ? evaluate(expr.then, scope) : evaluate(expr.otherwise, scope);
  }
}

/**
 * Run every statement of a program against the scope. Assignments write into the scope.
 */
export function execute(program: Program, scope: Scope): Scope {
  for (const statement of program.statements) {
    const value = evaluate(statement.value, scope);
    if (statement.kind === 'assign') {
      scope.set(statement.target, value);
    }
  }
  return scope;
}
