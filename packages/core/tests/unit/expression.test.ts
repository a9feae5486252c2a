import { describe, expect, test } from 'vitest';
import {
    compileProgram,
    evaluateExpression,
    evaluateLiteral,
    ExpressionEvaluationError,
    ExpressionSyntaxError,
    isExpressionError,
    parseProgram,
} from '../../src/expression/index.js';

describe('expression parser', () => {
    test('splits statements on newlines and semicolons and skips comments', () => {
        const program = parseProgram('a = 1; b = 2\n# note\nc = a + b');
        expect(program.statements.map((s) => s.kind)).toEqual(['assign', 'assign', 'assign']);
    });

    test('reports syntax errors', () => {
        expect(() => parseProgram('x = (1 + ')).toThrow(ExpressionSyntaxError);
        expect(() => parseProgram('x = 1 $ 2')).toThrow(/Unexpected character/);
    });
});

describe('expression evaluation', () => {
    test('arithmetic follows operator precedence', () => {
        expect(evaluateExpression('1 + 2 * 3 ** 2')).toBe(19);
        expect(evaluateExpression('-2 ** 2')).toBe(-4);
        expect(evaluateExpression('7 // 2')).toBe(3);
        expect(evaluateExpression('-7 % 3')).toBe(2);
    });

    test('string and list operators', () => {
        expect(evaluateExpression('"ab" + "cd"')).toBe('abcd');
        expect(evaluateExpression('[1] + [2, 3]')).toEqual([1, 2, 3]);
        expect(evaluateExpression('[0] * 3')).toEqual([0, 0, 0]);
        expect(evaluateExpression('items[-1]', { items: [1, 2, 3] })).toBe(3);
    });

    test('comparisons chain and logical operators short-circuit', () => {
        expect(evaluateExpression('1 < x <= 3', { x: 3 })).toBe(true);
        expect(evaluateExpression('1 < x <= 3', { x: 4 })).toBe(false);
        expect(evaluateExpression('[1, 2] == [1, 2]')).toBe(true);
        expect(evaluateExpression('0 or "fallback"')).toBe('fallback');
        expect(evaluateExpression('missing and 1', { missing: null })).toBeNull();
        expect(evaluateExpression('not [] && !0')).toBe(true);
    });

    test('conditional expressions', () => {
        expect(evaluateExpression('"big" if n > 10 else "small"', { n: 3 })).toBe('small');
    });

    test('whitelisted functions', () => {
        expect(evaluateExpression('round(2.5)')).toBe(3);
        expect(evaluateExpression('round(-2.5)')).toBe(-3);
        expect(evaluateExpression('round(3.14159, 2)')).toBe(3.14);
        expect(evaluateExpression('max(xs)', { xs: [3, 9, 1] })).toBe(9);
        expect(evaluateExpression('min(4, 2, 8)')).toBe(2);
        expect(evaluateExpression('sum(range(5))')).toBe(10);
        expect(evaluateExpression('len("hello")')).toBe(5);
        expect(evaluateExpression('int("42") + float("0.5")')).toBe(42.5);
        expect(evaluateExpression('str(12)')).toBe('12');
    });

    test('division by zero, unknown names and unknown functions raise', () => {
        expect(() => evaluateExpression('1 / 0')).toThrow(ExpressionEvaluationError);
        expect(() => evaluateExpression('y + 1')).toThrow('name "y" is not defined');
        expect(() => evaluateExpression('eval("1")')).toThrow('function "eval" is not available');
        expect(() => evaluateExpression('"a" - 1')).toThrow(ExpressionEvaluationError);
    });

    test('isExpressionError recognizes both error kinds', () => {
        expect(isExpressionError(new ExpressionSyntaxError('x'))).toBe(true);
        expect(isExpressionError(new ExpressionEvaluationError('x'))).toBe(true);
        expect(isExpressionError(new Error('x'))).toBe(false);
    });
});

describe('compiled programs', () => {
    test('run against fresh bindings each time', () => {
        const compiled = compileProgram('total = a + b\ndouble = total * 2');

        const first = compiled.run({ a: 1, b: 2 });
        const second = compiled.run({ a: 10, b: 20 });

        expect(first.get('double')).toBe(6);
        expect(second.get('total')).toBe(30);
        expect(second.get('double')).toBe(60);
    });
});

describe('literal evaluation', () => {
    test('accepts nested literals and signed numbers', () => {
        expect(evaluateLiteral('[1, -2.5, "x", [true, None]]')).toEqual([1, -2.5, 'x', [true, null]]);
    });

    test('rejects names, calls and operators', () => {
        expect(() => evaluateLiteral('[a]')).toThrow(ExpressionSyntaxError);
        expect(() => evaluateLiteral('[len("x")]')).toThrow(ExpressionSyntaxError);
        expect(() => evaluateLiteral('[1 + 1]')).toThrow(ExpressionSyntaxError);
    });
});
