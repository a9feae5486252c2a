import { describe, expect, test } from 'vitest';
import { ScriptSandbox, ScriptSandboxError } from '../../src/sandbox/script-sandbox.js';

describe('ScriptSandbox', () => {
    test('invokes execute with a copy of the input', () => {
        const sandbox = ScriptSandbox.compile('function execute(inputs) { return { sum: inputs.a + inputs.b }; }');
        expect(sandbox.run({ a: 2, b: 3 })).toEqual({ value: { sum: 5 }, logs: [] });
    });

    test('keeps state defined at the top level of the script', () => {
        const sandbox = ScriptSandbox.compile(`
            const offset = 100;
            function execute(inputs) { return inputs.x + offset; }
        `);
        expect(sandbox.run({ x: 1 }).value).toBe(101);
    });

    test('collects log output per invocation', () => {
        const sandbox = ScriptSandbox.compile('function execute(inputs) { log("got", inputs); return null; }');
        expect(sandbox.run({ n: 1 }).logs).toEqual(['got {"n":1}']);
        expect(sandbox.run({ n: 2 }).logs).toEqual(['got {"n":2}']);
    });

    test('has no access to host globals', () => {
        const sandbox = ScriptSandbox.compile(
            'function execute() { return [typeof process, typeof require, typeof globalThis.fetch]; }',
        );
        expect(sandbox.run({}).value).toEqual(['undefined', 'undefined', 'undefined']);
    });

    test('cannot reach the host Function through the global object', () => {
        const sandbox = ScriptSandbox.compile(
            "function execute() { return typeof this.constructor.constructor('return process')().pid; }",
        );
        expect(() => sandbox.run({})).toThrow(ScriptSandboxError);
    });

    test('disallows code generation from strings', () => {
        const sandbox = ScriptSandbox.compile('function execute() { return eval("1 + 1"); }');
        expect(() => sandbox.run({})).toThrow(ScriptSandboxError);
    });

    test('rejects scripts with syntax errors or no entry routine', () => {
        expect(() => ScriptSandbox.compile('function execute( {')).toThrow(/Compilation failed/);
        expect(() => ScriptSandbox.compile('const x = 1;')).toThrow('Script does not define a function named "execute"');
        expect(() => ScriptSandbox.compile('function run() {}', { entryPoint: 'run' })).not.toThrow();
    });

    test('errors thrown by the routine carry the logs written before them', () => {
        const sandbox = ScriptSandbox.compile('function execute() { log("step 1"); throw new Error("boom"); }');
        try {
            sandbox.run({});
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(ScriptSandboxError);
            if (error instanceof ScriptSandboxError) {
                expect(error.message).toBe('Execution failed: boom');
                expect(error.logs).toEqual(['step 1']);
            }
        }
    });

    test('stops a routine that exceeds its time limit', () => {
        const sandbox = ScriptSandbox.compile('function execute() { for (;;) {} }', { timeoutMs: 20 });
        expect(() => sandbox.run({})).toThrow(/timed out/);
    });
});
