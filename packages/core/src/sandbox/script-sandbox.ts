// src/sandbox/script-sandbox.ts
// Isolated node:vm context for function-form node logic.
//
// The context is created from a null-prototype object: scripts see only their own realm's built-ins
// plus a `log` helper defined inside the context. Values cross the boundary as
// JSON text, never as host object references.

import vm from 'node:vm';
import { z } from 'zod';

export const DEFAULT_SCRIPT_TIMEOUT_MS = 1000;

export class ScriptSandboxError extends Error {
  /** Messages the script logged before it failed. */
  readonly logs: string[];

  constructor(message: string, logs: string[] = []) {
    super(message);
    this.name = 'ScriptSandboxError';
    this.logs = logs;
  }
}

export interface ScriptSandboxOptions {
  /** Per-invocation (and compile-time top-level) time limit. */
  timeoutMs?: number;
  /** Name shown in stack traces. */
  filename?: string;
  /** Name of the routine the script must define. */
  entryPoint?: string;
}

export interface ScriptRunResult {
  value: unknown;
  logs: string[];
}

const PRELUDE = `
var __logs = [];
var __input = 'null';
function log() {
  var parts = [];
  for (var i = 0; i < arguments.length; i++) {
    var arg = arguments[i];
    parts.push(typeof arg === 'string' ? arg : JSON.stringify(arg));
  }
  __logs.push(parts.join(' '));
}
`;

const envelopeSchema = z.object({
  ok: z.boolean(),
  value: z.unknown().optional(),
  error: z.string().optional(),
  logs: z.array(z.string()),
});

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isIdentifier(name: string): boolean {
  return /^[A-Za-z_$][A-Za-z0-9_$]*$/.test(name);
}

export class ScriptSandbox {
  private readonly context: vm.Context;
  private readonly invocation: vm.Script;
  private readonly timeoutMs: number;

  private constructor(context: vm.Context, invocation: vm.Script, timeoutMs: number) {
    this.context = context;
    this.invocation = invocation;
    this.timeoutMs = timeoutMs;
  }

  /**
   * Compile a script and check that it defines the entry routine.
   * Throws ScriptSandboxError on syntax errors, top-level failures or a missing routine.
   */
  static compile(source: string, options: ScriptSandboxOptions = {}): ScriptSandbox {
    const timeoutMs = options.timeoutMs ?? DEFAULT_SCRIPT_TIMEOUT_MS;
    const filename = options.filename ?? 'node-logic.js';
    const entryPoint = options.entryPoint ?? 'execute';
    if (!isIdentifier(entryPoint)) {
      throw new ScriptSandboxError(`Invalid entry point name: ${entryPoint}`);
    }

    // A null-prototype global keeps the host realm's Object and Function out of reach
    const context = vm.createContext(Object.create(null), {
      name: filename,
      codeGeneration: { strings: false, wasm: false },
    });

    try {
      vm.runInContext(PRELUDE, context, { timeout: timeoutMs });
      const script = new vm.Script(source, { filename });
      script.runInContext(context, { timeout: timeoutMs });
    } catch (error) {
      throw new ScriptSandboxError(`Compilation failed: ${describeError(error)}`);
    }

    const defined: unknown = vm.runInContext(`typeof ${entryPoint} === 'function'`, context);
    if (defined !== true) {
      throw new ScriptSandboxError(`Script does not define a function named "${entryPoint}"`);
    }

    const invocation = new vm.Script(
      `(function () {
        __logs = [];
        try {
          return JSON.stringify({ ok: true, value: ${entryPoint}(JSON.parse(__input)), logs: __logs });
        } catch (e) {
          return JSON.stringify({ ok: false, error: String(e && e.message ? e.message : e), logs: __logs });
        }
      })()`,
      { filename: `${filename}#invoke` },
    );

    return new ScriptSandbox(context, invocation, timeoutMs);
  }

  /**
   * Invoke the entry routine with a JSON copy of `input`.
   * Throws ScriptSandboxError when the routine throws, times out or returns a non-JSON value.
   */
  run(input: unknown): ScriptRunResult {
    let inputJson: string;
    try {
      inputJson = JSON.stringify(input ?? null);
    } catch (error) {
      throw new ScriptSandboxError(`Inputs are not serializable: ${describeError(error)}`);
    }
    this.context.__input = inputJson;

    let raw: unknown;
    try {
      raw = this.invocation.runInContext(this.context, { timeout: this.timeoutMs });
    } catch (error) {
      throw new ScriptSandboxError(`Execution failed: ${describeError(error)}`);
    }

    if (typeof raw !== 'string') {
      throw new ScriptSandboxError('Execution produced no result');
    }
    const envelope = envelopeSchema.parse(JSON.parse(raw));
    if (!envelope.ok) {
      throw new ScriptSandboxError(`Execution failed: ${envelope.error ?? 'unknown error'}`, envelope.logs);
    }
    return { value: envelope.value, logs: envelope.logs };
  }
}
