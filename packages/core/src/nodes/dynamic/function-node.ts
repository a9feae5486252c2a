// src/nodes/dynamic/function-node.ts

import { isRecord } from '../../utils/type-utils.js';
import { ScriptSandbox, ScriptSandboxError, DEFAULT_SCRIPT_TIMEOUT_MS } from '../../sandbox/script-sandbox.js';
import type { NodeLogicDefinition } from '../../definitions.js';
import { DynamicNode, type DynamicNodeOptions } from './dynamic-node.js';

type Routine = (inputs: Record<string, unknown>) => unknown;

/**
 * Function form: the logic defines `function execute(inputs) { return {...} }`,
 * run inside a script sandbox. When the script does not compile, or defines no
 * `execute`, the node falls back to a routine that returns null for every output.
 */
export class FunctionNode extends DynamicNode {
  private routine: Routine = () => ({});
  private readonly timeoutMs: number;

  constructor(definition: NodeLogicDefinition, options: DynamicNodeOptions = {}) {
    super(definition, options);
    this.timeoutMs = options.scriptTimeoutMs ?? DEFAULT_SCRIPT_TIMEOUT_MS;
    this.compileLogic();
  }

  protected compileLogic(): void {
    try {
      const sandbox = ScriptSandbox.compile(this.logic.logic, {
        timeoutMs: this.timeoutMs,
        filename: `${this.logic.name}.js`,
      });
      this.routine = (inputs) => {
        const { value, logs } = sandbox.run(inputs);
        for (const line of logs) {
          this.log.info({ script: this.logic.name }, line);
        }
        return value;
      };
      this._compileState = 'compiled';
    } catch (error) {
      this._compileError = error instanceof Error ? error.message : String(error);
      this._compileState = 'fallback';
      this.routine = () => Object.fromEntries(this.logic.outputs.map((o) => [o.name, null]));
      this.log.warn({ error: this._compileError }, 'function logic unavailable, using null fallback');
    }
  }

  process(): boolean {
    let result: unknown;
    try {
      result = this.routine(this.gatherInputs());
    } catch (error) {
      if (error instanceof ScriptSandboxError) {
        for (const line of error.logs) {
          this.log.info({ script: this.logic.name }, line);
        }
      }
      this.log.error({ error: error instanceof Error ? error.message : String(error) }, 'function logic failed');
      return false;
    }

    if (isRecord(result)) {
      for (const [key, value] of Object.entries(result)) {
        if (!this.setOutputValue(key, value)) {
          this.log.warn({ key }, 'returned key matches no output port, ignored');
        }
      }
      return true;
    }

    if (!this.setOutputValue('output', result ?? null)) {
      this.log.warn({ result }, 'non-object result and no "output" port, ignored');
    }
    return true;
  }
}
