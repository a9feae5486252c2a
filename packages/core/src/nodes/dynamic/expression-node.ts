// src/nodes/dynamic/expression-node.ts

import { compileProgram, type CompiledProgram } from '../../expression/index.js';
import type { NodeLogicDefinition } from '../../definitions.js';
import { DynamicNode, type DynamicNodeOptions } from './dynamic-node.js';

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Expression form: statements over the input names assign the output names.
 *
 *   result = value * factor
 */
export class ExpressionNode extends DynamicNode {
  private program: CompiledProgram | null = null;

  constructor(definition: NodeLogicDefinition, options: DynamicNodeOptions = {}) {
    super(definition, options);
    this.compileLogic();
  }

  protected compileLogic(): void {
    try {
      this.program = compileProgram(this.logic.logic);
      this._compileState = 'compiled';
    } catch (error) {
      this.program = null;
      this._compileState = 'fallback';
      this._compileError = describeError(error);
      this.log.warn({ error: this._compileError }, 'expression failed to parse');
    }
  }

  process(): boolean {
    if (!this.program) {
      this.log.error({ error: this._compileError }, 'expression is not compiled');
      return false;
    }

    let scope: Map<string, unknown>;
    try {
      scope = this.program.run(this.gatherInputs());
    } catch (error) {
      this.log.error({ error: describeError(error) }, 'expression evaluation failed');
      return false;
    }

    for (const name of Object.keys(this.outputs)) {
      this.setOutputValue(name, scope.has(name) ? scope.get(name) : null);
    }
    return true;
  }
}
