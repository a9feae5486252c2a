// src/nodes/dynamic/index.ts

import type { NodeLogicDefinition } from '../../definitions.js';
import { DynamicNode, toLogicDefinition, type DynamicNodeOptions } from './dynamic-node.js';
import { ExpressionNode } from './expression-node.js';
import { FunctionNode } from './function-node.js';

export { DynamicNode, toLogicDefinition, type CompileState, type DynamicNodeOptions } from './dynamic-node.js';
export { ExpressionNode } from './expression-node.js';
export { FunctionNode } from './function-node.js';

/**
 * Build the node variant matching the definition's form.
 */
export function createDynamicNode(
  definition: NodeLogicDefinition | Record<string, unknown>,
  options: DynamicNodeOptions = {},
): DynamicNode {
  const logic = toLogicDefinition(definition);
  return logic.form === 'function' ? new FunctionNode(logic, options) : new ExpressionNode(logic, options);
}
