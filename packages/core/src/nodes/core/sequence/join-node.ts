// src/nodes/core/sequence/join-node.ts

import { Node, type NodeDefinition } from '../../../node.js';
import { port } from '../../../type-registry.js';
import { NodeCategory } from '../../../types.js';
import { isEmptyValue } from '../../../utils/type-utils.js';

function asList(value: unknown): unknown[] {
  if (isEmptyValue(value)) return [];
  return Array.isArray(value) ? value : [value];
}

export class JoinNode extends Node {
  static override definition: NodeDefinition = {
    inputs: [port('data1', 'array', { optional: true }), port('data2', 'array', { optional: true })],
    outputs: [port('joined_data', 'array')],
    category: NodeCategory.SEQUENCE,
    description: 'Concatenates data1 and data2',
  };

  process(): boolean {
    const joined = [...asList(this.getInputValue('data1')), ...asList(this.getInputValue('data2'))];
    this.setOutputValue('joined_data', joined);
    return true;
  }
}
