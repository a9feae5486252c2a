// src/nodes/core/sequence/split-node.ts

import { Node, type NodeDefinition } from '../../../node.js';
import { port } from '../../../type-registry.js';
import { NodeCategory } from '../../../types.js';
import { isEmptyValue, isNumber } from '../../../utils/type-utils.js';

/**
 * Splits a list at `split_index` (default: half, rounded down).
 * Negative indices count from the end.
 */
export class SplitNode extends Node {
  static override definition: NodeDefinition = {
    inputs: [port('data', 'array'), port('split_index', 'integer', { optional: true })],
    outputs: [port('data1', 'array'), port('data2', 'array')],
    category: NodeCategory.SEQUENCE,
    description: 'Splits a list into front and back portions',
  };

  process(): boolean {
    const data = this.getInputValue('data');
    if (!Array.isArray(data)) {
      return false;
    }

    const rawIndex = this.getInputValue('split_index');
    let index: number;
    if (isEmptyValue(rawIndex)) {
      index = Math.floor(data.length / 2);
    } else if (isNumber(rawIndex)) {
      index = Math.trunc(rawIndex);
    } else {
      this.log.debug({ splitIndex: rawIndex }, 'split index is not a number');
      return false;
    }

    this.setOutputValue('data1', data.slice(0, index));
    this.setOutputValue('data2', data.slice(index));
    return true;
  }
}
