// src/nodes/core/sequence/filter-node.ts

import { Node, type NodeDefinition } from '../../../node.js';
import { port } from '../../../type-registry.js';
import { NodeCategory } from '../../../types.js';
import { isEmptyValue, isNumber } from '../../../utils/type-utils.js';

export type FilterPredicate = (item: unknown) => unknown;

export const NAMED_CONDITIONS: Readonly<Record<string, FilterPredicate>> = {
  positive: (x) => isNumber(x) && x > 0,
  negative: (x) => isNumber(x) && x < 0,
  even: (x) => Number.isInteger(x) && Number(x) % 2 === 0,
  odd: (x) => Number.isInteger(x) && Math.abs(Number(x) % 2) === 1,
};

function resolvePredicate(condition: unknown): FilterPredicate | null {
  if (typeof condition === 'function') {
    return (item) => condition(item);
  }
  if (typeof condition === 'string') {
    return NAMED_CONDITIONS[condition] ?? null;
  }
  return null;
}

/**
 * Keeps list elements matching a predicate or a named condition.
 * An absent or unrecognized condition passes the list through.
 */
export class FilterNode extends Node {
  static override definition: NodeDefinition = {
    inputs: [port('data', 'array'), port('condition', 'any', { optional: true })],
    outputs: [port('filtered_data', 'array')],
    category: NodeCategory.SEQUENCE,
    description: 'Keeps elements satisfying positive, negative, even, odd or a predicate',
  };

  process(): boolean {
    const data = this.getInputValue('data');
    if (!Array.isArray(data)) {
      return false;
    }

    const condition = this.getInputValue('condition') ?? this.properties.condition;
    const predicate = isEmptyValue(condition) ? null : resolvePredicate(condition);
    if (!predicate && !isEmptyValue(condition)) {
      this.log.debug({ condition }, 'unrecognized condition, passing data through');
    }

    this.setOutputValue('filtered_data', predicate ? data.filter((item) => Boolean(predicate(item))) : data);
    return true;
  }
}
