// src/nodes/core/sequence/aggregate-node.ts

import { Node, type NodeDefinition, type NodeOptions } from '../../../node.js';
import { port } from '../../../type-registry.js';
import { NodeCategory } from '../../../types.js';
import { isNumber, numericRange } from '../../../utils/type-utils.js';

export const AGGREGATE_OPERATIONS = ['sum', 'mean', 'min', 'max', 'count', 'std', 'median'] as const;

export type AggregateOperation = (typeof AGGREGATE_OPERATIONS)[number];

function sum(values: number[]): number {
  return values.reduce((acc, x) => acc + x, 0);
}

function mean(values: number[]): number {
  return sum(values) / values.length;
}

// Population standard deviation
function std(values: number[]): number {
  const m = mean(values);
  return Math.sqrt(mean(values.map((x) => (x - m) ** 2)));
}

function median(values: number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? 0;
  if (sorted.length % 2 === 1) return upper;
  return ((sorted[mid - 1] ?? upper) + upper) / 2;
}

const OPERATIONS: Record<AggregateOperation, (values: number[]) => number> = {
  sum,
  mean,
  min: (values) => numericRange(values).min,
  max: (values) => numericRange(values).max,
  count: (values) => values.length,
  std,
  median,
};

/**
 * Reduces the numeric elements of a list to a single number.
 */
export class AggregateNode extends Node {
  static override definition: NodeDefinition = {
    inputs: [port('data', 'array')],
    outputs: [port('result', 'number')],
    category: NodeCategory.SEQUENCE,
    description: 'Reduces the numeric elements of a list with a statistic',
  };

  readonly operation: AggregateOperation;

  constructor(operation: AggregateOperation = 'sum', options: NodeOptions = {}) {
    super({ ...options, name: options.name ?? `Aggregate (${operation})` });
    this.operation = operation;
    this.properties.operation = operation;
  }

  process(): boolean {
    const data = this.getInputValue('data');
    if (!Array.isArray(data)) {
      return false;
    }

    const numeric = data.filter(isNumber);
    if (numeric.length === 0) {
      return false;
    }

    this.setOutputValue('result', OPERATIONS[this.operation](numeric));
    return true;
  }
}
