// src/nodes/core/math/arithmetic-node.ts

import { Node, type NodeDefinition, type NodeOptions } from '../../../node.js';
import { port } from '../../../type-registry.js';
import { NodeCategory } from '../../../types.js';
import { isNumber } from '../../../utils/type-utils.js';

export const ARITHMETIC_OPERATIONS = ['add', 'subtract', 'multiply', 'divide', 'power', 'modulo'] as const;

export type ArithmeticOperation = (typeof ARITHMETIC_OPERATIONS)[number];

// Division and modulo by zero yield 0 instead of failing
const OPERATIONS: Record<ArithmeticOperation, (a: number, b: number) => number> = {
  add: (a, b) => a + b,
  subtract: (a, b) => a - b,
  multiply: (a, b) => a * b,
  divide: (a, b) => (b === 0 ? 0 : a / b),
  power: (a, b) => a ** b,
  modulo: (a, b) => (b === 0 ? 0 : ((a % b) + b) % b),
};

/**
 * Binary operation over two numeric inputs.
 */
export class ArithmeticNode extends Node {
  static override definition: NodeDefinition = {
    inputs: [port('a', 'number'), port('b', 'number')],
    outputs: [port('result', 'number')],
    category: NodeCategory.MATH,
    description: 'Applies a binary arithmetic operation to a and b',
  };

  readonly operation: ArithmeticOperation;

  constructor(operation: ArithmeticOperation = 'add', options: NodeOptions = {}) {
    super({ ...options, name: options.name ?? `Math (${operation})` });
    this.operation = operation;
    this.properties.operation = operation;
  }

  process(): boolean {
    const a = this.getInputValue('a');
    const b = this.getInputValue('b');

    if (!isNumber(a) || !isNumber(b)) {
      this.log.debug({ a, b }, 'operands are not numbers');
      return false;
    }

    this.setOutputValue('result', OPERATIONS[this.operation](a, b));
    return true;
  }
}
