// src/nodes/core/sequence/transform-node.ts

import { Node, type NodeDefinition, type NodeOptions } from '../../../node.js';
import { port } from '../../../type-registry.js';
import { NodeCategory } from '../../../types.js';
import { isNumber, numericRange } from '../../../utils/type-utils.js';

export const TRANSFORM_TYPES = ['square', 'sqrt', 'abs', 'log', 'normalize'] as const;

export type TransformType = (typeof TRANSFORM_TYPES)[number];

export function isTransformType(value: string): value is TransformType {
  return TRANSFORM_TYPES.some((candidate) => candidate === value);
}

function mapNumbers(data: unknown[], fn: (x: number) => number, accept: (x: number) => boolean = () => true): unknown[] {
  return data.map((x) => (isNumber(x) && accept(x) ? fn(x) : x));
}

/** Min-max scaling over the numeric elements; a flat range scales by 1. */
function normalize(data: unknown[]): unknown[] {
  const numeric = data.filter(isNumber);
  if (numeric.length === 0) return data;

  const { min, max } = numericRange(numeric);
  const range = max !== min ? max - min : 1;
  return mapNumbers(data, (x) => (x - min) / range);
}

/** Apply a named transform; an unknown name passes the list through. */
export function applyTransform(type: string, data: unknown[]): unknown[] {
  if (!isTransformType(type)) {
    return data;
  }

  switch (type) {
    case 'square':
      return mapNumbers(data, (x) => x ** 2);
    case 'sqrt':
      return mapNumbers(data, Math.sqrt, (x) => x >= 0);
    case 'abs':
      return mapNumbers(data, Math.abs);
    case 'log':
      return mapNumbers(data, Math.log, (x) => x > 0);
    case 'normalize':
      return normalize(data);
  }
}

/**
 * Elementwise transform over a list. Non-numeric elements pass through.
 */
export class TransformNode extends Node {
  static override definition: NodeDefinition = {
    inputs: [port('data', 'array')],
    outputs: [port('transformed_data', 'array')],
    category: NodeCategory.SEQUENCE,
    description: 'Applies an elementwise numeric transform to a list',
  };

  readonly transformType: string;

  constructor(transformType: string = 'none', options: NodeOptions = {}) {
    super({ ...options, name: options.name ?? `Transform (${transformType})` });
    this.transformType = transformType;
    this.properties.transform_type = transformType;
  }

  process(): boolean {
    const data = this.getInputValue('data');
    if (!Array.isArray(data)) {
      return false;
    }

    this.setOutputValue('transformed_data', applyTransform(this.transformType, data));
    return true;
  }
}
