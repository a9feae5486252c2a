// src/nodes/core/constant/data-node.ts
// Literal-holding nodes whose value is set from outside the graph

import {
  Node,
  type DataChangedListener,
  type DataHolder,
  type NodeDefinition,
  type NodeOptions,
} from '../../../node.js';
import { port } from '../../../type-registry.js';
import { NodeCategory } from '../../../types.js';
import { isEmptyValue, parseListItem } from '../../../utils/type-utils.js';

export interface DataNodeOptions extends NodeOptions {
  data?: unknown;
}

/**
 * Holds a literal and republishes it on `output`. A comma-separated string
 * becomes a list of numbers and trimmed strings.
 */
export class DataNode extends Node implements DataHolder {
  static override definition: NodeDefinition = {
    inputs: [port('input', 'any', { optional: true })],
    outputs: [port('output')],
    category: NodeCategory.CONSTANT,
    description: 'Holds a value: a scalar, or comma-separated text parsed into a list',
  };

  private _data: unknown;
  private readonly listeners = new Set<DataChangedListener>();

  constructor(options: DataNodeOptions = {}) {
    super(options);
    this._data = options.data ?? this.properties.data ?? null;
    this.properties.data = this._data;
    this.setOutputValue('output', this.normalize(this._data));
  }

  get data(): unknown {
    return this._data;
  }

  /**
   * Replace the held value, keep the input, output and properties in sync,
   * and notify listeners.
   */
  setData(value: unknown): void {
    this._data = value;
    this.setInputValue('input', value);
    this.setOutputValue('output', this.normalize(value));
    this.properties.data = value;

    for (const listener of [...this.listeners]) {
      listener({ nodeId: this.id, value });
    }
  }

  onDataChanged(listener: DataChangedListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  process(): boolean {
    const incoming = this.getInputValue('input');
    const value = isEmptyValue(incoming) ? this._data : incoming;
    this.setOutputValue('output', this.normalize(value));
    return true;
  }

  protected normalize(value: unknown): unknown {
    if (typeof value === 'string' && value.includes(',')) {
      return value.split(',').map(parseListItem);
    }
    return value;
  }
}

/**
 * A data node whose output is always a list.
 */
export class ArrayNode extends DataNode {
  static override definition: NodeDefinition = {
    inputs: [port('input', 'any', { optional: true })],
    outputs: [port('output', 'array')],
    category: NodeCategory.CONSTANT,
    description: 'Holds a list of values',
  };

  constructor(options: DataNodeOptions = {}) {
    super({ ...options, data: options.data ?? options.properties?.data ?? [] });
  }

  protected override normalize(value: unknown): unknown {
    if (Array.isArray(value)) return value;
    if (isEmptyValue(value)) return [];
    if (typeof value === 'string') {
      return value.trim() === '' ? [] : value.split(',').map(parseListItem);
    }
    return [value];
  }
}
