// src/nodes/core/synthetic/synthetic-data-node.ts

import { Node, type NodeDefinition, type NodeOptions } from '../../../node.js';
import { port } from '../../../type-registry.js';
import { NodeCategory } from '../../../types.js';
import { isEmptyValue, isNumber } from '../../../utils/type-utils.js';
import { getDefaultProvider, orderBounds, type GenerationBounds, type SyntheticDataProvider } from './provider.js';

export const DEFAULT_SYNTHETIC_SIZE = 10;

export interface SyntheticDataNodeOptions extends NodeOptions {
  dataType?: string;
  size?: number;
  minLength?: number;
  maxLength?: number;
  provider?: SyntheticDataProvider;
}

function toOptionalNumber(value: unknown): number | undefined {
  return isNumber(value) ? value : undefined;
}

/**
 * Generates `size` synthetic values of one category. Always ready: missing
 * configuration falls back to the node's properties.
 */
export class SyntheticDataNode extends Node {
  static override definition: NodeDefinition = {
    inputs: [
      port('size', 'integer', { optional: true }),
      port('min_length', 'integer', { optional: true }),
      port('max_length', 'integer', { optional: true }),
    ],
    outputs: [port('mock_data', 'array')],
    category: NodeCategory.SYNTHETIC,
    description: 'Generates a list of synthetic values of the configured category',
  };

  private readonly provider: SyntheticDataProvider;

  constructor(options: SyntheticDataNodeOptions = {}) {
    const dataType = options.dataType ?? 'text';
    super({ ...options, name: options.name ?? `Mock (${dataType})` });
    this.provider = options.provider ?? getDefaultProvider();
    this.properties = {
      data_type: dataType,
      size: options.size ?? DEFAULT_SYNTHETIC_SIZE,
      min_length: options.minLength ?? null,
      max_length: options.maxLength ?? null,
      ...this.properties,
    };
  }

  get dataType(): string {
    const value = this.properties.data_type;
    return typeof value === 'string' ? value : 'text';
  }

  override canExecute(): boolean {
    return true;
  }

  private setting(input: string, property: string): number | undefined {
    const incoming = this.getInputValue(input);
    if (!isEmptyValue(incoming)) {
      return toOptionalNumber(incoming);
    }
    return toOptionalNumber(this.properties[property]);
  }

  process(): boolean {
    const size = Math.max(0, Math.trunc(this.setting('size', 'size') ?? DEFAULT_SYNTHETIC_SIZE));
    const bounds: GenerationBounds = orderBounds({
      min: this.setting('min_length', 'min_length'),
      max: this.setting('max_length', 'max_length'),
    });

    const values = Array.from({ length: size }, () => this.provider.generate(this.dataType, bounds));
    this.setOutputValue('mock_data', values);
    return true;
  }
}
