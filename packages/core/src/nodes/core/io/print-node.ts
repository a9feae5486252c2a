// src/nodes/core/io/print-node.ts

import { Node, type NodeDefinition } from '../../../node.js';
import { port } from '../../../type-registry.js';
import { NodeCategory } from '../../../types.js';

export function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === undefined) return 'null';
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

/**
 * Debugging tap: logs its input and forwards it unchanged.
 */
export class PrintNode extends Node {
  static override definition: NodeDefinition = {
    inputs: [port('data')],
    outputs: [port('data')],
    category: NodeCategory.IO,
    description: 'Logs the incoming value and passes it through',
  };

  /** Last line written, for display layers. */
  lastLine: string | null = null;

  process(): boolean {
    const data = this.getInputValue('data');
    const shortId = this.id.split('-')[0] ?? this.id;
    this.lastLine = `[${this.name} - ${shortId}] ${formatValue(data)}`;
    this.log.info({ value: data }, this.lastLine);
    this.setOutputValue('data', data);
    return true;
  }
}
