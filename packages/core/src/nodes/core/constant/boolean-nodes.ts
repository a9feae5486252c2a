// src/nodes/core/constant/boolean-nodes.ts

import { Node, type NodeDefinition, type NodeOptions } from '../../../node.js';
import { port } from '../../../type-registry.js';
import { NodeCategory } from '../../../types.js';

abstract class BooleanConstant extends Node {
  static override definition: NodeDefinition = {
    outputs: [port('output', 'boolean')],
    category: NodeCategory.CONSTANT,
  };

  private readonly constant: boolean;

  protected constructor(constant: boolean, options: NodeOptions) {
    super(options);
    this.constant = constant;
    // The output is readable before the first process()
    this.setOutputValue('output', constant);
  }

  process(): boolean {
    this.setOutputValue('output', this.constant);
    return true;
  }
}

export class TrueNode extends BooleanConstant {
  static override definition: NodeDefinition = {
    ...BooleanConstant.definition,
    description: 'Always outputs true',
  };

  constructor(options: NodeOptions = {}) {
    super(true, options);
  }
}

export class FalseNode extends BooleanConstant {
  static override definition: NodeDefinition = {
    ...BooleanConstant.definition,
    description: 'Always outputs false',
  };

  constructor(options: NodeOptions = {}) {
    super(false, options);
  }
}
