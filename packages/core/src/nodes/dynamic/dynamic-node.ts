// src/nodes/dynamic/dynamic-node.ts
// Shared lifecycle of nodes built from a definition record

import { Node, type NodeDefinition, type NodeOptions } from '../../node.js';
import { NodeCategory } from '../../types.js';
import { normalizeDefinition, type NodeLogicDefinition } from '../../definitions.js';

export type CompileState = 'uncompiled' | 'compiled' | 'fallback';

export interface DynamicNodeOptions extends NodeOptions {
  /** Time limit for one function-form invocation. */
  scriptTimeoutMs?: number;
}

/** Validate a raw record; normalizing an already-normalized definition returns an equal one. */
export function toLogicDefinition(definition: NodeLogicDefinition | Record<string, unknown>): NodeLogicDefinition {
  return normalizeDefinition(definition);
}

/**
 * A node whose ports and computation come from a definition.
 *
 * Lifecycle: uncompiled -> compiled | fallback on construction; `updateDefinition`
 * rebuilds the ports and goes through the same branch again. process() never
 * changes the compile state. Subclasses compile at the end of their constructor,
 * once their own fields exist.
 */
export abstract class DynamicNode extends Node {
  static override definition: NodeDefinition = {
    category: NodeCategory.DYNAMIC,
  };

  protected logic: NodeLogicDefinition;
  protected _compileState: CompileState = 'uncompiled';
  protected _compileError: string | undefined;

  constructor(definition: NodeLogicDefinition, options: DynamicNodeOptions = {}) {
    super({ ...options, name: options.name ?? definition.name, type: options.type ?? definition.name });
    this.logic = definition;
    this.properties = { ...(definition.properties ?? {}), ...this.properties };
    this.buildPorts();
  }

  get logicDefinition(): NodeLogicDefinition {
    return this.logic;
  }

  get compileState(): CompileState {
    return this._compileState;
  }

  get compileError(): string | undefined {
    return this._compileError;
  }

  get description(): string | undefined {
    return this.logic.description;
  }

  /**
   * Replace the definition: ports are rebuilt (dropping their links) and the logic recompiled.
   */
  updateDefinition(definition: NodeLogicDefinition | Record<string, unknown>): void {
    this.logic = toLogicDefinition(definition);
    this.name = this.logic.name;
    this.clearPorts();
    this.buildPorts();
    this._compileState = 'uncompiled';
    this._compileError = undefined;
    this.compileLogic();
  }

  private buildPorts(): void {
    for (const spec of this.logic.inputs) {
      this.addInputPort(spec);
    }
    for (const spec of this.logic.outputs) {
      this.addOutputPort(spec);
    }
  }

  /** Current input values keyed by port name. */
  protected gatherInputs(): Record<string, unknown> {
    const values: Record<string, unknown> = {};
    for (const name of Object.keys(this.inputs)) {
      values[name] = this.getInputValue(name);
    }
    return values;
  }

  protected abstract compileLogic(): void;
}
