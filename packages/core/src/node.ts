// src/node.ts
// Core Node base class with NodeDefinition pattern

import { randomUUID } from 'node:crypto';

import type { Logger } from 'pino';

import { NodeCategory, PortDirection } from './types.js';
import { Port, type NodeInputs, type NodeOutputs, type PortDescriptor, type PortSpec } from './ports.js';
import { getLogger } from './logger.js';
import { validatePortValue } from './utils/type-utils.js';

// ============ NodeDefinition ============

export interface NodeDefinition {
  inputs?: NodeInputs;
  outputs?: NodeOutputs;
  category?: NodeCategory;
  description?: string;
}

export interface NodeOptions {
  /** Fixed identity; a fresh UUID when omitted. */
  id?: string;
  /** Catalog type name the node was created under. */
  type?: string;
  name?: string;
  position?: [number, number];
  properties?: Record<string, unknown>;
  logger?: Logger;
}

/**
 * Abstract base class for all nodes.
 *
 * Ports come from the class's static `definition`; subclasses that build their
 * layout at runtime (dynamic nodes) add ports themselves through
 * `addInputPort` / `addOutputPort`.
 */
export abstract class Node {
  static definition: NodeDefinition = {};

  readonly id: string;
  readonly type: string;
  name: string;
  position: [number, number];
  properties: Record<string, unknown>;
  inputs: Record<string, Port> = {};
  outputs: Record<string, Port> = {};

  protected readonly log: Logger;

  constructor(options: NodeOptions = {}) {
    this.id = options.id ?? randomUUID();

    const def = (this.constructor as typeof Node).definition;
    this.type = options.type ?? this.constructor.name;
    this.name = options.name ?? this.constructor.name;
    this.position = options.position ?? [0, 0];
    this.properties = { ...(options.properties ?? {}) };
    this.log = (options.logger ?? getLogger('node')).child({ nodeId: this.id, nodeType: this.type });

    for (const spec of def.inputs ?? []) {
      this.addInputPort(spec);
    }
    for (const spec of def.outputs ?? []) {
      this.addOutputPort(spec);
    }
  }

  get category(): NodeCategory {
    return (this.constructor as typeof Node).definition.category ?? NodeCategory.BASE;
  }

  // ============ Ports ============

  protected addInputPort(spec: PortSpec): Port {
    const p = new Port(spec, PortDirection.INPUT);
    this.inputs[spec.name] = p;
    return p;
  }

  protected addOutputPort(spec: PortSpec): Port {
    const p = new Port(spec, PortDirection.OUTPUT);
    this.outputs[spec.name] = p;
    return p;
  }

  /** Disconnect and drop every port. Only redefinition flows rebuild a node's layout. */
  protected clearPorts(): void {
    for (const p of [...Object.values(this.inputs), ...Object.values(this.outputs)]) {
      p.disconnect();
    }
    this.inputs = {};
    this.outputs = {};
  }

  getInputPort(name: string): Port | undefined {
    return this.inputs[name];
  }

  getOutputPort(name: string): Port | undefined {
    return this.outputs[name];
  }

  listInputs(): PortDescriptor[] {
    return Object.values(this.inputs).map((p) => p.describe());
  }

  listOutputs(): PortDescriptor[] {
    return Object.values(this.outputs).map((p) => p.describe());
  }

  // ============ Values ============

  /**
   * Read an input: the upstream output when linked, the local value otherwise.
   */
  getInputValue(name: string): unknown {
    const p = this.inputs[name];
    if (!p) return null;

    const value = p.read();
    const check = validatePortValue(value, p.declaredType);
    if (check !== true) {
      this.log.debug({ port: name, mismatch: check }, 'input type mismatch');
    }
    return value;
  }

  /** Store a local value on an input port (used when the input is unlinked). */
  setInputValue(name: string, value: unknown): boolean {
    const p = this.inputs[name];
    if (!p) return false;
    p.value = value;
    return true;
  }

  getOutputValue(name: string): unknown {
    return this.outputs[name]?.value ?? null;
  }

  setOutputValue(name: string, value: unknown): boolean {
    const p = this.outputs[name];
    if (!p) return false;
    p.value = value;
    return true;
  }

  /** Current values of every output port. */
  collectOutputs(): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const [name, p] of Object.entries(this.outputs)) {
      out[name] = p.value;
    }
    return out;
  }

  // ============ Execution ============

  /**
   * Default readiness: every required input is linked or holds a value.
   */
  canExecute(): boolean {
    return Object.values(this.inputs).every((p) => p.optional || p.isSatisfied());
  }

  /**
   * Compute outputs from current inputs. Returning false is an ordinary failure.
   */
  abstract process(): boolean;
}

// ============ Data holders ============

export interface DataChangedEvent {
  nodeId: string;
  value: unknown;
}

export type DataChangedListener = (event: DataChangedEvent) => void;

/** Nodes whose value is set from outside and persisted in snapshots. */
export interface DataHolder {
  readonly data: unknown;
  setData(value: unknown): void;
  onDataChanged(listener: DataChangedListener): () => void;
}

export function isDataHolder(node: Node): node is Node & DataHolder {
  return 'setData' in node && typeof node.setData === 'function' && 'onDataChanged' in node;
}
