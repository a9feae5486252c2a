// src/registry.ts
// Node factory: built-in catalog, registered constructors and dynamic definitions

import type { Logger } from 'pino';

import { DefinitionRegistry, type NodeLogicDefinition } from './definitions.js';
import { getLogger } from './logger.js';
import { Node, type NodeOptions } from './node.js';
import { BUILTIN_NODES, type NodeConstructor } from './nodes/index.js';
import { createDynamicNode } from './nodes/dynamic/index.js';
import type { PortDescriptor } from './ports.js';
import { NodeCategory, UnknownNodeTypeError } from './types.js';
import { DEFAULT_SCRIPT_TIMEOUT_MS } from './sandbox/script-sandbox.js';

export type { NodeConstructor } from './nodes/index.js';

/** Catalog metadata for palette UIs. */
export interface NodeTypeMetadata {
  type: string;
  category: NodeCategory;
  description: string;
  inputs: PortDescriptor[];
  outputs: PortDescriptor[];
  dynamic: boolean;
}

export interface NodeFactoryOptions {
  definitions?: DefinitionRegistry;
  logger?: Logger;
  scriptTimeoutMs?: number;
  /** Replace the built-in catalog (tests). */
  builtins?: ReadonlyMap<string, NodeConstructor>;
}

/**
 * Creates nodes by type name. Lookup order: built-ins, registered
 * constructors, then the definitions registry (with or without `custom_`).
 * Definitions are read at creation time, so registry updates apply immediately.
 */
export class NodeFactory {
  readonly definitions: DefinitionRegistry;
  private readonly builtins: ReadonlyMap<string, NodeConstructor>;
  private readonly registered = new Map<string, NodeConstructor>();
  private readonly log: Logger;
  private readonly scriptTimeoutMs: number;

  constructor(options: NodeFactoryOptions = {}) {
    this.log = options.logger ?? getLogger('factory');
    this.definitions = options.definitions ?? new DefinitionRegistry({ logger: this.log });
    this.builtins = options.builtins ?? BUILTIN_NODES;
    this.scriptTimeoutMs = options.scriptTimeoutMs ?? DEFAULT_SCRIPT_TIMEOUT_MS;
  }

  /** Register (or replace) a constructor under a type name. Built-ins cannot be shadowed. */
  register(type: string, ctor: NodeConstructor): void {
    if (this.builtins.has(type)) {
      throw new Error(`Cannot replace built-in node type: ${type}`);
    }
    this.registered.set(type, ctor);
  }

  unregister(type: string): boolean {
    return this.registered.delete(type);
  }

  has(type: string): boolean {
    return this.builtins.has(type) || this.registered.has(type) || this.definitions.has(type);
  }

  /** Every known type name: built-ins, registered, then definitions. */
  types(): string[] {
    return [...this.builtins.keys(), ...this.registered.keys(), ...this.definitions.names()];
  }

  private resolveDefinition(type: string): NodeLogicDefinition | undefined {
    return this.definitions.get(type);
  }

  /**
   * Create a node. Throws UnknownNodeTypeError for names in none of the sources.
   */
  create(type: string, options: NodeOptions = {}): Node {
    const base: NodeOptions = { logger: this.log, ...options, type };

    const ctor = this.builtins.get(type) ?? this.registered.get(type);
    if (ctor) {
      const node = ctor(base);
      this.log.debug({ type, nodeId: node.id }, 'created node');
      return node;
    }

    const definition = this.resolveDefinition(type);
    if (definition) {
      const node = createDynamicNode(definition, { ...base, scriptTimeoutMs: this.scriptTimeoutMs });
      this.log.debug({ type, nodeId: node.id, form: definition.form }, 'created dynamic node');
      return node;
    }

    throw new UnknownNodeTypeError(type);
  }

  /**
   * Metadata for one type, read from a throwaway instance. Undefined for unknown types.
   */
  describe(type: string): NodeTypeMetadata | undefined {
    if (!this.has(type)) {
      return undefined;
    }

    const definition = this.resolveDefinition(type);
    const isDynamic = !this.builtins.has(type) && !this.registered.has(type) && definition !== undefined;
    const node = this.create(type, { logger: this.log });
    const staticDef = (node.constructor as typeof Node).definition;
    return {
      type,
      category: node.category,
      description: (isDynamic ? definition?.description : staticDef.description) ?? node.name,
      inputs: node.listInputs(),
      outputs: node.listOutputs(),
      dynamic: isDynamic,
    };
  }

  /** Metadata for every known type. */
  describeAll(): Record<string, NodeTypeMetadata> {
    const out: Record<string, NodeTypeMetadata> = {};
    for (const type of this.types()) {
      const meta = this.describe(type);
      if (meta) out[type] = meta;
    }
    return out;
  }
}
