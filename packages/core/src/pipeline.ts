// src/pipeline.ts
// Pipeline: owns nodes and the connection ledger, runs the fixpoint scheduler

import { randomUUID } from 'node:crypto';

import type { Logger } from 'pino';

import type { NodeLogicDefinition } from './definitions.js';
import {
  parseSnapshot,
  readSnapshotFile,
  writeSnapshotFile,
  type PipelineSnapshot,
  type SnapshotNode,
} from './graph.js';
import { getLogger } from './logger.js';
import { isDataHolder, type Node, type NodeOptions } from './node.js';
import { createDynamicNode, DynamicNode, toLogicDefinition } from './nodes/dynamic/index.js';
import type { Port } from './ports.js';
import type { NodeFactory } from './registry.js';
import {
  NodeExecutionError,
  PortDirection,
  ProgressState,
  type ExecutionReport,
  type ExecutionResults,
  type ProgressCallback,
} from './types.js';

// ============ Types ============

export interface Connection {
  id: string;
  sourceNodeId: string;
  sourcePort: string;
  targetNodeId: string;
  targetPort: string;
}

export interface PipelineOptions {
  name?: string;
  logger?: Logger;
}

export interface LoadedPipeline {
  pipeline: Pipeline;
  /** Snapshot node id -> runtime node id. */
  idMap: Map<string, string>;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============ Pipeline ============

/**
 * A graph of nodes and the connections between their ports.
 *
 * Single-threaded and synchronous: `execute()` runs to completion before returning.
 */
export class Pipeline {
  name: string;
  private readonly nodes = new Map<string, Node>();
  private readonly connections = new Map<string, Connection>();
  private readonly log: Logger;
  private progressCallback: ProgressCallback | null = null;

  constructor(options: PipelineOptions = {}) {
    this.name = options.name ?? 'untitled';
    this.log = options.logger ?? getLogger('pipeline');
  }

  // ============ Nodes ============

  addNode(node: Node): string {
    if (this.nodes.has(node.id)) {
      throw new Error(`Node ${node.id} is already in the pipeline`);
    }
    this.nodes.set(node.id, node);
    return node.id;
  }

  getNode(id: string): Node | undefined {
    return this.nodes.get(id);
  }

  listNodes(): Node[] {
    return [...this.nodes.values()];
  }

  get nodeCount(): number {
    return this.nodes.size;
  }

  /** Remove a node and every connection touching it. */
  removeNode(id: string): boolean {
    if (!this.nodes.has(id)) {
      return false;
    }
    for (const connection of this.connectionsOf(id)) {
      this.disconnect(connection.id);
    }
    return this.nodes.delete(id);
  }

  // ============ Connections ============

  getConnection(id: string): Connection | undefined {
    return this.connections.get(id);
  }

  listConnections(): Connection[] {
    return [...this.connections.values()];
  }

  private connectionsOf(nodeId: string): Connection[] {
    return this.listConnections().filter((c) => c.sourceNodeId === nodeId || c.targetNodeId === nodeId);
  }

  private resolvePorts(connection: Omit<Connection, 'id'>): [Port, Port] | null {
    const source = this.nodes.get(connection.sourceNodeId);
    const target = this.nodes.get(connection.targetNodeId);
    if (!source || !target) return null;

    // Output side first on the source, input side first on the target; a port
    // name may exist in both directions (print: data -> data)
    const sourcePort = source.outputs[connection.sourcePort] ?? source.inputs[connection.sourcePort];
    const targetPort = target.inputs[connection.targetPort] ?? target.outputs[connection.targetPort];
    if (!sourcePort || !targetPort) return null;
    return [sourcePort, targetPort];
  }

  /**
   * Link two ports and record the connection. Returns the connection id, or
   * null when a node or port is missing or both ports share a direction.
   *
   * Ports hold a single link: connecting an already-linked port replaces its
   * previous link, and that link's ledger entry is removed. Connecting a pair
   * that is already linked returns the existing id.
   */
  connect(sourceNodeId: string, sourcePort: string, targetNodeId: string, targetPort: string): string | null {
    const endpoints = { sourceNodeId, sourcePort, targetNodeId, targetPort };
    const ports = this.resolvePorts(endpoints);
    if (!ports) {
      this.log.debug(endpoints, 'connect failed: node or port not found');
      return null;
    }

    const [from, to] = ports;
    if (from.link === to) {
      const existing = this.findConnection(from, to);
      if (existing) return existing.id;
    }

    if (!from.connect(to)) {
      this.log.debug(endpoints, 'connect failed: ports share a direction');
      return null;
    }

    this.pruneStaleConnections();

    // The ledger always reads output -> input
    const id = randomUUID();
    const reversed = from.direction === PortDirection.INPUT;
    this.connections.set(
      id,
      reversed
        ? { id, sourceNodeId: targetNodeId, sourcePort: targetPort, targetNodeId: sourceNodeId, targetPort: sourcePort }
        : { id, ...endpoints },
    );
    return id;
  }

  /** Ledger entry for a live link between two ports, in either direction. */
  private findConnection(a: Port, b: Port): Connection | undefined {
    return this.listConnections().find((connection) => {
      const ports = this.resolvePorts(connection);
      return ports !== null && ((ports[0] === a && ports[1] === b) || (ports[0] === b && ports[1] === a));
    });
  }

    /** Drop ledger entries whose ports are no longer linked to each other. */
  private pruneStaleConnections(): void {
    for (const connection of this.listConnections()) {
      const ports = this.resolvePorts(connection);
      if (!ports || ports[0].link !== ports[1]) {
        this.connections.delete(connection.id);
        this.log.debug({ connectionId: connection.id }, 'replaced connection removed');
      }
    }
  }

  disconnect(connectionId: string): boolean {
    const connection = this.connections.get(connectionId);
    if (!connection) {
      return false;
    }

    const ports = this.resolvePorts(connection);
    if (ports && ports[0].link === ports[1]) {
      ports[0].disconnect();
    }
    return this.connections.delete(connectionId);
  }

  // ============ Execution ============

  setProgressCallback(callback: ProgressCallback | null): void {
    this.progressCallback = callback;
  }

  private emitProgress(nodeId: string, state: ProgressState, text?: string): void {
    if (!this.progressCallback) return;
    this.progressCallback(text === undefined ? { nodeId, state } : { nodeId, state, text });
  }

  /** Producers of a node's linked inputs that have not run yet. */
  private hasPendingUpstream(node: Node, executed: ReadonlySet<string>): boolean {
    return this.listConnections().some(
      (c) => c.targetNodeId === node.id && !executed.has(c.sourceNodeId),
    );
  }

  private runNode(node: Node): { success: boolean; error?: string } {
    this.emitProgress(node.id, ProgressState.START);
    try {
      const success = node.process();
      this.emitProgress(node.id, success ? ProgressState.DONE : ProgressState.ERROR);
      return { success };
    } catch (e) {
      const error = new NodeExecutionError(node.id, 'Execution failed', e instanceof Error ? e : undefined);
      this.log.error({ nodeId: node.id, err: e }, error.message);
      this.emitProgress(node.id, ProgressState.ERROR, describeError(e));
      return { success: false, error: describeError(e) };
    }
  }

  /**
   * Run every node whose inputs are ready, in rounds, until all nodes have run
   * or a round makes no progress. A deadlocked graph (cycle, permanently missing
   * input) returns the partial results with `complete: false`.
   *
   * A node is ready when `canExecute()` holds and every node feeding one of its
   * linked inputs has already run.
   */
  execute(): ExecutionReport {
    const executed = new Set<string>();
    const results: ExecutionResults = {};
    const order: string[] = [];

    while (executed.size < this.nodes.size) {
      let progressed = false;

      for (const [id, node] of this.nodes) {
        if (executed.has(id) || this.hasPendingUpstream(node, executed) || !node.canExecute()) {
          continue;
        }

        this.log.debug({ nodeId: id, type: node.type }, 'running node');
        const outcome = this.runNode(node);
        executed.add(id);
        order.push(id);
        results[id] = { ...outcome, outputs: node.collectOutputs() };
        progressed = true;
      }

      if (!progressed) {
        const pending = [...this.nodes.keys()].filter((id) => !executed.has(id));
        this.log.debug({ pending }, 'no runnable nodes left');
        break;
      }
    }

    return { complete: executed.size === this.nodes.size, results, order };
  }

  /**
   * Kahn topological order over the connection ledger. Informational only; a
   * cycle leaves its nodes out, so the order is shorter than the node count.
   */
  getExecutionOrder(): string[] {
    const inDegree = new Map<string, number>();
    const downstream = new Map<string, string[]>();
    for (const id of this.nodes.keys()) {
      inDegree.set(id, 0);
      downstream.set(id, []);
    }
    for (const c of this.connections.values()) {
      inDegree.set(c.targetNodeId, (inDegree.get(c.targetNodeId) ?? 0) + 1);
      downstream.get(c.sourceNodeId)?.push(c.targetNodeId);
    }

    const queue = [...inDegree].filter(([, degree]) => degree === 0).map(([id]) => id);
    const order: string[] = [];
    while (queue.length > 0) {
      const id = queue.shift();
      if (id === undefined) break;
      order.push(id);
      for (const next of downstream.get(id) ?? []) {
        const degree = (inDegree.get(next) ?? 0) - 1;
        inDegree.set(next, degree);
        if (degree === 0) queue.push(next);
      }
    }
    return order;
  }

  // ============ Redefinition ============

  /**
   * Apply a new definition to a dynamic node. Its connections are removed, the
   * node is rebuilt, and connections whose port names still exist are restored.
   * Returns the ids of the restored connections.
   */
  redefineNode(nodeId: string, record: NodeLogicDefinition | Record<string, unknown>): string[] {
    const definition = toLogicDefinition(record);
    const node = this.nodes.get(nodeId);
    if (!(node instanceof DynamicNode)) {
      throw new Error(`Node ${nodeId} is not a dynamic node`);
    }

    const previous = this.connectionsOf(nodeId);
    for (const connection of previous) {
      this.disconnect(connection.id);
    }

    if (node.logicDefinition.form === definition.form) {
      node.updateDefinition(definition);
    } else {
      // The form decides the node class; rebuild under the same id
      const replacement = createDynamicNode(definition, {
        id: node.id,
        type: node.type,
        position: node.position,
        properties: node.properties,
      });
      this.nodes.set(nodeId, replacement);
    }

    const restored: string[] = [];
    for (const c of previous) {
      const id = this.connect(c.sourceNodeId, c.sourcePort, c.targetNodeId, c.targetPort);
      if (id) {
        restored.push(id);
      } else {
        this.log.warn({ nodeId, port: c.sourceNodeId === nodeId ? c.sourcePort : c.targetPort }, 'connection dropped by redefinition');
      }
    }
    return restored;
  }

  // ============ Snapshots ============

  toSnapshot(): PipelineSnapshot {
    return {
      name: this.name,
      nodes: this.listNodes().map((node) => {
        const entry: SnapshotNode = {
          id: node.id,
          type: node.type,
          name: node.name,
          position: [node.position[0], node.position[1]],
          properties: { ...node.properties },
        };
        if (isDataHolder(node)) {
          entry.data = node.data;
        }
        return entry;
      }),
      connections: this.listConnections().map((c) => ({
        id: c.id,
        sourceNode: c.sourceNodeId,
        sourcePort: c.sourcePort,
        targetNode: c.targetNodeId,
        targetPort: c.targetPort,
      })),
    };
  }

  /**
   * Rebuild a pipeline through the factory. Nodes get fresh ids; connections
   * referring to ids missing from the snapshot's nodes are dropped.
   */
  static fromSnapshot(snapshot: unknown, factory: NodeFactory, options: PipelineOptions = {}): LoadedPipeline {
    const parsed = parseSnapshot(snapshot);
    const pipeline = new Pipeline({ name: parsed.name, ...options });
    const idMap = new Map<string, string>();

    for (const entry of parsed.nodes) {
      const nodeOptions: NodeOptions = {};
      if (entry.name !== undefined) nodeOptions.name = entry.name;
      if (entry.position !== undefined) nodeOptions.position = entry.position;
      if (entry.properties !== undefined) nodeOptions.properties = entry.properties;

      const node = factory.create(entry.type, nodeOptions);
      if (entry.data !== undefined && isDataHolder(node)) {
        node.setData(entry.data);
      }
      pipeline.addNode(node);
      idMap.set(entry.id, node.id);
    }

    for (const c of parsed.connections) {
      const source = idMap.get(c.sourceNode);
      const target = idMap.get(c.targetNode);
      if (!source || !target) {
        pipeline.log.warn({ connectionId: c.id }, 'connection refers to an unknown node, dropped');
        continue;
      }
      if (!pipeline.connect(source, c.sourcePort, target, c.targetPort)) {
        pipeline.log.warn({ connectionId: c.id }, 'connection could not be re-established, dropped');
      }
    }

    return { pipeline, idMap };
  }
}

// ============ Files ============

export async function savePipelineFile(path: string, pipeline: Pipeline): Promise<void> {
  await writeSnapshotFile(path, pipeline.toSnapshot());
}

export async function loadPipelineFile(path: string, factory: NodeFactory): Promise<LoadedPipeline> {
  return Pipeline.fromSnapshot(await readSnapshotFile(path), factory);
}
