// src/validator.ts
// Validates snapshot structure and, given a factory, node types and ports

import { PipelineSnapshotSchema, type PipelineSnapshot } from './graph.js';
import type { Pipeline } from './pipeline.js';
import type { PortDescriptor } from './ports.js';
import type { NodeFactory } from './registry.js';
import { getSocketKey, areSocketKeysCompatible } from './sockets.js';

export interface ValidationError {
  path: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

interface PortLayout {
  inputs: Map<string, PortDescriptor>;
  outputs: Map<string, PortDescriptor>;
}

function layoutOf(factory: NodeFactory, type: string): PortLayout | null {
  const meta = factory.describe(type);
  if (!meta) return null;
  return {
    inputs: new Map(meta.inputs.map((p) => [p.name, p])),
    outputs: new Map(meta.outputs.map((p) => [p.name, p])),
  };
}

/**
 * Validate a snapshot for structural correctness and (optionally) against a
 * factory's catalog. Never throws; problems are collected as errors.
 *
 * Declared-type mismatches are reported here only; `connect` checks direction alone.
 */
export function validateSnapshot(snapshot: unknown, factory?: NodeFactory): ValidationResult {
  const parsed = PipelineSnapshotSchema.safeParse(snapshot);
  if (!parsed.success) {
    return {
      valid: false,
      errors: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    };
  }

  const doc: PipelineSnapshot = parsed.data;
  const errors: ValidationError[] = [];

  // Validate each node
  const nodeTypes = new Map<string, string>();
  doc.nodes.forEach((node, i) => {
    if (nodeTypes.has(node.id)) {
      errors.push({ path: `nodes[${i}].id`, message: `Duplicate node id: "${node.id}"` });
    }
    nodeTypes.set(node.id, node.type);

    if (factory && !factory.has(node.type)) {
      errors.push({ path: `nodes[${i}].type`, message: `Unknown node type: "${node.type}"` });
    }
  });

  const layouts = new Map<string, PortLayout | null>();
  const layoutFor = (type: string): PortLayout | null => {
    if (!factory || !factory.has(type)) return null;
    if (!layouts.has(type)) {
      layouts.set(type, layoutOf(factory, type));
    }
    return layouts.get(type) ?? null;
  };

  // Validate each connection
  const connectionIds = new Set<string>();
  const linkedInputs = new Map<string, string>();
  doc.connections.forEach((c, i) => {
    if (connectionIds.has(c.id)) {
      errors.push({ path: `connections[${i}].id`, message: `Duplicate connection id: "${c.id}"` });
    }
    connectionIds.add(c.id);

    const sourceType = nodeTypes.get(c.sourceNode);
    const targetType = nodeTypes.get(c.targetNode);
    if (sourceType === undefined) {
      errors.push({ path: `connections[${i}].sourceNode`, message: `References non-existent node: "${c.sourceNode}"` });
    }
    if (targetType === undefined) {
      errors.push({ path: `connections[${i}].targetNode`, message: `References non-existent node: "${c.targetNode}"` });
    }

    const inputKey = `${c.targetNode}.${c.targetPort}`;
    const previous = linkedInputs.get(inputKey);
    if (previous !== undefined) {
      errors.push({
        path: `connections[${i}]`,
        message: `Input "${inputKey}" is already linked by connection "${previous}"; ports hold one link`,
      });
    }
    linkedInputs.set(inputKey, c.id);

    if (sourceType === undefined || targetType === undefined) return;
    const source = layoutFor(sourceType);
    const target = layoutFor(targetType);
    if (!source || !target) return;

    const output = source.outputs.get(c.sourcePort);
    const input = target.inputs.get(c.targetPort);
    if (!output) {
      errors.push({
        path: `connections[${i}].sourcePort`,
        message: `Unknown source output port: "${c.sourcePort}" on node "${c.sourceNode}"`,
      });
    }
    if (!input) {
      errors.push({
        path: `connections[${i}].targetPort`,
        message: `Unknown target input port: "${c.targetPort}" on node "${c.targetNode}"`,
      });
    }
    if (output && input) {
      const outputKey = getSocketKey(output.type);
      const targetKey = getSocketKey(input.type);
      if (!areSocketKeysCompatible(outputKey, targetKey)) {
        errors.push({
          path: `connections[${i}]`,
          message: `Type mismatch: output "${c.sourcePort}" (${outputKey}) -> input "${c.targetPort}" (${targetKey})`,
        });
      }
    }
  });

  return { valid: errors.length === 0, errors };
}

/**
 * Check for cycles in the connection ledger using DFS.
 */
export function hasCycles(pipeline: Pipeline): boolean {
  const adj = new Map<string, string[]>();

  for (const node of pipeline.listNodes()) {
    adj.set(node.id, []);
  }
  for (const c of pipeline.listConnections()) {
    adj.get(c.sourceNodeId)?.push(c.targetNodeId);
  }

  const visited = new Set<string>();
  const inStack = new Set<string>();

  function dfs(node: string): boolean {
    visited.add(node);
    inStack.add(node);

    for (const neighbor of adj.get(node) ?? []) {
      if (inStack.has(neighbor)) return true;
      if (!visited.has(neighbor) && dfs(neighbor)) return true;
    }

    inStack.delete(node);
    return false;
  }

  for (const node of adj.keys()) {
    if (!visited.has(node) && dfs(node)) return true;
  }

  return false;
}
