// src/nodes/index.ts
// Built-in node catalog: type name -> constructor thunk

import type { Node, NodeOptions } from '../node.js';
import { TrueNode, FalseNode, DataNode, ArrayNode } from './core/constant/index.js';
import { ArithmeticNode, ARITHMETIC_OPERATIONS } from './core/math/index.js';
import {
  AggregateNode,
  AGGREGATE_OPERATIONS,
  FilterNode,
  JoinNode,
  SplitNode,
  TransformNode,
  TRANSFORM_TYPES,
} from './core/sequence/index.js';
import { PrintNode } from './core/io/index.js';
import { SyntheticDataNode, SYNTHETIC_CATEGORIES } from './core/synthetic/index.js';

export type NodeConstructor = (options: NodeOptions) => Node;

function buildCatalog(): Map<string, NodeConstructor> {
  const catalog = new Map<string, NodeConstructor>([
    ['true', (o) => new TrueNode(o)],
    ['false', (o) => new FalseNode(o)],
    ['data', (o) => new DataNode(o)],
    ['array', (o) => new ArrayNode(o)],
    ['filter', (o) => new FilterNode(o)],
    ['join', (o) => new JoinNode(o)],
    ['split', (o) => new SplitNode(o)],
    ['print', (o) => new PrintNode(o)],
    ['synthetic', (o) => new SyntheticDataNode(o)],
  ]);

  for (const op of ARITHMETIC_OPERATIONS) {
    catalog.set(`math_${op}`, (o) => new ArithmeticNode(op, o));
  }
  for (const t of TRANSFORM_TYPES) {
    catalog.set(`transform_${t}`, (o) => new TransformNode(t, o));
  }
  for (const op of AGGREGATE_OPERATIONS) {
    catalog.set(`aggregate_${op}`, (o) => new AggregateNode(op, o));
  }
  for (const category of SYNTHETIC_CATEGORIES) {
    catalog.set(`synthetic_${category}`, (o) => new SyntheticDataNode({ ...o, dataType: category }));
  }
  return catalog;
}

export const BUILTIN_NODES: ReadonlyMap<string, NodeConstructor> = buildCatalog();

export * from './core/constant/index.js';
export * from './core/math/index.js';
export * from './core/sequence/index.js';
export * from './core/io/index.js';
export * from './core/synthetic/index.js';
