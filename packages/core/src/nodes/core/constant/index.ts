export { TrueNode, FalseNode } from './boolean-nodes.js';
export { DataNode, ArrayNode, type DataNodeOptions } from './data-node.js';
