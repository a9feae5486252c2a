export {
  TransformNode,
  TRANSFORM_TYPES,
  applyTransform,
  isTransformType,
  type TransformType,
} from './transform-node.js';
export {
  AggregateNode,
  AGGREGATE_OPERATIONS,
  type AggregateOperation,
} from './aggregate-node.js';
export { FilterNode, NAMED_CONDITIONS, type FilterPredicate } from './filter-node.js';
export { JoinNode } from './join-node.js';
export { SplitNode } from './split-node.js';
