export { SyntheticDataNode, DEFAULT_SYNTHETIC_SIZE, type SyntheticDataNodeOptions } from './synthetic-data-node.js';
export {
  FakerDataProvider,
  SYNTHETIC_CATEGORIES,
  getDefaultProvider,
  type GenerationBounds,
  type SyntheticCategory,
  type SyntheticDataProvider,
} from './provider.js';
