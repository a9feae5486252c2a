export {
  ArithmeticNode,
  ARITHMETIC_OPERATIONS,
  type ArithmeticOperation,
} from './arithmetic-node.js';
