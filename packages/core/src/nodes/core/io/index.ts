export { PrintNode, formatValue } from './print-node.js';
