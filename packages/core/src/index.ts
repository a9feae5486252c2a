// src/index.ts
// Main entry point for @nodeflow/core

// Types (categories, execution results, progress events, errors)
export * from './types.js';

// Type registry
export {
  PORT_TYPES,
  TYPE_ALIASES,
  canonicalType,
  isValidPortType,
  isNumericType,
  port,
  type PortType,
} from './type-registry.js';

// Ports
export { Port, type PortSpec, type PortDescriptor, type NodeInputs, type NodeOutputs } from './ports.js';

// Sockets
export {
  getOrCreateSocket,
  getSocketKey,
  areSocketKeysCompatible,
  areSocketTypesCompatible,
} from './sockets.js';

// Value helpers
export {
  isEmptyValue,
  isNumber,
  isRecord,
  coercePortValue,
  parseListItem,
  detectType,
  validatePortValue,
} from './utils/type-utils.js';

// Node base class
export {
  Node,
  isDataHolder,
  type NodeDefinition,
  type NodeOptions,
  type DataHolder,
  type DataChangedEvent,
  type DataChangedListener,
} from './node.js';

// Built-in and dynamic nodes
export * from './nodes/index.js';
export * from './nodes/dynamic/index.js';

// Definitions, factory, pipeline
export * from './definitions.js';
export { NodeFactory, type NodeFactoryOptions, type NodeTypeMetadata } from './registry.js';
export {
  Pipeline,
  savePipelineFile,
  loadPipelineFile,
  type Connection,
  type PipelineOptions,
  type LoadedPipeline,
} from './pipeline.js';

// Snapshots
export {
  SnapshotNodeSchema,
  SnapshotConnectionSchema,
  PipelineSnapshotSchema,
  parseSnapshot,
  readSnapshotFile,
  writeSnapshotFile,
  type SnapshotNode,
  type SnapshotConnection,
  type PipelineSnapshot,
} from './graph.js';

// Validation
export { validateSnapshot, hasCycles, type ValidationError, type ValidationResult } from './validator.js';

// Expression language and script sandbox
export * from './expression/index.js';
export {
  ScriptSandbox,
  ScriptSandboxError,
  DEFAULT_SCRIPT_TIMEOUT_MS,
  type ScriptSandboxOptions,
  type ScriptRunResult,
} from './sandbox/script-sandbox.js';

// Ambient
export { createLogger, getLogger, rootLogger, type Logger } from './logger.js';
export { ConfigSchema, ConfigError, DEFAULT_CONFIG, formatIssues, loadConfig, type NodeflowConfig } from './config.js';

// Version info
export const VERSION = '0.1.0';
