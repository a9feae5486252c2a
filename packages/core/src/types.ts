// src/types.ts
// Core type definitions: categories, execution results, progress events, node errors

// ============ Enums ============

export enum PortDirection {
  INPUT = 'input',
  OUTPUT = 'output',
}

export enum NodeCategory {
  CONSTANT = 'constant',
  MATH = 'math',
  SEQUENCE = 'sequence',
  IO = 'io',
  SYNTHETIC = 'synthetic',
  DYNAMIC = 'dynamic',
  BASE = 'base',
}

export enum ProgressState {
  START = 'start',
  DONE = 'done',
  ERROR = 'error',
}

// ============ Execution Result ============

export interface NodeResult {
  success: boolean;
  outputs: Record<string, unknown>;
  error?: string;
}

export type ExecutionResults = Record<string, NodeResult>;

export interface ExecutionReport {
  /** True when every node in the pipeline produced a result. */
  complete: boolean;
  results: ExecutionResults;
  /** Node ids in the order they ran. */
  order: string[];
}

// ============ Progress Types ============

export interface ProgressEvent {
  nodeId: string;
  state: ProgressState;
  text?: string;
}

export type ProgressCallback = (event: ProgressEvent) => void;

// ============ Node Error Types ============

export class NodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NodeError';
  }
}

export class UnknownNodeTypeError extends NodeError {
  readonly nodeType: string;

  constructor(nodeType: string) {
    super(`Unknown node type: ${nodeType}`);
    this.name = 'UnknownNodeTypeError';
    this.nodeType = nodeType;
  }
}

export class DefinitionError extends NodeError {
  readonly definitionName: string;

  constructor(definitionName: string, message: string) {
    super(`Definition ${definitionName || '(unnamed)'}: ${message}`);
    this.name = 'DefinitionError';
    this.definitionName = definitionName;
  }
}

export class NodeExecutionError extends NodeError {
  originalError?: Error;

  constructor(nodeId: string, message: string, originalError?: Error) {
    super(`Node ${nodeId}: ${message}`);
    this.name = 'NodeExecutionError';
    this.originalError = originalError;
  }
}

export class SnapshotError extends NodeError {
  constructor(message: string) {
    super(message);
    this.name = 'SnapshotError';
  }
}
