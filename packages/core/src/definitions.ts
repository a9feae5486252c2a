// src/definitions.ts
// Dynamic node definitions: record schema, normalization, and the persisted registry

import { readFile, writeFile } from 'node:fs/promises';

import type { Logger } from 'pino';
import { z } from 'zod';

import { formatIssues } from './config.js';
import { getLogger } from './logger.js';
import type { PortSpec } from './ports.js';
import { port } from './type-registry.js';
import { DefinitionError, SnapshotError } from './types.js';

export const CUSTOM_TYPE_PREFIX = 'custom_';

// ============ Schema ============

export const PortEntrySchema = z.union([
  z.string().trim().min(1),
  z.object({ name: z.string().trim().min(1), type: z.string().optional() }).passthrough(),
]);

export type PortEntry = z.infer<typeof PortEntrySchema>;

export const LogicFormSchema = z.enum(['expression', 'function']);

export type LogicForm = z.infer<typeof LogicFormSchema>;

export const DefinitionRecordSchema = z
  .object({
    name: z.string().trim().min(1, 'name must not be empty'),
    inputs: z.array(PortEntrySchema).optional(),
    outputs: z.array(PortEntrySchema).optional(),
    logic: z.string().refine((s) => s.trim().length > 0, 'logic must not be empty'),
    form: LogicFormSchema.optional(),
    description: z.string().optional(),
    properties: z.record(z.unknown()).optional(),
  })
  .passthrough();

export type DefinitionRecord = z.infer<typeof DefinitionRecordSchema>;

export const DefinitionsFileSchema = z.union([
  z.array(z.record(z.unknown())),
  z.record(z.record(z.unknown())),
]);

/** A definition ready to build nodes from. */
export interface NodeLogicDefinition {
  name: string;
  inputs: PortSpec[];
  outputs: PortSpec[];
  logic: string;
  form: LogicForm;
  description?: string;
  properties?: Record<string, unknown>;
}

// ============ Normalization ============

const FUNCTION_FORM = /\bfunction\s+execute\s*\(|\bexecute\s*=(?!=)/;

/** Logic that declares an `execute` routine is the function form. */
export function inferForm(logic: string): LogicForm {
  return FUNCTION_FORM.test(logic) ? 'function' : 'expression';
}

function toPortSpec(entry: PortEntry): PortSpec {
  return typeof entry === 'string' ? port(entry.trim()) : port(entry.name.trim(), entry.type);
}

function assertUniquePorts(name: string, direction: string, specs: PortSpec[]): void {
  const seen = new Set<string>();
  for (const spec of specs) {
    if (seen.has(spec.name)) {
      throw new DefinitionError(name, `duplicate ${direction} port "${spec.name}"`);
    }
    seen.add(spec.name);
  }
}

/**
 * Validate a raw record and turn it into a NodeLogicDefinition.
 * Throws DefinitionError on missing name or logic and malformed port entries.
 */
export function normalizeDefinition(raw: unknown): NodeLogicDefinition {
  const parsed = DefinitionRecordSchema.safeParse(raw);
  if (!parsed.success) {
    const name =
      typeof raw === 'object' && raw !== null && 'name' in raw && typeof raw.name === 'string' ? raw.name : '';
    throw new DefinitionError(name, formatIssues(parsed.error).join('; '));
  }

  const record = parsed.data;
  const name = record.name.trim();
  const inputs = (record.inputs ?? []).map(toPortSpec);
  const outputs = (record.outputs ?? []).map(toPortSpec);
  assertUniquePorts(name, 'input', inputs);
  assertUniquePorts(name, 'output', outputs);

  const definition: NodeLogicDefinition = {
    name,
    inputs,
    outputs,
    logic: record.logic,
    form: record.form ?? inferForm(record.logic),
  };
  if (record.description !== undefined) definition.description = record.description;
  if (record.properties !== undefined) definition.properties = record.properties;
  return definition;
}

// ============ Registry ============

export type DefinitionsShape = 'list' | 'map';

interface Entry {
  /** Key in a name-keyed file; the record's name in a list file. */
  key: string;
  raw: Record<string, unknown>;
  definition: NodeLogicDefinition;
}

export interface DefinitionRegistryOptions {
  path?: string;
  logger?: Logger;
}

/**
 * In-memory set of dynamic node definitions with load/save against a JSON file.
 *
 * The file may be a list of records or a map keyed by name; saving writes the
 * same shape back with the stored records untouched.
 */
export class DefinitionRegistry {
  private entries = new Map<string, Entry>();
  private _shape: DefinitionsShape = 'list';
  private _path: string | undefined;
  private readonly log: Logger;

  constructor(options: DefinitionRegistryOptions = {}) {
    this._path = options.path;
    this.log = options.logger ?? getLogger('definitions');
  }

  get shape(): DefinitionsShape {
    return this._shape;
  }

  get path(): string | undefined {
    return this._path;
  }

  get size(): number {
    return this.entries.size;
  }

  static stripPrefix(name: string): string {
    return name.startsWith(CUSTOM_TYPE_PREFIX) ? name.slice(CUSTOM_TYPE_PREFIX.length) : name;
  }

  private resolve(name: string): Entry | undefined {
    return this.entries.get(name) ?? this.entries.get(DefinitionRegistry.stripPrefix(name));
  }

  has(name: string): boolean {
    return this.resolve(name) !== undefined;
  }

  get(name: string): NodeLogicDefinition | undefined {
    return this.resolve(name)?.definition;
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  list(): NodeLogicDefinition[] {
    return [...this.entries.values()].map((e) => e.definition);
  }

  /** Stored records exactly as loaded or upserted. */
  records(): Record<string, unknown>[] {
    return [...this.entries.values()].map((e) => e.raw);
  }

  /**
   * Add or replace a definition. Throws DefinitionError for malformed records.
   */
  upsert(record: Record<string, unknown>): NodeLogicDefinition {
    const definition = normalizeDefinition(record);
    const existing = this.entries.get(definition.name);
    this.entries.set(definition.name, {
      key: existing?.key ?? definition.name,
      raw: record,
      definition,
    });
    return definition;
  }

  remove(name: string): boolean {
    const entry = this.resolve(name);
    if (!entry) return false;
    return this.entries.delete(entry.definition.name);
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * Replace the contents from parsed file data (a list or a name-keyed map).
   */
  loadFrom(data: unknown): void {
    const parsed = DefinitionsFileSchema.safeParse(data);
    if (!parsed.success) {
      throw new SnapshotError('Definitions must be a list of records or a map of name to record');
    }

    const next = new Map<string, Entry>();
    const problems: string[] = [];
    const add = (key: string, raw: Record<string, unknown>): void => {
      try {
        const definition = normalizeDefinition('name' in raw ? raw : { ...raw, name: key });
        next.set(definition.name, { key, raw, definition });
      } catch (error) {
        problems.push(error instanceof Error ? error.message : String(error));
      }
    };

    if (Array.isArray(parsed.data)) {
      this._shape = 'list';
      parsed.data.forEach((raw, i) => add(typeof raw.name === 'string' ? raw.name : String(i), raw));
    } else {
      this._shape = 'map';
      for (const [key, raw] of Object.entries(parsed.data)) {
        add(key, raw);
      }
    }

    if (problems.length > 0) {
      throw new SnapshotError(`Invalid definitions: ${problems.join('; ')}`);
    }
    this.entries = next;
  }

  /** Data in the shape it was loaded in. */
  toData(): Record<string, unknown>[] | Record<string, Record<string, unknown>> {
    if (this._shape === 'list') {
      return this.records();
    }
    const out: Record<string, Record<string, unknown>> = {};
    for (const entry of this.entries.values()) {
      out[entry.key] = entry.raw;
    }
    return out;
  }

  /**
   * Load from a JSON file. A missing file leaves an empty registry.
   */
  async load(path: string | undefined = this._path): Promise<void> {
    if (!path) {
      throw new SnapshotError('No definitions path configured');
    }
    this._path = path;

    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        this.entries = new Map();
        this.log.info({ path }, 'definitions file not found, starting empty');
        return;
      }
      throw error;
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new SnapshotError(`Definitions file ${path} is not valid JSON: ${String(error)}`);
    }
    this.loadFrom(data);
    this.log.info({ path, count: this.entries.size, shape: this._shape }, 'loaded node definitions');
  }

  async save(path: string | undefined = this._path): Promise<void> {
    if (!path) {
      throw new SnapshotError('No definitions path configured');
    }
    this._path = path;
    await writeFile(path, `${JSON.stringify(this.toData(), null, 2)}\n`, 'utf8');
    this.log.info({ path, count: this.entries.size }, 'saved node definitions');
  }
}
