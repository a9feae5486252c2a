import type { PortSpec } from './ports.js';

// ============ Type Registry ============

/** Semantic type tags a port can declare. */
export const PORT_TYPES = [
  'any',
  'string',
  'number',
  'integer',
  'float',
  'boolean',
  'array',
  'object',
] as const;

export type PortType = (typeof PORT_TYPES)[number];

const _validTypes: ReadonlySet<string> = new Set<string>(PORT_TYPES);

// ============ Type Aliases ============

export const TYPE_ALIASES: Readonly<Record<string, PortType>> = {
  str: 'string',
  int: 'integer',
  bool: 'boolean',
  list: 'array',
  dict: 'object',
  Any: 'any',
};

/** Resolve an alias to its canonical tag. Unknown names are returned lowercased. */
export function canonicalType(name: string | undefined): string {
  const trimmed = name?.trim();
  if (!trimmed) return 'any';
  return TYPE_ALIASES[trimmed] ?? trimmed.toLowerCase();
}

/** Check if a type name (or alias) is a known port type. */
export function isValidPortType(name: string): boolean {
  return _validTypes.has(canonicalType(name));
}

/** Numeric tags accept each other: an integer output may feed a float input. */
export function isNumericType(name: string): boolean {
  const canonical = canonicalType(name);
  return canonical === 'number' || canonical === 'integer' || canonical === 'float';
}

// ============ Port Factory ============

/** Convenience factory: `port('data', 'array', { optional: true })` -> PortSpec */
export function port(name: string, type: string = 'any', opts?: { optional?: boolean }): PortSpec {
  const spec: PortSpec = { name, type: canonicalType(type) };
  if (opts?.optional) spec.optional = true;
  return spec;
}
