// src/utils/type-utils.ts
// Runtime value detection and the textual coercion applied when ports are read

import { evaluateLiteral } from '../expression/index.js';
import { canonicalType } from '../type-registry.js';

const INTEGER_LITERAL = /^[+-]?\d+$/;
const FLOAT_LITERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export function isEmptyValue(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

export function isNumber(value: unknown): value is number {
  return typeof value === 'number' && !Number.isNaN(value);
}

/** Smallest and largest values in one pass; the list may be arbitrarily long. */
export function numericRange(values: readonly number[]): { min: number; max: number } {
  let min = Infinity;
  let max = -Infinity;
  for (const x of values) {
    if (x < min) min = x;
    if (x > max) max = x;
  }
  return { min, max };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Coerce loosely-typed textual input: integer literal, then float literal,
 * then bracketed list literal. Anything that fails to parse comes back unchanged,
 * as does integer text outside the safe-integer range.
 */
export function coercePortValue(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }

  const text = value.trim();
  if (INTEGER_LITERAL.test(text)) {
    const parsed = Number.parseInt(text, 10);
    // Past 2^53 the number would not be the integer written; keep the text
    return Number.isSafeInteger(parsed) ? parsed : value;
  }
  if (FLOAT_LITERAL.test(text)) {
    return Number.parseFloat(text);
  }
  if (text.startsWith('[') && text.endsWith(']')) {
    try {
      return evaluateLiteral(text);
    } catch {
      return value;
    }
  }
  return value;
}

/**
 * Parse one comma-separated item the way constant nodes do: integer, float, or trimmed text.
 */
export function parseListItem(item: string): number | string {
  const text = item.trim();
  if (INTEGER_LITERAL.test(text) || FLOAT_LITERAL.test(text)) {
    return Number(text);
  }
  return text;
}

/**
 * Detect the type of a value and return a canonical type tag.
 */
export function detectType(value: unknown): string {
  if (isEmptyValue(value)) {
    return 'null';
  }
  if (typeof value === 'boolean') {
    return 'boolean';
  }
  if (typeof value === 'number') {
    return Number.isInteger(value) ? 'integer' : 'float';
  }
  if (typeof value === 'string') {
    return 'string';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  if (typeof value === 'object') {
    return 'object';
  }
  return typeof value;
}

/**
 * Check a value against a declared port type. Returns true or a description of the mismatch.
 */
export function validatePortValue(value: unknown, portType: string): true | string {
  const expected = canonicalType(portType);
  if (expected === 'any' || isEmptyValue(value)) {
    return true;
  }

  const actual = detectType(value);
  switch (expected) {
    case 'number':
    case 'float':
      if (actual === 'integer' || actual === 'float') return true;
      break;
    case 'integer':
      if (actual === 'integer') return true;
      break;
    default:
      if (actual === expected) return true;
  }
  return `expected ${expected}, got ${actual}`;
}
