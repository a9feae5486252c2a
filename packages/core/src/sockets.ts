// src/sockets.ts
// Socket registry and socket key helpers

import { ClassicPreset } from 'rete';
import { canonicalType, isNumericType } from './type-registry.js';

// ============ Socket Key Helpers ============

/**
 * Convert a declared port type to a canonical socket key.
 */
export function getSocketKey(typeName: string | undefined): string {
  return canonicalType(typeName);
}

/**
 * Socket-level compatibility rule: `any` matches everything, numeric tags match each other.
 */
export function areSocketKeysCompatible(sourceKey: string, targetKey: string): boolean {
  if (sourceKey === 'any' || targetKey === 'any') return true;
  if (isNumericType(sourceKey) && isNumericType(targetKey)) return true;
  return sourceKey === targetKey;
}

/**
 * Convenience wrapper for raw type strings.
 */
export function areSocketTypesCompatible(sourceTypeStr: string, targetTypeStr: string): boolean {
  return areSocketKeysCompatible(getSocketKey(sourceTypeStr), getSocketKey(targetTypeStr));
}

// ============ Socket Registry ============

const anySocket = new ClassicPreset.Socket('any');
const socketCache = new Map<string, ClassicPreset.Socket>([['any', anySocket]]);

/**
 * Get or create the shared socket for a declared type.
 */
export function getOrCreateSocket(typeName: string | undefined): ClassicPreset.Socket {
  const key = getSocketKey(typeName);

  const cached = socketCache.get(key);
  if (cached) return cached;

  const socket = new ClassicPreset.Socket(key);
  socketCache.set(key, socket);
  return socket;
}

