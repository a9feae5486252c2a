// src/graph.ts
// Pipeline snapshot schema and its JSON file form

import { readFile, writeFile } from 'node:fs/promises';

import { z } from 'zod';

import { formatIssues } from './config.js';
import { SnapshotError } from './types.js';

// ============ Core Types ============

export const SnapshotNodeSchema = z.object({
  id: z.string().min(1),
  type: z.string().min(1),
  name: z.string().optional(),
  position: z.tuple([z.number(), z.number()]).optional(),
  data: z.unknown().optional(),
  properties: z.record(z.unknown()).optional(),
});

export const SnapshotConnectionSchema = z.object({
  id: z.string().min(1),
  sourceNode: z.string().min(1),
  sourcePort: z.string().min(1),
  targetNode: z.string().min(1),
  targetPort: z.string().min(1),
});

export const PipelineSnapshotSchema = z.object({
  name: z.string(),
  nodes: z.array(SnapshotNodeSchema),
  connections: z.array(SnapshotConnectionSchema),
});

export type SnapshotNode = z.infer<typeof SnapshotNodeSchema>;
export type SnapshotConnection = z.infer<typeof SnapshotConnectionSchema>;
export type PipelineSnapshot = z.infer<typeof PipelineSnapshotSchema>;

/**
 * Parse an unknown value as a snapshot. Throws SnapshotError listing every schema issue.
 */
export function parseSnapshot(value: unknown): PipelineSnapshot {
  const parsed = PipelineSnapshotSchema.safeParse(value);
  if (!parsed.success) {
    throw new SnapshotError(`Invalid pipeline snapshot: ${formatIssues(parsed.error).join('; ')}`);
  }
  return parsed.data;
}

// ============ Files ============

export async function readSnapshotFile(path: string): Promise<PipelineSnapshot> {
  const text = await readFile(path, 'utf8');
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new SnapshotError(`Pipeline file ${path} is not valid JSON: ${String(error)}`);
  }
  return parseSnapshot(data);
}

export async function writeSnapshotFile(path: string, snapshot: PipelineSnapshot): Promise<void> {
  await writeFile(path, `${JSON.stringify(snapshot, null, 2)}\n`, 'utf8');
}
