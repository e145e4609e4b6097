/**
 * Persisted index snapshot: schema, empty value and validation
 */

import { z } from 'zod';
import { IndexSnapshot } from './types.js';

export const SNAPSHOT_VERSION = 1;

export class SnapshotError extends Error {
  constructor(message: string, readonly path: string) {
    super(`${message} (${path})`);
    this.name = 'SnapshotError';
  }
}

const FileRecordSchema = z.object({
  title: z.string(),
  tags: z.array(z.string()),
  topics: z.array(z.string()),
  created: z.string(),
  updated: z.string(),
  size_chars: z.number().int().nonnegative().default(0),
  parent: z.string().nullable().default(null),
  related: z.array(z.string()).default([])
});

const FilenameListSchema = z.record(z.array(z.string()));

export const IndexSnapshotSchema: z.ZodType<IndexSnapshot, z.ZodTypeDef, unknown> = z.object({
  version: z.number().int(),
  last_updated: z.string(),
  stats: z.object({
    total_files: z.number().int().nonnegative(),
    total_links: z.number().int().nonnegative()
  }),
  files: z.record(FileRecordSchema),
  topics_index: FilenameListSchema,
  tags_index: FilenameListSchema,
  // Older snapshots predate backlinks
  backlinks: FilenameListSchema.default({})
});

export function createEmptySnapshot(now: Date = new Date()): IndexSnapshot {
  return {
    version: SNAPSHOT_VERSION,
    last_updated: now.toISOString(),
    stats: { total_files: 0, total_links: 0 },
    files: {},
    topics_index: {},
    tags_index: {},
    backlinks: {}
  };
}

/**
 * Parse snapshot JSON text. Anything that is not a well-formed snapshot throws SnapshotError.
 */
export function parseSnapshot(text: string, path: string): IndexSnapshot {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SnapshotError(`Index snapshot is not valid JSON: ${reason}`, path);
  }

  const result = IndexSnapshotSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join('.') : '<root>';
    throw new SnapshotError(`Index snapshot is malformed at ${where}: ${issue.message}`, path);
  }

  return result.data;
}
